import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileManager } from '../src/utils/FileManager';

describe('FileManager', () => {
  let root: string;
  let fileManager: FileManager;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'archiver-files-'));
    fileManager = new FileManager(path.join(root, 'work'));
    await fileManager.initialize();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('work directories', () => {
    it('gives each content id its own directory', () => {
      expect(fileManager.workDirFor('440')).toBe(path.join(root, 'work', '440'));
      expect(fileManager.workDirFor('570')).toBe(path.join(root, 'work', '570'));
    });

    it('wipes partial content unless resuming', async () => {
      const workDir = await fileManager.prepareWorkDir('440', false);
      await fs.writeFile(path.join(workDir, 'partial.bin'), 'x');

      await fileManager.prepareWorkDir('440', true);
      expect(await fileManager.fileExists(path.join(workDir, 'partial.bin'))).toBe(true);

      await fileManager.prepareWorkDir('440', false);
      expect(await fileManager.fileExists(path.join(workDir, 'partial.bin'))).toBe(false);
      expect(await fileManager.fileExists(workDir)).toBe(true);
    });

    it('removes the work directory on cleanup', async () => {
      const workDir = await fileManager.prepareWorkDir('440', false);
      await fs.writeFile(path.join(workDir, 'content.bin'), 'x');

      expect(await fileManager.cleanupWorkDir('440')).toBe(true);
      expect(await fileManager.fileExists(workDir)).toBe(false);
    });

    it('lets only one run hold a content id at a time', () => {
      expect(fileManager.acquire('440')).toBe(true);
      expect(fileManager.acquire('440')).toBe(false);
      expect(fileManager.acquire('570')).toBe(true);

      fileManager.release('440');
      expect(fileManager.acquire('440')).toBe(true);
    });
  });

  describe('listArchiveParts', () => {
    it('lists numbered volumes in order', async () => {
      const output = path.join(root, 'game.7z');
      await fs.writeFile(`${output}.002`, '');
      await fs.writeFile(`${output}.001`, '');

      expect(await fileManager.listArchiveParts(output)).toEqual([
        `${output}.001`,
        `${output}.002`,
      ]);
    });

    it('stops at the first gap in the sequence', async () => {
      const output = path.join(root, 'game.7z');
      await fs.writeFile(`${output}.001`, '');
      await fs.writeFile(`${output}.003`, '');

      expect(await fileManager.listArchiveParts(output)).toEqual([`${output}.001`]);
    });

    it('falls back to a single archive file', async () => {
      const output = path.join(root, 'game.7z');
      await fs.writeFile(output, '');

      expect(await fileManager.listArchiveParts(output)).toEqual([output]);
    });

    it('returns nothing when no archive exists', async () => {
      expect(await fileManager.listArchiveParts(path.join(root, 'missing.7z'))).toEqual([]);
    });
  });
});
