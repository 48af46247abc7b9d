import { randomBytes } from 'crypto';
import { constants as fsConstants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';
import { CommandRunner } from '../process/ProcessRunner';
import { PathNotWritableError } from '../session/errors';
import { formatBytes } from '../progress/format';
import { CheckItem, EnvironmentReport, ToolConfig } from '../types';

const INSTALL_TIMEOUT_MS = 10 * 60 * 1000;

export interface CheckedTool {
  name: string;
  config: ToolConfig;
}

export interface EnvironmentCheckerOptions {
  tools: CheckedTool[];
  writableDirs: string[];
  /** Path whose filesystem is measured for free space */
  spaceProbePath: string;
  minFreeBytes: number;
  /** Used for reinstall attempts; without it reinstalling is skipped */
  runner?: CommandRunner;
  /** PATH used to locate bare command names (defaults to process.env.PATH) */
  searchPath?: string;
}

function isPathLike(candidate: string): boolean {
  return candidate.includes('/') || candidate.includes(path.sep);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    await fs.access(file, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * EnvironmentChecker - free space, external tools and writable directories.
 * Problems are repaired where possible and always reported, never thrown.
 */
export class EnvironmentChecker {
  constructor(private readonly options: EnvironmentCheckerOptions) {}

  /**
   * Available bytes on the filesystem holding `target`
   */
  async freeSpace(target: string = this.options.spaceProbePath): Promise<number | undefined> {
    try {
      const stats = await fs.statfs(target);
      return stats.bavail * stats.bsize;
    } catch (error) {
      logger.warn('Could not query free space', { path: target, error: errorMessage(error) });
      return undefined;
    }
  }

  /**
   * Ensure an archive can be written at `outputPath`.
   * Throws PathNotWritableError with the reason otherwise.
   */
  async verifyOutputPath(outputPath: string): Promise<string> {
    logger.info('Verifying output path...', { outputPath });
    if (!path.isAbsolute(outputPath)) {
      throw new PathNotWritableError(outputPath, 'output path must be absolute.');
    }
    const dir = path.dirname(outputPath);
    try {
      await fs.mkdir(dir, { recursive: true });
      await this.probeWrite(dir);
    } catch (error) {
      throw new PathNotWritableError(outputPath, `could not write to ${dir}: ${errorMessage(error)}`);
    }
    return 'Output path verified successfully.';
  }

  /**
   * Full system check
   */
  async check(): Promise<EnvironmentReport> {
    const items: CheckItem[] = [];

    const freeBytes = await this.freeSpace();
    if (freeBytes === undefined) {
      items.push({ name: 'disk space', status: 'unfixable', detail: 'free space query failed' });
    } else {
      const low = freeBytes < this.options.minFreeBytes;
      items.push({
        name: 'disk space',
        status: 'found',
        detail: `${formatBytes(freeBytes)} available${low ? ` (below ${formatBytes(this.options.minFreeBytes)}, downloads may fail)` : ''}`,
      });
    }

    for (const tool of this.options.tools) {
      items.push(await this.guard(tool.name, () => this.checkTool(tool)));
    }

    for (const dir of this.options.writableDirs) {
      items.push(await this.guard(dir, () => this.checkWritable(dir)));
    }

    const report: EnvironmentReport = { freeBytes, items };
    logger.info('🩺 System check complete', {
      items: items.map((item) => `${item.name}=${item.status}`),
    });
    return report;
  }

  static formatReport(report: EnvironmentReport): string {
    const lines = ['System Check:'];
    if (report.freeBytes !== undefined) {
      lines.push(`Available Disk Space: ${formatBytes(report.freeBytes)}`);
    }
    for (const item of report.items) {
      lines.push(`${item.name}: ${item.status} - ${item.detail}`);
    }
    return lines.join('\n');
  }

  private async guard(name: string, check: () => Promise<CheckItem>): Promise<CheckItem> {
    try {
      return await check();
    } catch (error) {
      logger.error('Check failed unexpectedly', { name, error: errorMessage(error) });
      return { name, status: 'unfixable', detail: errorMessage(error) };
    }
  }

  private async checkTool({ name, config }: CheckedTool): Promise<CheckItem> {
    const located = await this.locate(config.candidates);
    if (located) {
      return this.ensureExecutable(name, located);
    }

    // Not at any known location: link it in from PATH when the tool lives there
    const onPath = await this.searchPath(path.basename(config.path));
    if (onPath && isPathLike(config.path)) {
      try {
        await fs.mkdir(path.dirname(config.path), { recursive: true });
        await fs.symlink(onPath, config.path);
        logger.info('🔗 Linked tool into place', { name, from: onPath, to: config.path });
        return { name, status: 'fixed', detail: `linked ${config.path} -> ${onPath}` };
      } catch (error) {
        return { name, status: 'unfixable', detail: `found at ${onPath} but linking failed: ${errorMessage(error)}` };
      }
    }

    if (config.installCommand && this.options.runner) {
      return this.reinstall({ name, config });
    }

    return { name, status: 'not-found', detail: `not found in ${config.candidates.join(', ')}` };
  }

  private async reinstall({ name, config }: CheckedTool): Promise<CheckItem> {
    const runner = this.options.runner;
    if (!runner || !config.installCommand) {
      return { name, status: 'not-found', detail: 'no install command configured' };
    }

    logger.info('📦 Attempting tool reinstall', { name });
    try {
      await runner.run(
        { executable: '/bin/sh', args: ['-c', config.installCommand] },
        { timeoutMs: INSTALL_TIMEOUT_MS },
      );
    } catch (error) {
      return { name, status: 'unfixable', detail: `reinstall failed: ${errorMessage(error)}` };
    }

    const located = await this.locate(config.candidates);
    if (!located) {
      return { name, status: 'unfixable', detail: 'reinstall finished but the tool is still missing' };
    }
    const item = await this.ensureExecutable(name, located);
    return item.status === 'found'
      ? { name, status: 'fixed', detail: `reinstalled at ${located}` }
      : item;
  }

  private async ensureExecutable(name: string, file: string): Promise<CheckItem> {
    if (await isExecutable(file)) {
      return { name, status: 'found', detail: `found at ${file}` };
    }
    try {
      await fs.chmod(file, 0o755);
    } catch (error) {
      return { name, status: 'unfixable', detail: `${file} is not executable: ${errorMessage(error)}` };
    }
    return (await isExecutable(file))
      ? { name, status: 'fixed', detail: `made ${file} executable` }
      : { name, status: 'unfixable', detail: `${file} is still not executable` };
  }

  private async checkWritable(dir: string): Promise<CheckItem> {
    try {
      await fs.mkdir(dir, { recursive: true });
      await this.probeWrite(dir);
      return { name: dir, status: 'found', detail: 'writable' };
    } catch (error) {
      logger.warn('Directory not writable, fixing permissions', { dir, error: errorMessage(error) });
    }

    try {
      await fs.chmod(dir, 0o755);
      await this.probeWrite(dir);
      return { name: dir, status: 'fixed', detail: 'permissions repaired' };
    } catch (error) {
      return { name: dir, status: 'unfixable', detail: `not writable: ${errorMessage(error)}` };
    }
  }

  private async probeWrite(dir: string): Promise<void> {
    const probe = path.join(dir, `.write-probe-${randomBytes(6).toString('hex')}`);
    await fs.writeFile(probe, 'probe');
    await fs.unlink(probe);
  }

  private async locate(candidates: string[]): Promise<string | undefined> {
    for (const candidate of candidates) {
      if (isPathLike(candidate)) {
        if (await isFile(candidate)) {
          return candidate;
        }
      } else {
        const found = await this.searchPath(candidate);
        if (found) {
          return found;
        }
      }
    }
    return undefined;
  }

  private async searchPath(command: string): Promise<string | undefined> {
    const searchPath = this.options.searchPath ?? process.env.PATH ?? '';
    for (const dir of searchPath.split(path.delimiter)) {
      if (!dir) continue;
      const file = path.join(dir, command);
      if ((await isFile(file)) && (await isExecutable(file))) {
        return file;
      }
    }
    return undefined;
  }
}
