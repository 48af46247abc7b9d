import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

/**
 * FileManager - owns the working directories where content is fetched
 * before it is archived, and locates finished archive volumes.
 * Each content id gets its own directory under the work root.
 */
export class FileManager {
  private readonly workRoot: string;
  private readonly busy = new Set<string>();

  constructor(workRoot: string = './game') {
    this.workRoot = path.resolve(workRoot);
  }

  /**
   * Initialize work root (create if doesn't exist)
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.workRoot, { recursive: true });
      logger.info('📁 Work directory initialized', { path: this.workRoot });
    } catch (error) {
      logger.error('Failed to create work directory', { error });
      throw error;
    }
  }

  workDirFor(contentId: string): string {
    return path.join(this.workRoot, contentId);
  }

  /**
   * Claim the work directory of a content id for one run.
   * Returns false when another run holds it.
   */
  acquire(contentId: string): boolean {
    if (this.busy.has(contentId)) {
      return false;
    }
    this.busy.add(contentId);
    return true;
  }

  release(contentId: string): void {
    this.busy.delete(contentId);
  }

  /**
   * Create the work directory. Without resume any partial content is wiped first.
   */
  async prepareWorkDir(contentId: string, resume: boolean): Promise<string> {
    const workDir = this.workDirFor(contentId);
    if (!resume) {
      await fs.rm(workDir, { recursive: true, force: true });
    }
    await fs.mkdir(workDir, { recursive: true });
    logger.info('📁 Work directory ready', { path: workDir, resume });
    return workDir;
  }

  /**
   * Best-effort removal of a work directory. Never throws.
   */
  async cleanupWorkDir(contentId: string): Promise<boolean> {
    const workDir = this.workDirFor(contentId);
    try {
      await fs.rm(workDir, { recursive: true, force: true });
      logger.info('🗑️ Work directory cleaned up', { path: workDir });
      return true;
    } catch (error: unknown) {
      logger.error('Failed to cleanup work directory', {
        path: workDir,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Archive volumes written for an output path: OUTPUT.001, OUTPUT.002, ...
   * in sequence, else OUTPUT itself, else nothing.
   */
  async listArchiveParts(outputPath: string): Promise<string[]> {
    const parts: string[] = [];
    for (let i = 1; ; i++) {
      const part = `${outputPath}.${String(i).padStart(3, '0')}`;
      if (!(await this.fileExists(part))) {
        break;
      }
      parts.push(part);
    }

    if (parts.length === 0 && (await this.fileExists(outputPath))) {
      parts.push(outputPath);
    }
    return parts;
  }
}
