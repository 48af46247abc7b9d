import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { DownloadTask, TaskRecord, TaskStatus } from '../types';

const TaskRecordSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9-]+$/),
  source: z.string().min(1),
  outputPath: z.string().min(1),
  resume: z.boolean(),
  createdAt: z.string().datetime(),
  status: z.enum(['queued', 'running', 'completed', 'failed']),
});

/**
 * TaskStore - one JSON file per task in the queue directory.
 * Records are built field by field from the task so credentials are never written.
 */
export class TaskStore {
  constructor(private readonly dir: string) {}

  async initialize(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    logger.info('📁 Queue directory initialized', { path: this.dir });
  }

  static toRecord(task: DownloadTask): TaskRecord {
    return {
      id: task.id,
      source: task.source,
      outputPath: task.outputPath,
      resume: task.resume,
      createdAt: task.createdAt.toISOString(),
      status: task.status,
    };
  }

  async save(task: DownloadTask): Promise<void> {
    await this.write(TaskStore.toRecord(task));
  }

  /**
   * Rewrite only the status of an existing record
   */
  async updateStatus(id: string, status: TaskStatus): Promise<void> {
    const record = await this.read(id);
    if (!record) {
      logger.warn('Task record missing, status not persisted', { id, status });
      return;
    }
    await this.write({ ...record, status });
  }

  async read(id: string): Promise<TaskRecord | undefined> {
    try {
      const raw = await fs.readFile(this.fileFor(id), 'utf-8');
      return TaskRecordSchema.parse(JSON.parse(raw));
    } catch (error) {
      logger.warn('Could not read task record', {
        id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  /**
   * Every valid record in the directory; unreadable files are skipped
   */
  async loadAll(): Promise<TaskRecord[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      logger.warn('Queue directory not readable', {
        path: this.dir,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const records: TaskRecord[] = [];
    for (const file of files.filter((name) => name.endsWith('.json'))) {
      const record = await this.read(path.basename(file, '.json'));
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  private fileFor(id: string): string {
    return path.join(this.dir, `${id}.json`);
  }

  private async write(record: TaskRecord): Promise<void> {
    const file = this.fileFor(record.id);
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(record, null, 2), 'utf-8');
    await fs.rename(tmp, file);
  }
}
