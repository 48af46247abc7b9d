import { v4 as uuidv4 } from 'uuid';
import { logger, logError } from '../utils/logger';
import { ProcessRegistry } from '../process/ProcessRegistry';
import { RunContext } from '../session/CredentialedSession';
import { StatusLog } from './StatusLog';
import { TaskStore } from './TaskStore';
import {
  ANONYMOUS,
  DownloadRequest,
  DownloadTask,
  SessionResult,
  TaskRecord,
  TaskStatus,
} from '../types';

/**
 * What the worker calls for each task. CredentialedSession satisfies it.
 */
export interface TaskExecutor {
  run(request: DownloadRequest, context?: RunContext): Promise<SessionResult>;
}

/**
 * TaskQueue - FIFO of download requests drained by a single worker.
 * Each task is persisted (without credentials) when queued and its status
 * is rewritten when it finishes, so unfinished work survives a restart.
 */
export class TaskQueue {
  private readonly queue: DownloadTask[] = [];
  private active?: DownloadTask;
  private cancellation?: AbortController;
  private worker: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly executor: TaskExecutor,
    private readonly store: TaskStore,
    private readonly registry: ProcessRegistry,
    private readonly statusLog: StatusLog = new StatusLog(100),
  ) {
    logger.info('🎯 TaskQueue initialized');
  }

  /**
   * Begin consuming tasks
   */
  start(): void {
    this.running = true;
    this.wake();
  }

  /**
   * Stop taking new tasks. The running task is left to finish or be killed
   * through the process registry; queued tasks stay persisted.
   */
  stop(): void {
    if (this.queue.length > 0 || this.active) {
      logger.info('🛑 Stopping TaskQueue', {
        queued: this.queue.length,
        running: this.active?.id,
      });
    }
    this.running = false;
  }

  /**
   * Add a request to the end of the queue. Never rejects: a task that could
   * not be persisted is still queued, it just will not survive a restart.
   */
  async enqueue(request: DownloadRequest): Promise<DownloadTask> {
    const task: DownloadTask = {
      ...request,
      id: uuidv4(),
      createdAt: new Date(),
      status: 'queued',
    };

    try {
      await this.store.save(task);
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.statusLog.append(`Task ${task.id} could not be saved to disk: ${err.message}`);
      logError(err, { taskId: task.id, operation: 'persist task' });
    }

    this.queue.push(task);
    this.statusLog.append(
      `Task ${task.id} added to queue for ${task.source}. Queue size: ${this.queue.length}`,
    );
    logger.info('📥 Task added to queue', {
      taskId: task.id,
      source: task.source,
      position: this.queue.length,
    });

    this.wake();
    return task;
  }

  /**
   * Re-enqueue unfinished tasks persisted by a previous run.
   * Credentials were never stored, so restored tasks run anonymously.
   */
  async restore(): Promise<number> {
    const records = await this.store.loadAll();
    const unfinished = records
      .filter((record) => record.status !== 'completed' && record.status !== 'failed')
      .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));

    let restored = 0;
    for (const record of unfinished) {
      if (this.has(record.id)) {
        continue;
      }
      this.queue.push({
        id: record.id,
        source: record.source,
        outputPath: record.outputPath,
        resume: record.resume,
        createdAt: new Date(record.createdAt),
        status: 'queued',
        credentials: ANONYMOUS,
      });
      restored++;
    }

    if (restored > 0) {
      this.statusLog.append(`Restored ${restored} task(s) from a previous run`);
      logger.info('♻️ Restored queued tasks', { count: restored });
      this.wake();
    }
    return restored;
  }

  /**
   * Cancel the running task, if any: no further stage of it starts and its
   * external processes are terminated
   */
  async cancelCurrent(): Promise<boolean> {
    if (!this.active) {
      return false;
    }
    const taskId = this.active.id;
    this.cancellation?.abort();
    const killed = await this.registry.terminateTagged(taskId);
    this.statusLog.append(`Cancellation requested for task ${taskId}`);
    logger.info('Cancelled running task', { taskId, processes: killed });
    return true;
  }

  /**
   * Resolves once the worker has nothing left to do
   */
  async onIdle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  getStatus(): string {
    return this.statusLog.toString();
  }

  statusEntries(): string[] {
    return this.statusLog.list();
  }

  pending(): TaskRecord[] {
    return this.queue.map((task) => TaskStore.toRecord(task));
  }

  current(): TaskRecord | undefined {
    return this.active ? TaskStore.toRecord(this.active) : undefined;
  }

  size(): number {
    return this.queue.length;
  }

  private has(id: string): boolean {
    return this.active?.id === id || this.queue.some((task) => task.id === id);
  }

  private wake(): void {
    if (!this.running || this.worker || this.queue.length === 0) {
      return;
    }
    this.worker = this.drain().finally(() => {
      this.worker = null;
      // A task may have been queued while the loop was exiting
      this.wake();
    });
  }

  private async drain(): Promise<void> {
    while (this.running) {
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      await this.process(task);
    }
  }

  private async process(task: DownloadTask): Promise<void> {
    this.active = task;
    const cancellation = new AbortController();
    this.cancellation = cancellation;
    task.status = 'running';
    this.statusLog.append(`Processing download for ${task.source} (task ${task.id})`);
    logger.info('▶️ Processing task', { taskId: task.id, queued: this.queue.length });

    let status: TaskStatus;
    try {
      const result = await this.executor.run(task, {
        tag: task.id,
        signal: cancellation.signal,
      });
      status = result.error ? 'failed' : 'completed';
      this.statusLog.append(
        result.error
          ? `Failed download for ${task.source} (task ${task.id}). Error: ${result.error}`
          : `Completed download for ${task.source} (task ${task.id})`,
      );
    } catch (error: unknown) {
      status = 'failed';
      const err = error instanceof Error ? error : new Error(String(error));
      this.statusLog.append(
        `Failed download for ${task.source} (task ${task.id}). Error: ${err.message}`,
      );
      logError(err, { taskId: task.id });
    }

    task.status = status;
    try {
      await this.store.updateStatus(task.id, status);
    } catch (error: unknown) {
      logger.error('Failed to persist task status', {
        taskId: task.id,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.active = undefined;
      this.cancellation = undefined;
    }
  }
}
