import { ChildProcess } from 'child_process';
import { logger } from '../utils/logger';
import { sleep } from '../utils/retryHelper';

interface RegistryEntry {
  child: ChildProcess;
  command: string;
  tag?: string;
}

function isAlive(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/**
 * Signal the child's whole process group. Children are spawned detached,
 * so a wrapper script and everything it started share the child's pid as
 * their group id.
 */
export function signalProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch (error) {
    logger.debug('Process group not signalled, signalling the child only', {
      pid: child.pid,
      signal,
      error: error instanceof Error ? error.message : String(error),
    });
    child.kill(signal);
  }
}

/**
 * ProcessRegistry - table of every child process spawned by the runner,
 * keyed by pid, so shutdown and cancellation can reach them.
 * One instance is constructed at startup and shared by reference.
 */
export class ProcessRegistry {
  private readonly entries = new Map<number, RegistryEntry>();

  constructor(private readonly graceMs: number = 5000) {}

  register(child: ChildProcess, command: string, tag?: string): void {
    if (child.pid === undefined) {
      return;
    }
    this.entries.set(child.pid, { child, command, tag });
    logger.debug('Process registered', { pid: child.pid, command, tag });
  }

  unregister(pid: number | undefined): void {
    if (pid !== undefined) {
      this.entries.delete(pid);
    }
  }

  size(): number {
    return this.entries.size;
  }

  pids(): number[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Terminate every process registered under the given tag:
   * SIGTERM, wait the grace period, then SIGKILL
   */
  async terminateTagged(tag: string): Promise<number> {
    const matching = Array.from(this.entries.values()).filter(
      (entry) => entry.tag === tag,
    );
    await this.terminateEntries(matching);
    return matching.length;
  }

  /**
   * Terminate every outstanding child process. Used on shutdown.
   */
  async terminateAll(): Promise<number> {
    const all = Array.from(this.entries.values());
    if (all.length > 0) {
      logger.info('🛑 Terminating child processes', { count: all.length });
    }
    await this.terminateEntries(all);
    return all.length;
  }

  /**
   * Synchronous last-resort kill for crash handlers
   */
  killAllSync(): void {
    for (const { child } of this.entries.values()) {
      if (isAlive(child)) {
        signalProcessGroup(child, 'SIGKILL');
      }
    }
    this.entries.clear();
  }

  private async terminateEntries(entries: RegistryEntry[]): Promise<void> {
    const alive = entries.filter(({ child }) => isAlive(child));
    for (const { child, command } of alive) {
      logger.info('Sending SIGTERM', { pid: child.pid, command });
      signalProcessGroup(child, 'SIGTERM');
    }

    if (alive.length > 0) {
      const deadline = Date.now() + this.graceMs;
      while (Date.now() < deadline && alive.some(({ child }) => isAlive(child))) {
        await sleep(Math.min(100, this.graceMs));
      }
    }

    for (const { child, command } of alive) {
      if (isAlive(child)) {
        logger.warn('Process ignored SIGTERM, sending SIGKILL', {
          pid: child.pid,
          command,
        });
        signalProcessGroup(child, 'SIGKILL');
      }
    }

    for (const { child } of entries) {
      this.unregister(child.pid);
    }
  }
}
