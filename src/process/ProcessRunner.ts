/**
 * ProcessRunner - spawns external tools and exposes their stdout as lines
 */

import { spawn, ChildProcess } from 'child_process';
import path from 'path';
import readline from 'readline';
import { logger } from '../utils/logger';
import { NonZeroExitError, TimeoutError } from '../session/errors';
import { ProcessRegistry, signalProcessGroup } from './ProcessRegistry';

export interface Command {
  executable: string;
  args: string[];
}

export interface RunOptions {
  cwd?: string;
  /** Force-kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Literal whose lines are suppressed from captured output (the session username) */
  redact?: string;
  /** Arguments masked as *** wherever the command is logged */
  secrets?: string[];
  /** Registry tag used for targeted cancellation */
  tag?: string;
}

export interface ProcessExit {
  code: number;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** Full stdout text, including suppressed lines. Kept in memory only. */
  stdout: string;
  /** Captured stdout lines, minus suppressed ones */
  output: string[];
  stderr: string;
}

export type LineHandler = (line: string) => void;

/**
 * Seam used by the session so tests can substitute scripted output
 */
export interface CommandRunner {
  run(command: Command, options?: RunOptions, onLine?: LineHandler): Promise<ProcessExit>;
}

export function describeCommand(command: Command, secrets: string[] = []): string {
  const masked = command.args.map((arg) =>
    secrets.some((secret) => secret.length > 0 && arg === secret) ? '***' : arg,
  );
  return [path.basename(command.executable), ...masked].join(' ');
}

interface ProcessStatus {
  code: number;
  signal: NodeJS.Signals | null;
  stderr: string;
}

/**
 * A spawned process. Its stdout lines can be iterated once; the process
 * cannot be replayed.
 */
export class RunningProcess {
  readonly pid: number | undefined;
  /** Resolves true once the process is running, false if it could not be spawned */
  readonly started: Promise<boolean>;
  private readonly status: Promise<ProcessStatus>;
  private readonly captured: string[] = [];
  private stdoutText = '';
  private consumed = false;
  private timedOut = false;
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly child: ChildProcess,
    readonly label: string,
    private readonly options: RunOptions,
    onSettled: () => void,
  ) {
    this.pid = child.pid;
    this.started = new Promise<boolean>((resolve) => {
      child.once('spawn', () => resolve(true));
      child.once('error', () => resolve(false));
    });

    let stderr = '';
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    this.status = new Promise<ProcessStatus>((resolve) => {
      let settled = false;
      const finish = (code: number, signal: NodeJS.Signals | null, extra = '') => {
        if (settled) return;
        settled = true;
        if (this.timer) clearTimeout(this.timer);
        onSettled();
        resolve({ code, signal, stderr: (stderr.trim() || extra).trim() });
      };

      child.on('error', (error) => finish(-1, null, error.message));
      child.on('close', (code, signal) => finish(code ?? -1, signal));
    });

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.timedOut = true;
        logger.warn('⏱️ Process timed out, killing', {
          command: label,
          timeoutMs: options.timeoutMs,
        });
        signalProcessGroup(child, 'SIGKILL');
        // A descendant that left the group could still hold the pipes open
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, options.timeoutMs);
    }
  }

  /**
   * Stdout as a lazy sequence of lines. May only be iterated once.
   */
  async *lines(): AsyncGenerator<string> {
    if (this.consumed) {
      throw new Error(`Output of "${this.label}" has already been consumed`);
    }
    this.consumed = true;

    const stdout = this.child.stdout;
    if (!stdout) {
      return;
    }

    const rl = readline.createInterface({ input: stdout, crlfDelay: Infinity });
    for await (const line of rl) {
      this.stdoutText += `${line}\n`;
      if (this.options.redact && line.includes(this.options.redact)) {
        continue;
      }
      this.captured.push(line);
      yield line;
    }
  }

  /**
   * Wait for the process to end. Drains any unread output first so the
   * child is never blocked on a full pipe.
   */
  async wait(): Promise<ProcessExit> {
    if (!this.consumed) {
      const rest = this.lines();
      let next = await rest.next();
      while (!next.done) {
        next = await rest.next();
      }
    }
    const status = await this.status;
    return {
      ...status,
      timedOut: this.timedOut,
      stdout: this.stdoutText,
      output: [...this.captured],
    };
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): void {
    signalProcessGroup(this.child, signal);
  }
}

export class ProcessRunner implements CommandRunner {
  constructor(private readonly registry: ProcessRegistry) {}

  /**
   * Spawn a command without waiting for it
   */
  start(command: Command, options: RunOptions = {}): RunningProcess {
    const label = describeCommand(command, options.secrets);
    logger.debug('▶️ Spawning process', { command: label, cwd: options.cwd });

    const child = spawn(command.executable, command.args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });
    this.registry.register(child, label, options.tag);

    return new RunningProcess(child, label, options, () =>
      this.registry.unregister(child.pid),
    );
  }

  /**
   * Run a command to completion, handing each captured line to `onLine`.
   * Throws TimeoutError or NonZeroExitError; resolves only on exit code 0.
   */
  async run(
    command: Command,
    options: RunOptions = {},
    onLine?: LineHandler,
  ): Promise<ProcessExit> {
    const proc = this.start(command, options);

    for await (const line of proc.lines()) {
      onLine?.(line);
    }
    const exit = await proc.wait();

    if (exit.timedOut) {
      throw new TimeoutError(proc.label, options.timeoutMs ?? 0);
    }
    if (exit.code !== 0) {
      const stderr = exit.stderr || (exit.signal ? `terminated by ${exit.signal}` : '');
      throw new NonZeroExitError(proc.label, exit.code, stderr, exit.stdout);
    }

    logger.debug('Process finished', { command: proc.label, pid: proc.pid });
    return exit;
  }
}
