/**
 * CredentialedSession - authenticate, fetch and archive one piece of content.
 *
 * Stages run strictly in order and each failure short-circuits the rest:
 *   verify output path -> disk space (warning only) -> login (bounded retry)
 *   -> size estimate (best-effort) -> prepare work dir -> download
 *   -> compress -> cleanup (best-effort)
 *
 * `run` never throws. Callers get the status log collected so far plus a
 * classified error string.
 */

import { logger } from '../utils/logger';
import { retryWithBackoff, sleep, withFallback } from '../utils/retryHelper';
import { FileManager } from '../utils/FileManager';
import { EnvironmentChecker } from '../utils/EnvironmentChecker';
import { InputValidator } from '../utils/InputValidator';
import { Command, CommandRunner, RunOptions } from '../process/ProcessRunner';
import { parseProgress } from '../progress/ProgressParser';
import { describeProgress, TransferEstimator } from '../progress/TransferEstimator';
import { formatBytes } from '../progress/format';
import { Credentials, DownloadRequest, SessionConfig, SessionResult } from '../types';
import {
  buildArchiveCommand,
  buildDownloadCommand,
  buildLoginCommand,
  buildSizeQueryCommand,
  secretsOf,
} from './commands';
import { classifyLogin, parseContentSize } from './outcome';
import {
  AuthChallengeRequiredError,
  CancelledError,
  CompressionFailedError,
  describeError,
  DownloadFailedError,
  InvalidContentReferenceError,
  InvalidCredentialsError,
  LoginError,
  NonZeroExitError,
  TimeoutError,
  UnclassifiedLoginFailureError,
  WorkDirBusyError,
} from './errors';

export interface SessionDependencies {
  runner: CommandRunner;
  fileManager: FileManager;
  environment: EnvironmentChecker;
  clientPath: string;
  archiverPath: string;
  config: SessionConfig;
}

export interface RunContext {
  /** Registry tag for the processes of this run (the queue passes the task id) */
  tag?: string;
  /** Receives every status line as it is produced */
  onStatus?: (line: string) => void;
  /** Aborted when the run has been cancelled; no further stage or login attempt starts */
  signal?: AbortSignal;
}

export type LoginResult =
  | { ok: true; attempts: number }
  | { ok: false; attempts: number; error: LoginError };

function loginErrorFor(output: string): LoginError | undefined {
  const outcome = classifyLogin(output);
  switch (outcome.kind) {
    case 'success':
      return undefined;
    case 'authChallengeRequired':
      return new AuthChallengeRequiredError();
    case 'invalidCredentials':
      return new InvalidCredentialsError();
    case 'unclassified':
      return new UnclassifiedLoginFailureError(outcome.output);
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Options every run in a credentialed session shares: the client may name
 * the user at any stage, so its lines are dropped everywhere
 */
function privacyOptions(credentials: Credentials): RunOptions {
  return {
    redact: credentials.anonymous ? undefined : credentials.username,
    secrets: secretsOf(credentials),
  };
}

function isLoginError(error: unknown): error is LoginError {
  return (
    error instanceof InvalidCredentialsError ||
    error instanceof AuthChallengeRequiredError ||
    error instanceof UnclassifiedLoginFailureError ||
    error instanceof TimeoutError
  );
}

class RunLog {
  readonly lines: string[] = [];

  constructor(private readonly onStatus?: (line: string) => void) {}

  push(line: string | undefined): void {
    if (!line) return;
    this.lines.push(line);
    this.onStatus?.(line);
  }
}

export class CredentialedSession {
  constructor(private readonly deps: SessionDependencies) {}

  /**
   * Run the whole pipeline for one request
   */
  async run(request: DownloadRequest, context: RunContext = {}): Promise<SessionResult> {
    const status = new RunLog(context.onStatus);
    const contentId = InputValidator.extractContentId(request.source);

    logger.info('🚀 Starting download and compression', {
      user: request.credentials.anonymous ? 'anonymous' : 'credentialed',
      contentId,
      outputPath: request.outputPath,
      resume: request.resume,
    });

    if (!contentId) {
      const error = new InvalidContentReferenceError(request.source);
      logger.error(error.message, { source: request.source });
      return { log: status.lines, error: error.userMessage };
    }

    if (!this.deps.fileManager.acquire(contentId)) {
      const error = new WorkDirBusyError(contentId);
      logger.warn(error.message);
      return { log: status.lines, error: error.userMessage };
    }

    try {
      await this.execute(contentId, request, status, context);
      return { log: status.lines };
    } catch (error) {
      const message = describeError(error);
      logger.error('Session failed', { contentId, error: message });
      return { log: status.lines, error: message };
    } finally {
      this.deps.fileManager.release(contentId);
    }
  }

  /**
   * Authenticate with the content client, retrying up to the configured
   * number of attempts with a fixed delay between them. Throws
   * CancelledError once `signal` is aborted.
   */
  async login(
    credentials: Credentials,
    tag?: string,
    signal?: AbortSignal,
  ): Promise<LoginResult> {
    const { config } = this.deps;
    const command = buildLoginCommand(this.deps.clientPath, credentials);
    const options: RunOptions = {
      ...privacyOptions(credentials),
      timeoutMs: config.loginTimeoutMs,
      tag,
    };
    let attempts = 0;

    try {
      await retryWithBackoff(
        async (attempt) => {
          throwIfCancelled(signal);
          attempts = attempt;
          logger.info(`Login attempt ${attempt}`, {
            mode: credentials.anonymous ? 'anonymous' : 'credentialed',
          });
          const output = await this.loginOutput(command, options);
          throwIfCancelled(signal);
          const failure = loginErrorFor(output);
          if (failure) {
            throw failure;
          }
        },
        {
          maxRetries: config.loginAttempts - 1,
          delay: config.loginRetryDelayMs,
          operationName: 'Login',
          shouldRetry: (error) => !(error instanceof CancelledError),
        },
      );
    } catch (error) {
      if (isLoginError(error)) {
        return { ok: false, attempts, error };
      }
      throw error;
    }

    if (config.loginSettleDelayMs > 0) {
      await sleep(config.loginSettleDelayMs);
    }
    logger.info('✅ Login successful', { attempts });
    return { ok: true, attempts };
  }

  /**
   * Best-effort size query. Resolves to undefined on any failure.
   */
  async estimateSize(
    contentId: string,
    options: Omit<RunOptions, 'timeoutMs'> = {},
  ): Promise<number | undefined> {
    logger.info('Estimating content size', { contentId });
    return withFallback(
      async () => {
        const exit = await this.deps.runner.run(
          buildSizeQueryCommand(this.deps.clientPath, contentId),
          { ...options, timeoutMs: this.deps.config.sizeTimeoutMs },
        );
        return parseContentSize(exit.stdout);
      },
      async () => undefined,
      'Size estimation',
    );
  }

  private async loginOutput(
    command: Command,
    options: RunOptions,
  ): Promise<string> {
    try {
      const exit = await this.deps.runner.run(command, options);
      return exit.stdout;
    } catch (error) {
      // The client may exit non-zero on a rejected login; its text still decides the reason
      if (error instanceof NonZeroExitError) {
        return error.stdout || error.stderr;
      }
      throw error;
    }
  }

  private async execute(
    contentId: string,
    request: DownloadRequest,
    status: RunLog,
    context: RunContext,
  ): Promise<void> {
    const { config, environment, fileManager, runner } = this.deps;
    const { tag, signal } = context;
    const stageOptions: RunOptions = { ...privacyOptions(request.credentials), tag };

    status.push(await environment.verifyOutputPath(request.outputPath));

    const free = await environment.freeSpace();
    if (free !== undefined) {
      status.push(`Available Disk Space: ${formatBytes(free)}`);
      if (free < config.minFreeBytes) {
        const warning = `Warning: Less than ${formatBytes(config.minFreeBytes)} available on disk. Download may fail.`;
        logger.warn(warning);
        status.push(warning);
      }
    }

    const login = await this.login(request.credentials, tag, signal);
    if (!login.ok) {
      throw login.error;
    }
    status.push('Login successful.');

    if (config.estimateSize) {
      const size = await this.estimateSize(contentId, stageOptions);
      status.push(
        size === undefined
          ? 'Could not determine content size. Proceeding without size estimation.'
          : `Estimated content size: ${formatBytes(size)}`,
      );
    }

    throwIfCancelled(signal);
    const workDir = await fileManager.prepareWorkDir(contentId, request.resume);

    status.push('Starting download...');
    const download = new TransferEstimator();
    try {
      await runner.run(
        buildDownloadCommand(this.deps.clientPath, workDir, contentId, config.validateDownload),
        stageOptions,
        (line) => status.push(this.describeLine('Downloading', line, download)),
      );
    } catch (error) {
      throw this.stageError(
        error,
        signal,
        (code, stderr) => new DownloadFailedError(code, stderr),
      );
    }
    status.push('Download complete.');

    throwIfCancelled(signal);
    status.push('Starting compression...');
    const compress = new TransferEstimator();
    try {
      await runner.run(
        buildArchiveCommand(
          this.deps.archiverPath,
          config.archiveFormat,
          request.outputPath,
          workDir,
          config.volumeSize,
        ),
        stageOptions,
        (line) => status.push(this.describeLine('Compressing', line, compress)),
      );
    } catch (error) {
      throw this.stageError(
        error,
        signal,
        (code, stderr) => new CompressionFailedError(code, stderr),
      );
    }

    if (!(await fileManager.cleanupWorkDir(contentId))) {
      status.push(`Warning: could not remove ${workDir}`);
    }

    const parts = await fileManager.listArchiveParts(request.outputPath);
    const completion =
      parts.length > 0
        ? `Completed! Files saved as ${parts.join(', ')}`
        : `Completed! Archive written to ${request.outputPath}`;
    logger.info(completion);
    status.push(completion);
  }

  private describeLine(
    phase: string,
    line: string,
    estimator: TransferEstimator,
  ): string | undefined {
    const sample = parseProgress(line);
    if (sample) {
      return describeProgress(phase, estimator.update(sample));
    }
    const text = line.trim();
    return text.length > 0 ? text : undefined;
  }

  private stageError(
    error: unknown,
    signal: AbortSignal | undefined,
    wrap: (code: number, stderr: string) => Error,
  ): unknown {
    if (signal?.aborted) {
      return new CancelledError();
    }
    if (error instanceof NonZeroExitError) {
      return wrap(error.exitCode, error.stderr);
    }
    return error;
  }
}
