/**
 * Error taxonomy for the fetch-and-archive pipeline.
 * Every class carries a stable code and the text shown to the caller.
 */

export abstract class AppError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Text returned to callers as the error part of a SessionResult
   */
  get userMessage(): string {
    return this.message;
  }
}

export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT';

  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super(`${command} timed out after ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class NonZeroExitError extends AppError {
  readonly code = 'NON_ZERO_EXIT';

  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
    readonly stdout: string = '',
  ) {
    super(`${command} exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`);
  }
}

export class InvalidCredentialsError extends AppError {
  readonly code = 'INVALID_CREDENTIALS';

  constructor() {
    super('Invalid username or password.');
  }
}

export class AuthChallengeRequiredError extends AppError {
  readonly code = 'AUTH_CHALLENGE_REQUIRED';

  constructor() {
    super('Guard code required or invalid. Check your email or authenticator.');
  }
}

export class UnclassifiedLoginFailureError extends AppError {
  readonly code = 'UNCLASSIFIED_LOGIN_FAILURE';

  constructor(readonly output: string) {
    super(`Login failed: ${output}`);
  }
}

export class DownloadFailedError extends AppError {
  readonly code = 'DOWNLOAD_FAILED';

  constructor(
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`Download failed (exit code ${exitCode}): ${stderr}`);
  }
}

export class CompressionFailedError extends AppError {
  readonly code = 'COMPRESSION_FAILED';

  constructor(
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`Compression failed (exit code ${exitCode}): ${stderr}`);
  }
}

export class PathNotWritableError extends AppError {
  readonly code = 'PATH_NOT_WRITABLE';

  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Output path not usable: ${reason}`);
  }
}

export class InvalidContentReferenceError extends AppError {
  readonly code = 'INVALID_CONTENT_REFERENCE';

  constructor(readonly input: string) {
    super('Could not extract a content identifier from the given URL or id.');
  }
}

export class WorkDirBusyError extends AppError {
  readonly code = 'WORK_DIR_BUSY';

  constructor(readonly contentId: string) {
    super(`Content ${contentId} is already being processed by another run.`);
  }
}

export class CancelledError extends AppError {
  readonly code = 'CANCELLED';

  constructor() {
    super('Cancelled by request.');
  }
}

export type LoginError =
  | InvalidCredentialsError
  | AuthChallengeRequiredError
  | UnclassifiedLoginFailureError
  | TimeoutError;

/**
 * Render any thrown value as the error text of a SessionResult
 */
export function describeError(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
