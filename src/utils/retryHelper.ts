import { logger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  /** Wait between attempts, in milliseconds */
  delay?: number;
  operationName?: string;
  /** Errors for which this returns false are rethrown without another attempt */
  shouldRetry?: (error: Error) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Retry helper with a fixed delay between attempts.
 * Runs the operation at most `maxRetries + 1` times and rethrows the last error.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    delay = 1000,
    operationName = 'operation',
    shouldRetry = () => true,
  } = options;
  let lastError: Error | undefined;

  for (let i = 0; i <= maxRetries; i++) {
    try {
      return await operation(i + 1);
    } catch (error) {
      lastError = toError(error);
      if (!shouldRetry(lastError)) {
        logger.warn(`${operationName} failed, not retrying`, { error: lastError.message });
        throw lastError;
      }
      if (i === maxRetries) {
        break;
      }
      const retryCount = i + 1;
      logger.warn(
        `${operationName} failed, retrying in ${delay}ms (retry ${retryCount}/${maxRetries})`,
        {
          error: lastError.message,
        },
      );
      await sleep(delay);
    }
  }

  logger.error(`${operationName} failed after ${maxRetries} retries`, {
    error: lastError?.message,
  });
  throw lastError ?? new Error(`${operationName} failed`);
}

/**
 * Execute operation with fallback
 */
export async function withFallback<T>(
  primary: () => Promise<T>,
  fallback: () => Promise<T>,
  operationName: string = 'operation',
): Promise<T> {
  try {
    return await primary();
  } catch (error) {
    logger.warn(`${operationName} primary failed, using fallback`, {
      error: toError(error).message,
    });
    return await fallback();
  }
}
