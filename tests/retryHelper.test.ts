import fc from 'fast-check';
import { retryWithBackoff, withFallback } from '../src/utils/retryHelper';

describe('retryWithBackoff', () => {
  it('retries until success or until the retries run out', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 4 }),
        fc.integer({ min: 0, max: 3 }),
        async (failuresBeforeSuccess, maxRetries) => {
          const attempts: number[] = [];

          const operation = async (attempt: number) => {
            attempts.push(attempt);
            if (attempts.length <= failuresBeforeSuccess) {
              throw new Error('Connection reset');
            }
            return 'success';
          };

          const result = retryWithBackoff(operation, {
            maxRetries,
            delay: 1,
            operationName: 'test-operation',
          });

          if (failuresBeforeSuccess <= maxRetries) {
            await expect(result).resolves.toBe('success');
            expect(attempts).toHaveLength(failuresBeforeSuccess + 1);
          } else {
            await expect(result).rejects.toThrow('Connection reset');
            expect(attempts).toHaveLength(maxRetries + 1);
          }
          expect(attempts).toEqual(attempts.map((_, index) => index + 1));
        },
      ),
      { numRuns: 50 },
    );
  });

  it('stops at an error the caller marks as final', async () => {
    const attempts: number[] = [];

    const result = retryWithBackoff(
      async (attempt) => {
        attempts.push(attempt);
        throw new Error(attempt === 2 ? 'stop here' : 'try again');
      },
      { maxRetries: 5, delay: 1, shouldRetry: (error) => error.message !== 'stop here' },
    );

    await expect(result).rejects.toThrow('stop here');
    expect(attempts).toEqual([1, 2]);
  });

  it('wraps non-Error rejections', async () => {
    await expect(
      retryWithBackoff(
        async () => {
          throw 'plain text';
        },
        { maxRetries: 0 },
      ),
    ).rejects.toThrow('plain text');
  });
});

describe('withFallback', () => {
  it('uses the fallback only when the primary fails', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.boolean(),
        fc.string(),
        fc.string(),
        async (primarySucceeds, primaryResult, fallbackResult) => {
          const primary = async () => {
            if (!primarySucceeds) {
              throw new Error('Primary operation failed');
            }
            return primaryResult;
          };

          const result = await withFallback(
            primary,
            async () => fallbackResult,
            'test-operation',
          );

          expect(result).toBe(primarySucceeds ? primaryResult : fallbackResult);
        },
      ),
      { numRuns: 100 },
    );
  });
});
