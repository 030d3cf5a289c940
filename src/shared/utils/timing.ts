/**
 * Timing utilities
 */

/**
 * Get high-resolution time in nanoseconds
 */
export function getHighResolutionTime(): number {
  return Number(process.hrtime.bigint());
}

/**
 * Calculate processing time in milliseconds from start time
 */
export function calculateProcessingTime(startTime: number): number {
  const endTime = getHighResolutionTime();
  return (endTime - startTime) / 1_000_000;
}

/**
 * Measure execution time of a function in milliseconds
 */
export async function measureExecutionTime<T>(fn: () => Promise<T>): Promise<{ result: T; duration: number }> {
  const startTime = getHighResolutionTime();
  const result = await fn();
  const duration = calculateProcessingTime(startTime);
  return { result, duration };
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Runs `fn` with an abort signal that fires after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes first.
 */
export function runWithTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
