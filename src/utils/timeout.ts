/**
 * Timeout helper for external calls.
 *
 * @module utils/timeout
 */

/**
 * Raised when a call outlives its deadline.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a timer, clearing the timer either way so no
 * handle is left behind to keep the Lambda event loop alive.
 *
 * @param promise - The promise to race against the timeout
 * @param ms - Timeout in milliseconds
 * @param controller - Aborted with the TimeoutError when the timer fires
 * @returns The result of the promise if it settles first
 * @throws TimeoutError if the timer fires first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  controller?: AbortController
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(ms);
      controller?.abort(error);
      reject(error);
    }, ms);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
