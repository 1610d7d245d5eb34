export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with a TimeoutError when the deadline passes first.
 */
const withTimeout = <T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
) =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const i = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    fn(controller.signal)
      .then(resolve, reject)
      .finally(() => clearTimeout(i));
  });

export default withTimeout;
