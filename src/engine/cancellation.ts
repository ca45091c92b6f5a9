/**
 * Cancellation plumbing for session steps.
 */

/** Rejection of a step whose session was canceled or timed out. */
export class CancellationError extends Error {
  constructor(message = 'Step canceled') {
    super(message);
    this.name = 'CancellationError';
  }
}

/**
 * Run `work` but stop waiting as soon as `signal` fires. The work itself is
 * not interrupted; collaborators are handed the same signal for that.
 */
export function raceAbort<T>(work: () => Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new CancellationError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancellationError());
    signal.addEventListener('abort', onAbort, { once: true });
    Promise.resolve()
      .then(work)
      .then(
        (result) => {
          signal.removeEventListener('abort', onAbort);
          resolve(result);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
  });
}
