/**
 * Timeout Helpers
 *
 * Every remote call in the pipeline runs under a deadline. The operation
 * receives an AbortSignal that fires when the deadline passes or when the
 * caller's own signal aborts, so the underlying fetch is torn down instead
 * of left running.
 */

/**
 * Raised when an operation exceeds its deadline.
 */
export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface TimeoutOptions {
  /** Deadline in milliseconds */
  timeoutMs: number;
  /** Used in the TimeoutError message */
  label: string;
  /** Caller cancellation, linked to the operation's signal */
  signal?: AbortSignal;
}

/**
 * Run an abortable operation under a deadline.
 *
 * @throws TimeoutError when the deadline passes first
 * @throws the caller signal's reason when the caller aborts first
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, label, signal: parent } = options;
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  // The race may settle before the timer fires; keep that rejection handled.
  timeoutPromise.catch(() => {});

  const abortPromise = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason);
      return;
    }
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });
  abortPromise.catch(() => {});

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise, abortPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * True when the error came from a deadline rather than a failure.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}
