import { CancelledError, TimeoutError } from './errors.js';

export interface RetryOptions {
  /** Retry attempts after the first call */
  maxRetries: number;
  /** Delay before the first retry; doubles on each further retry */
  initialDelayMs: number;
  maxDelayMs?: number;
  /** Stops the wait between attempts */
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface TimeoutOptions {
  /** Used in the timeout message, e.g. "Oracle call" */
  label: string;
  /** No timeout when omitted */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Reject as soon as `signal` aborts (default true) */
  abandonOnAbort?: boolean;
}

function abortReason(signal: AbortSignal, label: string): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  const detail =
    reason instanceof Error
      ? reason.message
      : typeof reason === 'string'
        ? reason
        : undefined;
  return new CancelledError(`${label} cancelled${detail ? `: ${detail}` : ''}`);
}

/**
 * Sleep that wakes early (rejecting) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(() => resolve(), ms);
      return;
    }
    if (signal.aborted) {
      reject(abortReason(signal, 'Wait'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal, 'Wait'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an operation with a deadline.
 *
 * The operation receives a signal that aborts on timeout or when the
 * outer signal aborts. On timeout the returned promise rejects at once,
 * even if the operation ignores its signal. On outer abort it rejects at
 * once only when `abandonOnAbort` is set; otherwise the operation is left
 * to honour its signal and settle by itself.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T> | T,
  options: TimeoutOptions
): Promise<T> {
  const { label, timeoutMs, signal, abandonOnAbort = true } = options;
  const controller = new AbortController();

  if (signal?.aborted) {
    return Promise.reject(abortReason(signal, label));
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  return new Promise<T>((resolve, reject) => {
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        const error = new TimeoutError(label, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }

    if (signal) {
      onParentAbort = () => {
        const reason = abortReason(signal, label);
        controller.abort(reason);
        if (abandonOnAbort) {
          reject(reason);
        }
      };
      signal.addEventListener('abort', onParentAbort, { once: true });
    }

    Promise.resolve()
      .then(() => operation(controller.signal))
      .then(resolve, reject);
  }).finally(() => {
    clearTimeout(timer);
    if (signal && onParentAbort) {
      signal.removeEventListener('abort', onParentAbort);
    }
  });
}

/**
 * Execute a function with retry logic and exponential backoff.
 * Cancellation is never retried.
 *
 * @throws the last error once all retries fail
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxRetries,
    initialDelayMs,
    maxDelayMs = 30000,
    signal,
    isRetryable = () => true,
    onRetry,
  } = options;

  let attempt = 0;

  for (;;) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      if (
        attempt >= maxRetries ||
        error instanceof CancelledError ||
        signal?.aborted ||
        !isRetryable(error)
      ) {
        throw error;
      }

      const delayMs = Math.min(initialDelayMs * 2 ** attempt, maxDelayMs);
      onRetry?.(error, attempt + 1, delayMs);

      await sleep(delayMs, signal);
      attempt++;
    }
  }
}
