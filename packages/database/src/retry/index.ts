export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly retryable = true;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * True for errors that carry `retryable: true` (all of the project's service errors do)
 * and for timeouts.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  return (
    typeof error === 'object' &&
    error !== null &&
    'retryable' in error &&
    error.retryable === true
  );
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  /** Decides whether a failure is worth another attempt. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
  label?: string;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    factor = 2,
    shouldRetry = () => true,
    signal,
    label = 'Operation',
    onRetry,
    sleep: wait = sleep,
  } = options;

  let attempt = 0;
  let delay = initialDelayMs;

  while (true) {
    if (signal?.aborted) {
      throw new AbortError();
    }

    try {
      return await operation(attempt + 1);
    } catch (error) {
      attempt++;
      if (error instanceof AbortError || attempt > maxRetries || !shouldRetry(error)) {
        throw error;
      }

      console.warn(
        `${label} failed (attempt ${attempt}/${maxRetries}). Retrying in ${delay}ms...`,
        error instanceof Error ? error.message : String(error)
      );
      onRetry?.({ attempt, delayMs: delay, error });

      await wait(delay, signal);

      delay = Math.min(delay * factor, maxDelayMs);
    }
  }
}

/**
 * Run an operation with a deadline. The operation receives a signal that fires on
 * timeout or when the parent signal aborts; the returned promise rejects with
 * TimeoutError or AbortError even if the operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new AbortError();
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort = () => {};

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    onParentAbort = () => {
      const error = new AbortError();
      controller.abort(error);
      reject(error);
    };
  });
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
