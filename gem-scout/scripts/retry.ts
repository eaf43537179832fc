export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  retryOn: (err: unknown) => boolean;
  onRetry?: (meta: { attempt: number; error: unknown; delayMs: number }) => void;
  onGiveup?: (meta: { attempt: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(base: number, max: number, attempt: number, jitter: boolean): number {
  const raw = Math.min(max, base * Math.pow(2, attempt));
  if (!jitter) return raw;
  const delta = Math.floor(raw * 0.2);
  return raw - delta + Math.floor(Math.random() * (2 * delta + 1));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const wait = opts.sleep ?? sleep;
  let lastError: unknown;
  for (let attempt = 0; attempt <= opts.retries; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= opts.retries || !opts.retryOn(error) || opts.signal?.aborted) {
        opts.onGiveup?.({ attempt: attempt + 1, error });
        throw error;
      }
      const delayMs = backoffDelay(opts.baseDelayMs, opts.maxDelayMs, attempt, opts.jitter);
      opts.onRetry?.({ attempt: attempt + 1, error, delayMs });
      await wait(delayMs);
    }
  }
  throw lastError;
}
