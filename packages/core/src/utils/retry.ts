import { TimeoutError } from './timeout';

export interface RetryIdempotentInput<T> {
  run: () => Promise<T>;
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (event: { attempt: number; delayMs: number; error: unknown }) => void;
}

const TRANSIENT_MARKERS = ['timeout', 'temporar', 'network', 'econnreset', 'econnrefused', '429', '502', '503', '504'];

export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => message.includes(marker));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(baseDelayMs: number, jitterMs: number, attempt: number): number {
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * (jitterMs + 1)) : 0;
  return baseDelayMs * 2 ** attempt + jitter;
}

/**
 * Retries `run` with exponential backoff while the failure looks transient.
 * Only for calls that are safe to repeat.
 */
export async function retryIdempotent<T>(input: RetryIdempotentInput<T>): Promise<T> {
  const isRetryable = input.isRetryable ?? isTransientError;
  let attempt = 0;

  for (;;) {
    try {
      return await input.run();
    } catch (error) {
      if (attempt >= input.maxRetries || !isRetryable(error)) {
        throw error;
      }
      const delayMs = backoffMs(input.baseDelayMs, input.jitterMs, attempt);
      input.onRetry?.({ attempt: attempt + 1, delayMs, error });
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
