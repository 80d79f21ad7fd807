import { GraphApiError, GraphTransportError } from './errors';

/**
 * Retry wrapper for Graph calls. Exponential backoff with jitter, or the
 * server's Retry-After when it sends one.
 */

const DEFAULT_MAX_RETRIES = 3;
const INITIAL_DELAY_MS = 1000;
const MAX_DELAY_MS = 15000;

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof GraphApiError) {
    return err.status === 429 || err.status >= 500;
  }
  if (err instanceof GraphTransportError) {
    return err.kind !== 'decode';
  }
  return false;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function jitter(ms: number): number {
  return Math.floor(ms * (0.5 + Math.random() * 0.5));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const initialDelay = options.initialDelayMs ?? INITIAL_DELAY_MS;
  const maxDelay = options.maxDelayMs ?? MAX_DELAY_MS;
  const sleep = options.sleep ?? delay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isRetryable(err)) throw err;
      const retryAfter = err instanceof GraphApiError ? err.retryAfterMs : undefined;
      const wait = retryAfter ?? jitter(Math.min(initialDelay * Math.pow(2, attempt), maxDelay));
      options.onRetry?.(err, attempt + 1, wait);
      await sleep(wait);
    }
  }
}
