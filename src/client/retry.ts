import { getLogger } from '../logger.js';
import { type ErrorKind, isApiError } from './errors.js';

const logger = getLogger('retry');

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  retryableKinds: ReadonlySet<ErrorKind>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffFactor: 2,
  retryableKinds: new Set<ErrorKind>(['SERVER_ERROR', 'RATE_LIMIT', 'NETWORK']),
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WithRetryOptions extends Partial<RetryOptions> {
  signal?: AbortSignal;
  sleep?: Sleep;
}

/**
 * sleep — resolves after `ms`, or rejects with the signal's reason as soon
 * as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * nextDelay — pure backoff step: delay * factor, capped at maxDelayMs.
 */
export function nextDelay(delayMs: number, options: Pick<RetryOptions, 'backoffFactor' | 'maxDelayMs'>): number {
  return Math.min(delayMs * options.backoffFactor, options.maxDelayMs);
}

/**
 * withRetry — runs `operation` under bounded exponential backoff.
 *
 * Only ApiErrors whose kind is in `retryableKinds` are retried; anything
 * else (other kinds, cancellation, programming errors) is rethrown at once.
 * maxRetries=0 means a single attempt. When the budget runs out the last
 * error is rethrown unchanged.
 *
 * `operation` receives the zero-based attempt number.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: WithRetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const signal = options.signal;
  const config: RetryOptions = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs,
    backoffFactor: options.backoffFactor ?? DEFAULT_RETRY_OPTIONS.backoffFactor,
    retryableKinds: options.retryableKinds ?? DEFAULT_RETRY_OPTIONS.retryableKinds,
  };

  let attempt = 0;
  let delay = config.baseDelayMs;

  while (true) {
    signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isApiError(error) || !config.retryableKinds.has(error.kind)) {
        throw error;
      }
      if (attempt >= config.maxRetries) {
        if (config.maxRetries > 0) {
          logger.warn({ kind: error.kind, attempts: attempt + 1 }, `All ${config.maxRetries} retry attempts exhausted`);
        }
        throw error;
      }

      logger.warn(
        { kind: error.kind, statusCode: error.statusCode, attempt: attempt + 1, delayMs: delay },
        `Attempt ${attempt + 1} failed: ${error.toString()}. Retrying in ${delay}ms`,
      );
      await wait(delay, signal);
      delay = nextDelay(delay, config);
      attempt++;
    }
  }
}
