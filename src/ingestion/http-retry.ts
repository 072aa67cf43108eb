import { HttpRetryPolicy } from '../config';
import { describeError, UpstreamHttpError } from '../errors';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export function computeRetryDelayMs(retryCount: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** Math.max(0, retryCount);
}

/**
 * Runs `request` up to `policy.maxAttempts` times. Only retryable
 * UpstreamHttpErrors (network failures, 5xx) are retried; anything else is
 * thrown on the first failure.
 */
export async function withRetry<T>(
  request: () => Promise<T>,
  policy: Pick<HttpRetryPolicy, 'maxAttempts' | 'baseDelayMs'>,
  sleep: Sleep = defaultSleep
): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await request();
    } catch (error) {
      attempt += 1;
      const retryable = error instanceof UpstreamHttpError && error.retryable;
      if (!retryable || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delay = computeRetryDelayMs(attempt - 1, policy.baseDelayMs);
      console.warn('[Upstream Retry]', { attempt, delayMs: delay, error: describeError(error) });
      await sleep(delay);
    }
  }
}
