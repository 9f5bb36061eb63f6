import { errorMessage } from '../errors';
import { silentLogger, type Logger } from './logger';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the exponential delay added at random, 0 disables jitter. */
  jitter: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryDeps {
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
}

/** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), jittered, capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const baseDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * policy.jitter * baseDelay;
  return Math.min(baseDelay + jitter, policy.maxDelayMs);
}

// Exponential backoff with jitter for rate limits and transient failures
export async function withRetryAndBackoff<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  context: string = 'operation',
  deps: RetryDeps = {}
): Promise<T> {
  const { sleep: wait = sleep, random = Math.random, logger = silentLogger } = deps;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 1) {
        logger.info(`${context} succeeded after ${attempt - 1} retries`);
      }
      return result;
    } catch (error) {
      if (!policy.isRetryable(error) || attempt >= policy.maxAttempts) {
        logger.warn(`${context} failed after ${attempt} attempt(s): ${errorMessage(error)}`);
        throw error;
      }

      const delay = backoffDelay(policy, attempt, random);
      logger.warn(`${context} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delay.toFixed(0)}ms...`);
      await wait(delay);
    }
  }
}
