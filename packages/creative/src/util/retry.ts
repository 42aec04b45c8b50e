import { setTimeout as delay } from 'node:timers/promises';
import pRetry, { AbortError } from 'p-retry';
import { z } from 'zod';
import { createScopedLogger, type Logger } from '@adforge/shared/logger';
import { errorMessage } from '@adforge/shared/utils';
import { FatalModelError, RateLimitedError, RetryExhaustedError } from '../errors.js';
import type { ModelOutcome } from '../providers/base.js';

export const BackoffPolicySchema = z
  .object({
    strategy: z.enum(['fixed', 'exponential']),
    baseDelayMs: z.number().int().min(0),
    factor: z.number().min(1).default(2),
    maxDelayMs: z.number().int().min(0),
    maxAttempts: z.number().int().min(1).max(20),
    honorRetryAfter: z.boolean().default(true)
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs']
  });

export type BackoffPolicy = z.infer<typeof BackoffPolicySchema>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Wait before retry number `retryNumber` (1-based). A server hint replaces the
 * computed value when the policy honours it; the cap always applies.
 */
export function computeDelay(policy: BackoffPolicy, retryNumber: number, retryAfterMs?: number): number {
  const computed =
    policy.strategy === 'fixed'
      ? policy.baseDelayMs
      : policy.baseDelayMs * policy.factor ** Math.max(0, retryNumber - 1);
  const wait = policy.honorRetryAfter && retryAfterMs !== undefined ? retryAfterMs : computed;
  return Math.min(Math.max(0, Math.round(wait)), policy.maxDelayMs);
}

export interface RetryOptions {
  policy: BackoffPolicy;
  label: string;
  sleep?: Sleep;
  signal?: AbortSignal;
  logger?: Logger;
}

const retryLogger = createScopedLogger('retry');

const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new Error('The operation was aborted');

/**
 * Runs `invoke` until it succeeds, fails fatally or runs out of attempts.
 * p-retry does the attempt accounting with zero built-in delay; the wait goes
 * through `sleep` so callers (and tests) control time. An aborted signal stops
 * before the next request is sent.
 */
export async function withRetry<T>(
  invoke: (attempt: number) => Promise<ModelOutcome<T>>,
  options: RetryOptions
): Promise<T> {
  const { policy, label, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  const log = options.logger ?? retryLogger;
  let attempts = 0;

  signal?.throwIfAborted();

  try {
    return await pRetry(
      async (attemptNumber) => {
        attempts = attemptNumber;
        if (signal?.aborted) {
          throw new AbortError(abortReason(signal));
        }
        let outcome: ModelOutcome<T>;
        try {
          outcome = await invoke(attemptNumber);
        } catch (error) {
          throw new AbortError(error instanceof Error ? error : new Error(errorMessage(error)));
        }

        switch (outcome.kind) {
          case 'success':
            return outcome.output;
          case 'rate_limited':
            throw new RateLimitedError(outcome.message, outcome.retryAfterMs);
          case 'fatal':
            throw new AbortError(new FatalModelError(outcome.message, outcome.category, outcome.status));
        }
      },
      {
        retries: policy.maxAttempts - 1,
        factor: 1,
        minTimeout: 0,
        maxTimeout: 0,
        randomize: false,
        signal,
        onFailedAttempt: async (error) => {
          if (!(error instanceof RateLimitedError) || error.retriesLeft === 0) return;
          const waitMs = computeDelay(policy, error.attemptNumber, error.retryAfterMs);
          log.warn(
            { label, attempt: error.attemptNumber, maxAttempts: policy.maxAttempts, waitMs, error: error.message },
            'Rate limited, waiting before retry'
          );
          await sleep(waitMs, signal);
        }
      }
    );
  } catch (error) {
    if (error instanceof RateLimitedError) {
      log.error({ label, attempts }, 'Retry budget exhausted');
      throw new RetryExhaustedError(label, attempts, error);
    }
    throw error;
  }
}
