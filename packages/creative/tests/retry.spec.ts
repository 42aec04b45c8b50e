import { describe, expect, it, vi } from 'vitest';
import { FatalModelError, RetryExhaustedError } from '../src/errors.js';
import { fatal, success, type ModelOutcome } from '../src/providers/base.js';
import { computeDelay, withRetry, type BackoffPolicy, type Sleep } from '../src/util/retry.js';

const fixed: BackoffPolicy = {
  strategy: 'fixed',
  baseDelayMs: 30_000,
  factor: 2,
  maxDelayMs: 60_000,
  maxAttempts: 5,
  honorRetryAfter: true
};

const rateLimited = (retryAfterMs?: number): ModelOutcome<string> => ({
  kind: 'rate_limited',
  message: '429 Too Many Requests',
  retryAfterMs
});

/** Returns the queued outcomes in order and fails loudly when the script runs out. */
const scripted = (outcomes: ModelOutcome<string>[]) => {
  const queue = [...outcomes];
  return vi.fn(async (_attempt: number): Promise<ModelOutcome<string>> => {
    const next = queue.shift();
    if (!next) throw new Error('script exhausted');
    return next;
  });
};

const noSleep = () => vi.fn<Sleep>().mockResolvedValue(undefined);

describe('computeDelay', () => {
  it('returns the base delay for the fixed strategy', () => {
    expect(computeDelay(fixed, 1)).toBe(30_000);
    expect(computeDelay(fixed, 4)).toBe(30_000);
  });

  it('grows exponentially and caps at maxDelayMs', () => {
    const policy: BackoffPolicy = { ...fixed, strategy: 'exponential', baseDelayMs: 1_000, maxDelayMs: 5_000 };
    expect([1, 2, 3, 4, 5].map((retry) => computeDelay(policy, retry))).toEqual([1_000, 2_000, 4_000, 5_000, 5_000]);
  });

  it('prefers a retry-after hint but still applies the cap', () => {
    expect(computeDelay(fixed, 1, 12_000)).toBe(12_000);
    expect(computeDelay(fixed, 1, 90_000)).toBe(60_000);
    expect(computeDelay({ ...fixed, honorRetryAfter: false }, 1, 12_000)).toBe(30_000);
  });
});

describe('withRetry', () => {
  it('sleeps once per rate limit with the configured fixed delay, then returns the output', async () => {
    const invoke = scripted([rateLimited(), rateLimited(), rateLimited(), success('done')]);
    const sleep = noSleep();

    await expect(withRetry(invoke, { policy: fixed, label: 'research', sleep })).resolves.toBe('done');

    expect(invoke).toHaveBeenCalledTimes(4);
    expect(invoke.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3, 4]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([30_000, 30_000, 30_000]);
  });

  it('returns immediately on first success without sleeping', async () => {
    const sleep = noSleep();
    await expect(withRetry(scripted([success('ok')]), { policy: fixed, label: 'x', sleep })).resolves.toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('follows the exponential schedule', async () => {
    const policy: BackoffPolicy = { ...fixed, strategy: 'exponential', baseDelayMs: 1_000, maxDelayMs: 3_000, maxAttempts: 6 };
    const sleep = noSleep();
    const invoke = scripted([rateLimited(), rateLimited(), rateLimited(), rateLimited(), success('late')]);

    await expect(withRetry(invoke, { policy, label: 'carousel', sleep })).resolves.toBe('late');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1_000, 2_000, 3_000, 3_000]);
  });

  it('uses the server hint for the wait', async () => {
    const sleep = noSleep();
    await withRetry(scripted([rateLimited(7_000), success('ok')]), { policy: fixed, label: 'x', sleep });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([7_000]);
  });

  it('fails fast on a fatal outcome without sleeping', async () => {
    const invoke = scripted([fatal('auth', 'invalid api key', 401), success('never')]);
    const sleep = noSleep();

    const error = await withRetry(invoke, { policy: fixed, label: 'research', sleep }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FatalModelError);
    expect(error).toMatchObject({ category: 'auth', statusCode: 401, message: 'invalid api key' });
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxAttempts with RetryExhaustedError', async () => {
    const policy: BackoffPolicy = { ...fixed, maxAttempts: 3 };
    const invoke = scripted([rateLimited(), rateLimited(), rateLimited(), success('too late')]);
    const sleep = noSleep();

    const error = await withRetry(invoke, { policy, label: 'thumbnail-prompts', sleep }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, code: 'RETRIES_EXHAUSTED' });
    expect(invoke).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry when the invoker itself throws', async () => {
    const invoke = vi.fn(async (): Promise<ModelOutcome<string>> => {
      throw new Error('bad request body');
    });
    const sleep = noSleep();

    await expect(withRetry(invoke, { policy: fixed, label: 'x', sleep })).rejects.toThrow('bad request body');
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops when the signal aborts during a wait', async () => {
    const controller = new AbortController();
    const invoke = scripted([rateLimited(), success('never')]);
    const sleep = vi.fn<Sleep>(async () => {
      controller.abort(new Error('interrupted'));
    });

    await expect(
      withRetry(invoke, { policy: fixed, label: 'x', sleep, signal: controller.signal })
    ).rejects.toThrow('interrupted');
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('sends nothing when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('interrupted'));
    const invoke = scripted([success('never')]);

    await expect(
      withRetry(invoke, { policy: fixed, label: 'x', sleep: noSleep(), signal: controller.signal })
    ).rejects.toThrow('interrupted');
    expect(invoke).not.toHaveBeenCalled();
  });
});
