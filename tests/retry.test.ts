import { describe, expect, it, vi } from 'vitest';

import { MaxTurnsExceededError, TransientInvocationError } from '../src/core/errors.js';
import { backoffDelayMs, classifyInvocationError, withRetry, type InvocationAttempt } from '../src/core/retry.js';

const policy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 };

describe('withRetry', () => {
  it('retries transient failures with exponential backoff and rethrows the last error', async () => {
    const errors: Error[] = [];
    const attempts: InvocationAttempt[] = [];
    const sleep = vi.fn(async (_ms: number) => {});

    const run = withRetry(
      async (attempt) => {
        const err = new TransientInvocationError('implementer', `connection reset #${attempt}`);
        errors.push(err);
        throw err;
      },
      policy,
      { sleep, onAttempt: (a) => void attempts.push(a) }
    );

    const thrown = await run().then(
      () => null,
      (err: unknown) => err
    );
    expect(errors).toHaveLength(3);
    expect(thrown).toBe(errors[2]);
    expect(attempts.map((a) => a.delayMs)).toEqual([0, 1000, 2000]);
    expect(attempts.map((a) => a.classification)).toEqual(['transient', 'transient', 'transient']);
    expect(attempts[2]?.outcome).toEqual({ ok: false, error: 'TransientInvocationError: connection reset #3' });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('does not retry fatal failures', async () => {
    const op = vi.fn(async () => {
      throw new MaxTurnsExceededError('reviewer', 10);
    });
    const sleep = vi.fn(async (_ms: number) => {});

    await expect(withRetry(op, policy, { sleep })()).rejects.toThrow('reviewer exceeded its turn ceiling of 10');
    expect(op).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('returns the first successful result and records its size', async () => {
    const attempts: InvocationAttempt[] = [];
    let calls = 0;
    const run = withRetry(
      async () => {
        calls++;
        if (calls === 1) throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
        return 'VERDICT: PASS';
      },
      policy,
      { sleep: async () => {}, onAttempt: (a) => void attempts.push(a) }
    );

    await expect(run()).resolves.toBe('VERDICT: PASS');
    expect(attempts).toEqual([
      { attempt: 1, classification: 'transient', delayMs: 0, outcome: { ok: false, error: 'Error: socket hang up' } },
      { attempt: 2, classification: null, delayMs: 1000, outcome: { ok: true, outputChars: 13 } }
    ]);
  });

  it('makes a single attempt when maxAttempts is 1', async () => {
    const op = vi.fn(async () => {
      throw new TransientInvocationError('planner', 'timeout');
    });
    await expect(withRetry(op, { ...policy, maxAttempts: 1 }, { sleep: async () => {} })()).rejects.toThrow('timeout');
    expect(op).toHaveBeenCalledTimes(1);
  });
});

describe('backoffDelayMs', () => {
  it('doubles from the base and caps at the maximum', () => {
    const p = { baseDelayMs: 1000, maxDelayMs: 3000 };
    expect([1, 2, 3, 4].map((k) => backoffDelayMs(k, p))).toEqual([1000, 2000, 3000, 3000]);
  });
});

describe('classifyInvocationError', () => {
  it('treats connectivity, rate limits and server errors as transient', () => {
    expect(classifyInvocationError(Object.assign(new Error('slow down'), { name: 'RateLimitError' }))).toBe('transient');
    expect(classifyInvocationError(Object.assign(new Error('dns'), { code: 'EAI_AGAIN' }))).toBe('transient');
    expect(classifyInvocationError(Object.assign(new Error('undici'), { code: 'UND_ERR_SOCKET' }))).toBe('transient');
    expect(classifyInvocationError(Object.assign(new Error('bad gateway'), { status: 502 }))).toBe('transient');
    expect(classifyInvocationError(Object.assign(new Error('too many'), { status: 429 }))).toBe('transient');
  });

  it('follows the cause chain', () => {
    const cause = Object.assign(new Error('read timed out'), { code: 'ETIMEDOUT' });
    expect(classifyInvocationError(new Error('request failed', { cause }))).toBe('transient');
  });

  it('treats client errors and unknown values as fatal', () => {
    expect(classifyInvocationError(Object.assign(new Error('bad request'), { status: 400 }))).toBe('fatal');
    expect(classifyInvocationError(new Error('model not found'))).toBe('fatal');
    expect(classifyInvocationError('boom')).toBe('fatal');
  });
});
