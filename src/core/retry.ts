import { FatalInvocationError, MaxTurnsExceededError, TransientInvocationError, errorMessage } from './errors.js';
import { errorCode } from '../utils/fs.js';

export type ErrorClassification = 'transient' | 'fatal';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface InvocationAttempt {
  attempt: number;
  classification: ErrorClassification | null;
  /** Backoff slept before this attempt started; 0 for the first attempt. */
  delayMs: number;
  outcome: { ok: true; outputChars: number } | { ok: false; error: string };
}

export interface RetryHooks {
  /** Awaited for every attempt before the wrapped call resolves or rejects. */
  onAttempt?: (attempt: InvocationAttempt) => void | Promise<void>;
  classify?: (err: unknown) => ErrorClassification;
  sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_ERROR_NAMES = new Set([
  'APIConnectionError',
  'APIConnectionTimeoutError',
  'APITimeoutError',
  'RateLimitError',
  'InternalServerError',
  'TimeoutError',
  'ConnectTimeoutError',
  'SocketError'
]);

const TRANSIENT_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ECONNABORTED', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'ENETUNREACH']);

/**
 * Connectivity/timeout-class failures are transient. Turn-ceiling and configuration failures,
 * and anything unrecognised, are fatal.
 */
export function classifyInvocationError(err: unknown): ErrorClassification {
  if (err instanceof TransientInvocationError) return 'transient';
  if (err instanceof MaxTurnsExceededError || err instanceof FatalInvocationError) return 'fatal';
  if (!(err instanceof Error)) return 'fatal';

  if (TRANSIENT_ERROR_NAMES.has(err.name)) return 'transient';

  const code = errorCode(err);
  if (code && (TRANSIENT_ERROR_CODES.has(code) || code.startsWith('UND_ERR_'))) return 'transient';

  const status = 'status' in err && typeof err.status === 'number' ? err.status : undefined;
  if (status !== undefined && (status === 408 || status === 409 || status === 429 || status >= 500)) return 'transient';

  if (err.cause !== undefined && err.cause !== err) return classifyInvocationError(err.cause);
  return 'fatal';
}

/** Delay before attempt `k + 1`, i.e. after the k-th consecutive failure (k is 1-indexed). */
export function backoffDelayMs(failures: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.baseDelayMs * 2 ** (failures - 1), policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wrap `operation` so transient failures are retried with deterministic exponential backoff.
 * Fatal failures propagate at once; after the last attempt the last error is rethrown as is.
 */
export function withRetry<T>(operation: (attempt: number) => Promise<T>, policy: RetryPolicy, hooks: RetryHooks = {}): () => Promise<T> {
  const classify = hooks.classify ?? classifyInvocationError;
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  return async () => {
    let delayMs = 0;
    for (let attempt = 1; ; attempt++) {
      if (delayMs > 0) await wait(delayMs);

      let result: T;
      try {
        result = await operation(attempt);
      } catch (err) {
        const classification = classify(err);
        await hooks.onAttempt?.({ attempt, classification, delayMs, outcome: { ok: false, error: errorMessage(err) } });
        if (classification === 'fatal' || attempt >= maxAttempts) throw err;
        delayMs = backoffDelayMs(attempt, policy);
        continue;
      }

      await hooks.onAttempt?.({ attempt, classification: null, delayMs, outcome: { ok: true, outputChars: outputLength(result) } });
      return result;
    }
  };
}

function outputLength(value: unknown): number {
  return typeof value === 'string' ? value.length : 0;
}
