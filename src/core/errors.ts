import type { RoleName } from './roles/types.js';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `- ${i}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** Backend availability problems: connectivity, timeouts, rate limits, 5xx. Retried with backoff. */
export class TransientInvocationError extends Error {
  constructor(
    readonly role: RoleName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransientInvocationError';
  }
}

export class MaxTurnsExceededError extends Error {
  constructor(
    readonly role: RoleName,
    readonly turnCeiling: number,
    options?: { cause?: unknown }
  ) {
    super(`${role} exceeded its turn ceiling of ${turnCeiling}`, options);
    this.name = 'MaxTurnsExceededError';
  }
}

export class FatalInvocationError extends Error {
  constructor(
    readonly role: RoleName,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FatalInvocationError';
  }
}

export class LedgerWriteError extends Error {
  constructor(readonly field: string) {
    super(`Ledger field '${field}' was already written`);
    this.name = 'LedgerWriteError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

/** A role asked the sandbox for something outside its grant; reported back to the agent as a tool error. */
export class SandboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SandboxError';
  }
}
