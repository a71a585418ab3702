import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import type { RoleName } from '../core/roles/types.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';

export const DEFAULT_MODEL = 'gpt-5.1-codex-mini';
export const DEFAULT_MAX_ROUNDS = 8;

export const DEFAULT_MAX_TURNS: Record<RoleName, number> = {
  planner: 6,
  implementer: 40,
  reviewer: 10,
  tech_writer: 10
};

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface FixloopConfig {
  models: Record<RoleName, string>;
  maxTurns: Record<RoleName, number>;
  maxRounds: number;
  retry: Record<RoleName, RetrySettings>;
  reviewerDiffMaxChars: number;
  reviewerRedFlagsMaxChars: number;
  plannerBacklogMaxChars: number;
  commandTimeoutSeconds: number;
  logLevel: LogLevel;
  logJson: boolean;
}

type Env = Record<string, string | undefined>;

const PositiveInt = z.coerce.number().int().min(1);
const NonNegativeInt = z.coerce.number().int().min(0);
const NonNegativeSeconds = z.coerce.number().finite().min(0);
const LogLevelSchema = z.enum(LOG_LEVELS);
const FlagSchema = z.enum(['0', '1', 'true', 'false']);

function envSuffix(role: RoleName): string {
  return role.toUpperCase();
}

function perRole<T>(make: (role: RoleName) => T): Record<RoleName, T> {
  return {
    planner: make('planner'),
    implementer: make('implementer'),
    reviewer: make('reviewer'),
    tech_writer: make('tech_writer')
  };
}

/**
 * Reads settings from the environment. Every invalid value is collected and reported in a
 * single ConfigError; unset or blank variables take their defaults.
 */
export function loadConfig(env: Env = process.env): FixloopConfig {
  const issues: string[] = [];

  const read = <T>(key: string, schema: z.ZodType<T>, fallback: T): T => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = schema.safeParse(raw.trim());
    if (!parsed.success) {
      issues.push(`${key}=${JSON.stringify(raw)}: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
      return fallback;
    }
    return parsed.data;
  };

  const globalModel = read('FIXLOOP_MODEL', z.string().min(1), DEFAULT_MODEL);
  const globalAttempts = read('FIXLOOP_RETRY_MAX_ATTEMPTS', PositiveInt, 3);
  const baseDelaySeconds = read('FIXLOOP_RETRY_BASE_DELAY_SECONDS', NonNegativeSeconds, 1);
  const maxDelaySeconds = read('FIXLOOP_RETRY_MAX_DELAY_SECONDS', NonNegativeSeconds, 8);

  const models = perRole((role) => read(`FIXLOOP_MODEL_${envSuffix(role)}`, z.string().min(1), globalModel));
  const maxTurns = perRole((role) => read(`FIXLOOP_MAX_TURNS_${envSuffix(role)}`, PositiveInt, DEFAULT_MAX_TURNS[role]));
  const retry = perRole(
    (role): RetrySettings => ({
      maxAttempts: read(`FIXLOOP_RETRY_${envSuffix(role)}_MAX_ATTEMPTS`, PositiveInt, globalAttempts),
      baseDelayMs: Math.round(baseDelaySeconds * 1000),
      maxDelayMs: Math.round(maxDelaySeconds * 1000)
    })
  );
  const logJson = read('FIXLOOP_LOG_JSON', FlagSchema, '0');

  const config: FixloopConfig = {
    models,
    maxTurns,
    maxRounds: read('FIXLOOP_MAX_ROUNDS', PositiveInt, DEFAULT_MAX_ROUNDS),
    retry,
    reviewerDiffMaxChars: read('FIXLOOP_REVIEWER_DIFF_MAX_CHARS', NonNegativeInt, 12_000),
    reviewerRedFlagsMaxChars: read('FIXLOOP_REVIEWER_RED_FLAGS_MAX_CHARS', NonNegativeInt, 4_000),
    plannerBacklogMaxChars: read('FIXLOOP_PLANNER_BACKLOG_MAX_CHARS', NonNegativeInt, 8_000),
    commandTimeoutSeconds: read('FIXLOOP_COMMAND_TIMEOUT_SECONDS', PositiveInt, 30),
    logLevel: read('FIXLOOP_LOG_LEVEL', LogLevelSchema, 'info'),
    logJson: logJson === '1' || logJson === 'true'
  };

  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}
