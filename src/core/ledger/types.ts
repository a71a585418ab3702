import { z } from 'zod';

import { BLOCK_REASONS } from '../../sandbox/policy.js';
import { ROLE_NAMES } from '../roles/types.js';

export const TimestampIso = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be ISO datetime' });

const Role = z.enum(ROLE_NAMES);
const Verdict = z.enum(['PASS', 'FAIL']);
const Action = z.enum(['CONTINUE', 'SKIP']);
const RoundIndex = z.number().int().positive();

export const StopReason = z.enum([
  'pass',
  'stuck',
  'reviewer_skip',
  'malformed',
  'max_rounds',
  'implementer_failed',
  'reviewer_failed',
  'evidence_failed',
  'planner_failed',
  'tech_writer_failed'
]);
export type StopReason = z.infer<typeof StopReason>;

function event<T extends string, D extends z.ZodTypeAny>(type: T, data: D) {
  return z.object({
    seq: z.number().int().positive(),
    timestamp: TimestampIso,
    type: z.literal(type),
    data
  });
}

export const RunStartedEvent = event(
  'run_started',
  z.object({
    runId: z.string(),
    taskSource: z.enum(['current.md', 'demo']),
    topology: z.enum(['standalone', 'nested', 'none']),
    baseline: z.string().nullable()
  })
);

export const RoleAttemptEvent = event(
  'role_attempt',
  z.object({
    role: Role,
    round: RoundIndex.nullable(),
    attempt: z.number().int().positive(),
    classification: z.enum(['transient', 'fatal']).nullable(),
    delayMs: z.number().nonnegative(),
    ok: z.boolean(),
    error: z.string().optional()
  })
);

export const RoundStartedEvent = event('round_started', z.object({ round: RoundIndex }));

export const CommandExecutedEvent = event(
  'command_executed',
  z.object({
    round: RoundIndex,
    cmd: z.string(),
    returncode: z.number().int(),
    blocked: z.boolean(),
    blockedReason: z.enum(BLOCK_REASONS).optional()
  })
);

export const FileWrittenEvent = event(
  'file_written',
  z.object({
    role: Role,
    round: RoundIndex.nullable(),
    path: z.string(),
    bytes: z.number().int().nonnegative()
  })
);

export const EvidenceAssembledEvent = event(
  'evidence_assembled',
  z.object({
    round: RoundIndex,
    diffChars: z.number().int().nonnegative(),
    diffTruncated: z.boolean(),
    filesChanged: z.number().int().nonnegative(),
    redFlags: z.number().int().nonnegative()
  })
);

export const VerdictParsedEvent = event(
  'verdict_parsed',
  z.object({
    round: RoundIndex,
    verdict: Verdict,
    action: Action,
    malformed: z.boolean(),
    docsRequested: z.boolean(),
    fixItems: z.number().int().nonnegative()
  })
);

export const StuckDetectedEvent = event('stuck_detected', z.object({ round: RoundIndex }));

export const RoundCompletedEvent = event(
  'round_completed',
  z.object({
    round: RoundIndex,
    state: z.enum(['PASS', 'FAIL_CONTINUE', 'FAIL_SKIP']),
    reason: StopReason.optional()
  })
);

export const TechWriterDecisionEvent = event(
  'tech_writer_decision',
  z.object({
    run: z.boolean(),
    trigger: z.enum(['pass', 'docs']).nullable(),
    taskRecordsWritable: z.boolean()
  })
);

export const RunCompletedEvent = event(
  'run_completed',
  z.object({
    verdict: Verdict,
    action: Action,
    reason: StopReason,
    rounds: z.number().int().nonnegative()
  })
);

export const LedgerEntrySchema = z.discriminatedUnion('type', [
  RunStartedEvent,
  RoleAttemptEvent,
  RoundStartedEvent,
  CommandExecutedEvent,
  FileWrittenEvent,
  EvidenceAssembledEvent,
  VerdictParsedEvent,
  StuckDetectedEvent,
  RoundCompletedEvent,
  TechWriterDecisionEvent,
  RunCompletedEvent
]);

export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;
export type LedgerEventType = LedgerEntry['type'];

type WithoutEnvelope<T> = T extends unknown ? Omit<T, 'seq' | 'timestamp'> : never;

export type LedgerEntryInput = WithoutEnvelope<LedgerEntry>;
