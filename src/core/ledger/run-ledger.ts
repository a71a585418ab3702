import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { LedgerWriteError } from '../errors.js';
import type { RoleName } from '../roles/types.js';
import type { InvocationAttempt } from '../retry.js';
import { ensureDir, errorCode, writeJson, writeTextOnce } from '../../utils/fs.js';
import { runIdFor } from '../../utils/id.js';
import type { LedgerEntry, LedgerEntryInput } from './types.js';
import { LedgerWriter } from './writer.js';

export const PLAN_FILENAME = 'plan.txt';
export const IMPLEMENTER_FILENAME = 'implementer.txt';
export const REVIEWER_FILENAME = 'reviewer.txt';
export const TECH_WRITER_FILENAME = 'tech_writer.txt';
export const ARTIFACTS_FILENAME = 'artifacts.json';
export const LEDGER_FILENAME = 'ledger.jsonl';

export function diffFilename(round: number): string {
  return `diff_round_${round}.patch`;
}

export interface AttemptRecord extends InvocationAttempt {
  role: RoleName;
  round: number | null;
}

/**
 * Creates `run-<UTC timestamp>` under `reportsRoot`, adding `-2`, `-3`, ... when a run started in
 * the same second already claimed the name.
 */
export async function createRunDir(reportsRoot: string, now: Date = new Date()): Promise<{ runId: string; runDir: string }> {
  await ensureDir(reportsRoot);
  for (let suffix = 1; ; suffix++) {
    const runId = runIdFor(now, suffix);
    const runDir = join(reportsRoot, runId);
    try {
      await mkdir(runDir);
      return { runId, runDir };
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err;
    }
  }
}

/**
 * Everything a run leaves behind in its directory. Text artifacts are write-once per field; the
 * structured `artifacts.json` is rewritten as the run progresses.
 */
export class RunLedger {
  private readonly written = new Set<string>();
  private readonly attemptLog: AttemptRecord[] = [];

  private constructor(
    readonly runId: string,
    readonly runDir: string,
    private readonly events: LedgerWriter
  ) {}

  static async create(reportsRoot: string, now?: Date): Promise<RunLedger> {
    const { runId, runDir } = await createRunDir(reportsRoot, now);
    const events = await LedgerWriter.open(join(runDir, LEDGER_FILENAME));
    return new RunLedger(runId, runDir, events);
  }

  get attempts(): readonly AttemptRecord[] {
    return this.attemptLog;
  }

  pathOf(filename: string): string {
    return join(this.runDir, filename);
  }

  async record(event: LedgerEntryInput): Promise<LedgerEntry> {
    return await this.events.append(event);
  }

  async recordAttempt(role: RoleName, round: number | null, attempt: InvocationAttempt): Promise<void> {
    this.attemptLog.push({ role, round, ...attempt });
    await this.record({
      type: 'role_attempt',
      data: {
        role,
        round,
        attempt: attempt.attempt,
        classification: attempt.classification,
        delayMs: attempt.delayMs,
        ok: attempt.outcome.ok,
        ...(attempt.outcome.ok ? {} : { error: attempt.outcome.error })
      }
    });
  }

  async writePlan(text: string): Promise<string> {
    this.claim('plan');
    return await this.writeOnce(PLAN_FILENAME, `${text.trim()}\n`);
  }

  async appendImplementer(round: number, text: string): Promise<string> {
    this.claim(`implementer:${round}`);
    return await this.appendRound(IMPLEMENTER_FILENAME, round, text);
  }

  async appendReviewer(round: number, text: string): Promise<string> {
    this.claim(`reviewer:${round}`);
    return await this.appendRound(REVIEWER_FILENAME, round, text);
  }

  /** The full patch, unmodified. */
  async writeDiff(round: number, diff: string): Promise<string> {
    this.claim(`diff:${round}`);
    return await this.writeOnce(diffFilename(round), diff);
  }

  async writeTechWriter(text: string): Promise<string> {
    this.claim('tech_writer');
    return await this.writeOnce(TECH_WRITER_FILENAME, `${text.trim()}\n`);
  }

  async writeArtifacts(record: unknown): Promise<string> {
    const path = this.pathOf(ARTIFACTS_FILENAME);
    await writeJson(path, record);
    return path;
  }

  private claim(field: string): void {
    if (this.written.has(field)) throw new LedgerWriteError(field);
    this.written.add(field);
  }

  private async writeOnce(filename: string, content: string): Promise<string> {
    const path = this.pathOf(filename);
    try {
      await writeTextOnce(path, content);
    } catch (err) {
      if (errorCode(err) === 'EEXIST') throw new LedgerWriteError(filename);
      throw err;
    }
    return path;
  }

  private async appendRound(filename: string, round: number, text: string): Promise<string> {
    const path = this.pathOf(filename);
    await appendFile(path, `=== ROUND ${round} ===\n${text.trim()}\n\n`, 'utf8');
    return path;
  }
}
