import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import { isNotFound, readJson } from '../../utils/fs.js';
import { parseRunId } from '../../utils/id.js';
import { ARTIFACTS_FILENAME, LEDGER_FILENAME } from './run-ledger.js';
import { StopReason } from './types.js';

/** The slice of `artifacts.json` the history view reads; everything else passes through untouched. */
const ArtifactsSummarySchema = z
  .object({
    runId: z.string(),
    startedAt: z.string(),
    endedAt: z.string().nullable(),
    taskSource: z.enum(['current.md', 'demo']),
    rounds: z.array(z.unknown()),
    finalVerdict: z.enum(['PASS', 'FAIL']).nullable(),
    finalAction: z.enum(['CONTINUE', 'SKIP']).nullable(),
    reason: StopReason.nullable()
  })
  .passthrough();

export type RunSummary =
  | {
      ok: true;
      runId: string;
      runDir: string;
      taskSource: 'current.md' | 'demo';
      rounds: number;
      verdict: 'PASS' | 'FAIL' | null;
      action: 'CONTINUE' | 'SKIP' | null;
      reason: StopReason | null;
      durationMs: number | null;
    }
  | { ok: false; runId: string; runDir: string; error: string };

export function runLedgerPath(reportsDir: string, runId: string): string {
  return join(reportsDir, runId, LEDGER_FILENAME);
}

/** Run directories under `reportsDir`, oldest first. Unreadable artifacts are reported, not skipped. */
export async function listRuns(reportsDir: string): Promise<RunSummary[]> {
  let names: string[];
  try {
    names = await readdir(reportsDir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const runIds = names.filter((n) => parseRunId(n) !== null).sort(compareRunIds);
  const out: RunSummary[] = [];
  for (const runId of runIds) {
    out.push(await readSummary(reportsDir, runId));
  }
  return out;
}

async function readSummary(reportsDir: string, runId: string): Promise<RunSummary> {
  const runDir = join(reportsDir, runId);
  let raw: unknown;
  try {
    raw = await readJson(join(runDir, ARTIFACTS_FILENAME));
  } catch (err) {
    return { ok: false, runId, runDir, error: isNotFound(err) ? 'artifacts.json missing' : String(err) };
  }
  const parsed = ArtifactsSummarySchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, runId, runDir, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  const a = parsed.data;
  const started = Date.parse(a.startedAt);
  const ended = a.endedAt ? Date.parse(a.endedAt) : Number.NaN;
  return {
    ok: true,
    runId,
    runDir,
    taskSource: a.taskSource,
    rounds: a.rounds.length,
    verdict: a.finalVerdict,
    action: a.finalAction,
    reason: a.reason,
    durationMs: Number.isFinite(started) && Number.isFinite(ended) ? Math.max(0, ended - started) : null
  };
}

/** Orders same-second suffixes numerically: run-X, run-X-2, run-X-10. */
function compareRunIds(a: string, b: string): number {
  const pa = parseRunId(a);
  const pb = parseRunId(b);
  if (!pa || !pb) return a.localeCompare(b);
  const base = `${pa.yyyyMMdd}${pa.hhmmss}`.localeCompare(`${pb.yyyyMMdd}${pb.hhmmss}`);
  if (base !== 0) return base;
  return (pa.suffix ?? 1) - (pb.suffix ?? 1);
}
