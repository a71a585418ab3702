import { resolve } from 'node:path';

import { LedgerReader } from '../../core/ledger/reader.js';
import { listRuns, runLedgerPath } from '../../core/ledger/run-index.js';
import type { LedgerEntry } from '../../core/ledger/types.js';
import { resolveProjectPaths } from '../../core/pipeline.js';
import type { Renderer } from '../ui/renderer.js';
import { theme, INDENT } from '../ui/theme.js';
import { formatMs, padRight } from '../ui/format.js';

export interface HistoryCommandOptions {
  root?: string;
  detailRunId?: string;
  renderer: Renderer;
}

/**
 * `fixloop history` lists `project/reports/run-*` directories from their `artifacts.json`.
 * `--detail RUN_ID` prints that run's ledger as a timeline.
 */
export async function runHistoryCommand(opts: HistoryCommandOptions): Promise<{ ok: boolean }> {
  const r = opts.renderer;
  const { reportsDir } = resolveProjectPaths(resolve(opts.root ?? process.cwd()));

  // ── Detail view ─────────────────────────────────────────────────────────
  if (opts.detailRunId) {
    const runId = opts.detailRunId;
    const ledger = new LedgerReader(runLedgerPath(reportsDir, runId));
    const { entries, warnings } = await ledger.readAllSafe();
    const integrity = await ledger.verifyIntegrity();

    r.text(`${INDENT}${theme.bold(`History: ${runId}`)}`);
    r.blank();

    if (!integrity.ok) r.warn(`Ledger integrity: ${integrity.message ?? 'failed'}`);
    for (const w of warnings) r.warn(w);

    if (entries.length === 0) {
      r.dim('No ledger entries found.');
      r.blank();
      return { ok: false };
    }
    for (const e of entries) {
      const detail = formatEventSummary(e);
      r.text(`${INDENT}  ${theme.dim(formatTimestamp(e.timestamp))}  ${e.type.padEnd(22)}${detail ? `  ${theme.dim(detail)}` : ''}`);
    }
    r.blank();
    return { ok: integrity.ok };
  }

  // ── Summary view ────────────────────────────────────────────────────────
  const runs = await listRuns(reportsDir);
  r.text(`${INDENT}${theme.bold('Runs')}`);
  r.blank();

  if (runs.length === 0) {
    r.dim('No runs found.');
    r.blank();
    return { ok: true };
  }

  const maxIdLen = Math.max(...runs.map((run) => run.runId.length), 6);
  for (const run of runs) {
    if (!run.ok) {
      r.text(`${INDENT}  ${padRight(run.runId, maxIdLen + 2)}${theme.warning(padRight('unreadable', 16))}${theme.dim(run.error)}`);
      continue;
    }
    const outcome = run.verdict && run.action ? `${run.verdict} ${run.action}` : 'in progress';
    const colour = run.verdict === 'PASS' ? theme.success : run.verdict ? theme.error : theme.dim;
    const duration = run.durationMs !== null ? formatMs(run.durationMs) : theme.dim('unknown');
    const reason = run.reason ? `  ${theme.dim(`reason=${run.reason}`)}` : '';
    r.text(
      `${INDENT}  ${padRight(run.runId, maxIdLen + 2)}${colour(padRight(outcome, 16))}${theme.dim('rounds=')}${run.rounds}  ${theme.dim('duration=')}${duration}${reason}`
    );
  }

  r.blank();
  r.dim('Run `fixloop history --detail <run-id>` for the full event timeline.');
  r.blank();
  return { ok: true };
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function formatTimestamp(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso.slice(11, 19);
  return d.toLocaleTimeString('en-US', { hour12: false, hour: '2-digit', minute: '2-digit', second: '2-digit' });
}

export function formatEventSummary(entry: LedgerEntry): string {
  switch (entry.type) {
    case 'run_started':
      return `task=${entry.data.taskSource}  diff=${entry.data.topology}`;
    case 'role_attempt': {
      const status = entry.data.ok ? 'ok' : `${entry.data.classification ?? 'failed'}: ${entry.data.error ?? ''}`.trim();
      return `${entry.data.role}  attempt=${entry.data.attempt}  ${status}`;
    }
    case 'round_started':
    case 'stuck_detected':
      return `round=${entry.data.round}`;
    case 'command_executed':
      return `rc=${entry.data.returncode}${entry.data.blocked ? ` blocked=${entry.data.blockedReason ?? 'yes'}` : ''}  ${entry.data.cmd}`;
    case 'file_written':
      return `${entry.data.role}  ${entry.data.path}`;
    case 'evidence_assembled':
      return `files=${entry.data.filesChanged}  redFlags=${entry.data.redFlags}${entry.data.diffTruncated ? '  truncated' : ''}`;
    case 'verdict_parsed':
      return `${entry.data.verdict} ${entry.data.action}${entry.data.malformed ? '  malformed' : ''}`;
    case 'round_completed':
      return `round=${entry.data.round}  ${entry.data.state}${entry.data.reason ? `  ${entry.data.reason}` : ''}`;
    case 'tech_writer_decision':
      return entry.data.run ? `trigger=${entry.data.trigger ?? ''}` : 'skipped';
    case 'run_completed':
      return `${entry.data.verdict} ${entry.data.action}  reason=${entry.data.reason}`;
  }
}
