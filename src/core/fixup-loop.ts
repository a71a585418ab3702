import { WorkspaceToolbox, type ToolEvent } from '../sandbox/toolbox.js';
import { errorMessage } from './errors.js';
import type { StopReason } from './ledger/types.js';
import { implementerSections, reviewerSections, type ProjectDocs } from './roles/prompts.js';
import { StuckDetector } from './stuck-detector.js';
import { parseImplementerReport, parseReviewerReport } from './verdict/parser.js';
import type { Action, ParsedImplementerReport, ParsedVerdict, Verdict } from './verdict/types.js';
import { callRole, recordToolEvents, type RunContext } from './run-context.js';
import type { ReviewEvidence } from './evidence/assembler.js';
import type { RedFlagFinding } from './evidence/red-flags.js';
import type { ChangeSummary } from '../git/diff-parser.js';

export type LoopState = 'AWAITING_IMPLEMENTER' | 'AWAITING_REVIEWER' | 'PASS' | 'FAIL_CONTINUE' | 'FAIL_SKIP';

export type RoundState = Extract<LoopState, 'PASS' | 'FAIL_CONTINUE' | 'FAIL_SKIP'>;

export interface RoundRecord {
  readonly round: number;
  readonly state: RoundState;
  readonly reason: StopReason | null;
  readonly implementerReport: string | null;
  readonly implementer: ParsedImplementerReport | null;
  readonly reviewerReport: string | null;
  readonly verdict: ParsedVerdict | null;
  /** Prompt-facing diff; the full patch lives in `diffPath`. */
  readonly diff: string | null;
  readonly diffPath: string | null;
  readonly diffTruncated: boolean;
  readonly changes: ChangeSummary | null;
  readonly redFlags: readonly RedFlagFinding[];
  readonly toolEvents: readonly ToolEvent[];
  readonly stuck: boolean;
  readonly malformed: boolean;
  readonly error: string | null;
}

export interface LoopOutcome {
  verdict: Verdict;
  action: Action;
  reason: StopReason;
  rounds: readonly RoundRecord[];
  /** The final round's verdict; null when that round ended before the Reviewer answered. */
  lastVerdict: ParsedVerdict | null;
}

export interface LoopInputs {
  docs: ProjectDocs;
  plan: string;
}

function renderFixes(verdict: ParsedVerdict | null): string {
  if (!verdict || verdict.fixItems.length === 0) return '- None';
  return verdict.fixItems.map((item) => `- ${item}`).join('\n');
}

/** Where a Reviewer verdict leads. PASS wins over any action; stuck wins over SKIP and the round ceiling. */
export function decideRound(verdict: ParsedVerdict, stuck: boolean, round: number, maxRounds: number): { state: RoundState; reason: StopReason | null } {
  if (verdict.verdict === 'PASS') return { state: 'PASS', reason: 'pass' };
  if (stuck) return { state: 'FAIL_SKIP', reason: 'stuck' };
  if (verdict.action === 'SKIP') return { state: 'FAIL_SKIP', reason: verdict.malformed ? 'malformed' : 'reviewer_skip' };
  if (round >= maxRounds) return { state: 'FAIL_SKIP', reason: 'max_rounds' };
  return { state: 'FAIL_CONTINUE', reason: null };
}

/** `max_rounds` leaves the task open for a manual retry; every other failed stop skips it. */
export function outcomePair(reason: StopReason): { verdict: Verdict; action: Action } {
  if (reason === 'pass') return { verdict: 'PASS', action: 'CONTINUE' };
  if (reason === 'max_rounds') return { verdict: 'FAIL', action: 'CONTINUE' };
  return { verdict: 'FAIL', action: 'SKIP' };
}

/**
 * Implementer/Reviewer rounds until PASS, a skip, a stuck Reviewer or the round ceiling. Each
 * round's artifacts are written before the next round starts.
 */
export async function runFixupLoop(ctx: RunContext, inputs: LoopInputs): Promise<LoopOutcome> {
  const { config, ledger, logger } = ctx;
  const maxRounds = Math.max(1, config.maxRounds);
  const detector = new StuckDetector();
  const rounds: RoundRecord[] = [];
  let lastVerdict: ParsedVerdict | null = null;

  const finish = async (record: RoundRecord): Promise<void> => {
    const frozen = Object.freeze(record);
    rounds.push(frozen);
    await ledger.record({ type: 'round_completed', data: { round: record.round, state: record.state, ...(record.reason ? { reason: record.reason } : {}) } });
    await ctx.onRound?.(frozen);
  };

  for (let round = 1; round <= maxRounds; round++) {
    let state: LoopState = 'AWAITING_IMPLEMENTER';
    logger.info('round started', { round, state });
    await ledger.record({ type: 'round_started', data: { round } });

    const toolbox = new WorkspaceToolbox({
      baseDir: ctx.paths.workspaceDir,
      allowWrite: true,
      allowCommands: true,
      commandTimeoutSeconds: config.commandTimeoutSeconds
    });

    const base = {
      round,
      implementerReport: null,
      implementer: null,
      reviewerReport: null,
      verdict: null,
      diff: null,
      diffPath: null,
      diffTruncated: false,
      changes: null,
      redFlags: [],
      toolEvents: toolbox.events,
      stuck: false,
      malformed: false,
      error: null
    } satisfies Omit<RoundRecord, 'state' | 'reason'>;

    let implementerReport: string;
    try {
      implementerReport = await callRole(ctx, {
        role: 'implementer',
        round,
        sections: implementerSections(inputs.docs, inputs.plan, renderFixes(lastVerdict)),
        toolbox
      });
    } catch (err) {
      await recordToolEvents(ctx, 'implementer', round, toolbox);
      logger.error('implementer failed', { round, error: errorMessage(err) });
      await finish({ ...base, toolEvents: [...toolbox.events], state: 'FAIL_SKIP', reason: 'implementer_failed', error: errorMessage(err) });
      return { ...outcomePair('implementer_failed'), reason: 'implementer_failed', rounds, lastVerdict: null };
    }

    await ledger.appendImplementer(round, implementerReport);
    await recordToolEvents(ctx, 'implementer', round, toolbox);
    const implementer = parseImplementerReport(implementerReport);
    const toolEvents = [...toolbox.events];

    state = 'AWAITING_REVIEWER';
    logger.debug('assembling evidence', { round, state });
    let evidence: ReviewEvidence;
    let diffPath: string;
    try {
      evidence = await ctx.evidence.assemble(toolEvents);
      diffPath = await ledger.writeDiff(round, evidence.fullDiff);
    } catch (err) {
      logger.error('evidence assembly failed', { round, error: errorMessage(err) });
      await finish({ ...base, implementerReport, implementer, toolEvents, state: 'FAIL_SKIP', reason: 'evidence_failed', error: errorMessage(err) });
      return { ...outcomePair('evidence_failed'), reason: 'evidence_failed', rounds, lastVerdict: null };
    }
    await ledger.record({
      type: 'evidence_assembled',
      data: {
        round,
        diffChars: evidence.fullDiff.length,
        diffTruncated: evidence.diffTruncated,
        filesChanged: evidence.changes.files.length,
        redFlags: evidence.findings.length
      }
    });

    const afterImplementer = {
      ...base,
      implementerReport,
      implementer,
      diff: evidence.diff,
      diffPath,
      diffTruncated: evidence.diffTruncated,
      changes: evidence.changes,
      redFlags: evidence.findings,
      toolEvents
    };

    let reviewerReport: string;
    try {
      reviewerReport = await callRole(ctx, {
        role: 'reviewer',
        round,
        sections: reviewerSections(inputs.docs.task, inputs.plan, {
          toolOutputs: evidence.toolOutputs,
          diff: evidence.diff,
          redFlags: evidence.redFlags,
          implementerReport
        })
      });
    } catch (err) {
      logger.error('reviewer failed', { round, error: errorMessage(err) });
      await finish({ ...afterImplementer, state: 'FAIL_SKIP', reason: 'reviewer_failed', error: errorMessage(err) });
      return { ...outcomePair('reviewer_failed'), reason: 'reviewer_failed', rounds, lastVerdict: null };
    }

    await ledger.appendReviewer(round, reviewerReport);
    const verdict = parseReviewerReport(reviewerReport);
    lastVerdict = verdict;
    await ledger.record({
      type: 'verdict_parsed',
      data: {
        round,
        verdict: verdict.verdict,
        action: verdict.action,
        malformed: verdict.malformed,
        docsRequested: verdict.docsRequested,
        fixItems: verdict.fixItems.length
      }
    });
    if (verdict.malformed) logger.warn('reviewer report did not follow the VERDICT/ACTION format', { round });

    const stuck = detector.observe(round, reviewerReport);
    const decision = decideRound(verdict, stuck, round, maxRounds);
    state = decision.state;
    if (decision.reason === 'stuck') await ledger.record({ type: 'stuck_detected', data: { round } });

    await finish({
      ...afterImplementer,
      reviewerReport,
      verdict,
      stuck: decision.reason === 'stuck',
      malformed: verdict.malformed,
      state,
      reason: decision.reason
    });

    if (decision.reason !== null) {
      return { ...outcomePair(decision.reason), reason: decision.reason, rounds, lastVerdict };
    }
  }

  // Unreachable: the last round always resolves to PASS or FAIL_SKIP.
  return { ...outcomePair('max_rounds'), reason: 'max_rounds', rounds, lastVerdict };
}
