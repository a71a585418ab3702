import { describe, expect, it } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';

import type { FixloopConfig } from '../src/config/index.js';
import { TransientInvocationError } from '../src/core/errors.js';
import { EvidenceAssembler } from '../src/core/evidence/assembler.js';
import { openDiffSource } from '../src/core/evidence/diff-source.js';
import { loadRedFlagCatalogue } from '../src/core/evidence/red-flags.js';
import { decideRound, outcomePair, runFixupLoop, type RoundRecord } from '../src/core/fixup-loop.js';
import { LedgerReader } from '../src/core/ledger/reader.js';
import { RunLedger } from '../src/core/ledger/run-ledger.js';
import { resolveProjectPaths } from '../src/core/pipeline.js';
import type { ProjectDocs } from '../src/core/roles/prompts.js';
import type { RunContext } from '../src/core/run-context.js';
import { parseReviewerReport } from '../src/core/verdict/parser.js';
import { silentLogger } from '../src/utils/logger.js';
import { PASS_REPORT, ScriptedInvoker, sectionOf, toolboxOf } from './fake-invoker.js';
import { createProject, noSleep, testConfig } from './project-fixture.js';

const docs: ProjectDocs = { task: 'Add a farewell() function', backlog: '', vision: '', architecture: '', conventions: '' };
const PLAN = 'PLAN:\n- add farewell()\nACCEPTANCE:\n- tests pass';
const FAIL_CONTINUE = (fix: string) => `VERDICT: FAIL\nACTION: CONTINUE\nFIXES:\n- ${fix}`;

async function loopContext(invoker: ScriptedInvoker, config: FixloopConfig = testConfig()) {
  const fx = await createProject();
  const paths = resolveProjectPaths(fx.root);
  const ledger = await RunLedger.create(paths.reportsDir);
  const evidence = new EvidenceAssembler(await openDiffSource(paths.workspaceDir), paths.workspaceDir, await loadRedFlagCatalogue(), {
    diffMaxChars: config.reviewerDiffMaxChars,
    redFlagsMaxChars: config.reviewerRedFlagsMaxChars
  });
  const seen: RoundRecord[] = [];
  const ctx: RunContext = {
    config,
    paths,
    invoker,
    ledger,
    evidence,
    logger: silentLogger,
    sleep: noSleep,
    onRound: (r) => void seen.push(r)
  };
  return { ctx, ledger, seen };
}

describe('decideRound', () => {
  it('lets PASS win over a stuck reviewer and the round ceiling', () => {
    expect(decideRound(parseReviewerReport(PASS_REPORT), true, 3, 3)).toEqual({ state: 'PASS', reason: 'pass' });
  });

  it('orders stuck before SKIP and SKIP before the round ceiling', () => {
    const skip = parseReviewerReport('VERDICT: FAIL\nACTION: SKIP');
    expect(decideRound(skip, true, 1, 8)).toEqual({ state: 'FAIL_SKIP', reason: 'stuck' });
    expect(decideRound(skip, false, 8, 8)).toEqual({ state: 'FAIL_SKIP', reason: 'reviewer_skip' });
    expect(decideRound(parseReviewerReport('nonsense'), false, 1, 8)).toEqual({ state: 'FAIL_SKIP', reason: 'malformed' });
    expect(decideRound(parseReviewerReport(FAIL_CONTINUE('x')), false, 8, 8)).toEqual({ state: 'FAIL_SKIP', reason: 'max_rounds' });
    expect(decideRound(parseReviewerReport(FAIL_CONTINUE('x')), false, 2, 8)).toEqual({ state: 'FAIL_CONTINUE', reason: null });
  });

  it('keeps the task open only when rounds ran out', () => {
    expect(outcomePair('max_rounds')).toEqual({ verdict: 'FAIL', action: 'CONTINUE' });
    expect(outcomePair('stuck')).toEqual({ verdict: 'FAIL', action: 'SKIP' });
    expect(outcomePair('pass')).toEqual({ verdict: 'PASS', action: 'CONTINUE' });
  });
});

describe('runFixupLoop', () => {
  it('passes in one round and hands the reviewer the diff and tool outputs', async () => {
    const report = 'RESULT: PASS\nCHANGES:\n- app/greeter.py (created)\nCOMMANDS:\n- ls app -> 0';
    const invoker = new ScriptedInvoker({
      implementer: [
        async (call) => {
          const box = toolboxOf(call);
          await box.writeFile('app/greeter.py', 'def greet(name):\n    return f"Hello, {name}!"\n');
          await box.runCommand('ls app');
          return report;
        }
      ],
      reviewer: [PASS_REPORT]
    });
    const { ctx, ledger, seen } = await loopContext(invoker);

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome).toMatchObject({ verdict: 'PASS', action: 'CONTINUE', reason: 'pass' });
    expect(outcome.rounds).toHaveLength(1);
    expect(seen.map((r) => r.round)).toEqual([1]);

    const [round] = outcome.rounds;
    expect(round?.state).toBe('PASS');
    expect(round?.implementer?.changes).toEqual([{ path: 'app/greeter.py', kind: 'created' }]);
    expect(round?.diff).toContain('+++ b/app/greeter.py');

    const review = invoker.callsFor('reviewer')[0];
    expect(review?.toolbox).toBeUndefined();
    expect(sectionOf(review, 'TOOL_OUTPUTS')).toBe('FILES_WRITTEN:\n- workspace/app/greeter.py\nCOMMAND_RESULTS:\n- ls app -> 0');
    expect(sectionOf(review, 'IMPLEMENTER_REPORT')).toBe(report);
    expect(sectionOf(review, 'RED_FLAGS')).toBe('- None');
    expect(sectionOf(invoker.callsFor('implementer')[0], 'REVIEW_FIXES')).toBe('- None');

    expect(await readFile(ledger.pathOf('diff_round_1.patch'), 'utf8')).toContain('return f"Hello, {name}!"');
    const commands = await new LedgerReader(ledger.pathOf('ledger.jsonl')).findByType('command_executed');
    expect(commands.map((e) => e.data)).toEqual([{ round: 1, cmd: 'ls app', returncode: 0, blocked: false }]);
  });

  it('feeds the previous fixes to the next implementer round', async () => {
    const invoker = new ScriptedInvoker({
      implementer: ['RESULT: FAIL', 'RESULT: PASS'],
      reviewer: [FAIL_CONTINUE('add tests for farewell'), PASS_REPORT]
    });
    const { ctx, ledger } = await loopContext(invoker);

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome.reason).toBe('pass');
    expect(outcome.rounds.map((r) => r.state)).toEqual(['FAIL_CONTINUE', 'PASS']);
    expect(sectionOf(invoker.callsFor('implementer')[1], 'REVIEW_FIXES')).toBe('- add tests for farewell');
    expect(await readFile(ledger.pathOf('reviewer.txt'), 'utf8')).toBe(
      `=== ROUND 1 ===\n${FAIL_CONTINUE('add tests for farewell')}\n\n=== ROUND 2 ===\n${PASS_REPORT}\n\n`
    );
  });

  it('stops when the reviewer repeats itself', async () => {
    const invoker = new ScriptedInvoker({
      implementer: ['RESULT: FAIL', 'RESULT: FAIL'],
      reviewer: [FAIL_CONTINUE('same thing'), `${FAIL_CONTINUE('same thing')}\n`]
    });
    const { ctx, ledger } = await loopContext(invoker, testConfig({ maxRounds: 5 }));

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome).toMatchObject({ verdict: 'FAIL', action: 'SKIP', reason: 'stuck' });
    expect(outcome.rounds.map((r) => r.stuck)).toEqual([false, true]);
    expect(await new LedgerReader(ledger.pathOf('ledger.jsonl')).findByType('stuck_detected')).toHaveLength(1);
  });

  it('leaves the task open when the round ceiling is reached', async () => {
    const invoker = new ScriptedInvoker({
      implementer: ['RESULT: FAIL', 'RESULT: FAIL'],
      reviewer: [FAIL_CONTINUE('first'), FAIL_CONTINUE('second')]
    });
    const { ctx } = await loopContext(invoker, testConfig({ maxRounds: 2 }));

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome).toMatchObject({ verdict: 'FAIL', action: 'CONTINUE', reason: 'max_rounds' });
    expect(outcome.rounds.map((r) => r.state)).toEqual(['FAIL_CONTINUE', 'FAIL_SKIP']);
    expect(outcome.lastVerdict?.fixItems).toEqual(['second']);
  });

  it('skips the task on a malformed or skipping verdict', async () => {
    const malformed = await loopContext(new ScriptedInvoker({ implementer: ['RESULT: PASS'], reviewer: ['Looks fine to me.'] }));
    const out1 = await runFixupLoop(malformed.ctx, { docs, plan: PLAN });
    expect(out1).toMatchObject({ verdict: 'FAIL', action: 'SKIP', reason: 'malformed' });
    expect(out1.rounds[0]?.malformed).toBe(true);

    const skipping = await loopContext(new ScriptedInvoker({ implementer: ['RESULT: FAIL'], reviewer: ['VERDICT: FAIL\nACTION: SKIP\nFIXES:\n- out of scope'] }));
    const out2 = await runFixupLoop(skipping.ctx, { docs, plan: PLAN });
    expect(out2).toMatchObject({ verdict: 'FAIL', action: 'SKIP', reason: 'reviewer_skip' });
  });

  it('ends the loop when the implementer keeps failing', async () => {
    const reset = () => new TransientInvocationError('implementer', 'connection reset');
    const invoker = new ScriptedInvoker({ implementer: [reset(), reset(), reset()] });
    const { ctx, ledger } = await loopContext(invoker);

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome).toMatchObject({ verdict: 'FAIL', action: 'SKIP', reason: 'implementer_failed' });
    expect(outcome.rounds[0]?.error).toBe('TransientInvocationError: connection reset');
    expect(invoker.callsFor('reviewer')).toHaveLength(0);
    expect(ledger.attempts.map((a) => a.delayMs)).toEqual([0, 1000, 2000]);
  });

  it('keeps the implementer output when the reviewer fails', async () => {
    const invoker = new ScriptedInvoker({ implementer: ['RESULT: PASS'], reviewer: [new Error('model not found')] });
    const { ctx } = await loopContext(invoker);

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome.reason).toBe('reviewer_failed');
    expect(outcome.rounds[0]).toMatchObject({ implementerReport: 'RESULT: PASS', reviewerReport: null, error: 'Error: model not found' });
    expect(invoker.callsFor('reviewer')).toHaveLength(1);
  });

  it('skips the task when the review evidence cannot be collected', async () => {
    const invoker = new ScriptedInvoker({
      implementer: [
        async () => {
          await rm(join(ctx.paths.workspaceDir, '.git'), { recursive: true, force: true });
          return 'RESULT: PASS';
        }
      ]
    });
    const { ctx, ledger } = await loopContext(invoker);

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome).toMatchObject({ verdict: 'FAIL', action: 'SKIP', reason: 'evidence_failed', lastVerdict: null });
    expect(outcome.rounds).toHaveLength(1);
    expect(outcome.rounds[0]).toMatchObject({ state: 'FAIL_SKIP', implementerReport: 'RESULT: PASS', reviewerReport: null, diffPath: null });
    expect(outcome.rounds[0]?.error).toMatch(/^Error: git diff/);
    expect(invoker.callsFor('reviewer')).toHaveLength(0);

    const completed = await new LedgerReader(ledger.pathOf('ledger.jsonl')).findByType('round_completed');
    expect(completed.map((e) => e.data)).toEqual([{ round: 1, state: 'FAIL_SKIP', reason: 'evidence_failed' }]);
  });

  it('drops an earlier verdict when the final round fails before review', async () => {
    const invoker = new ScriptedInvoker({
      implementer: ['RESULT: FAIL', 'RESULT: FAIL'],
      reviewer: [FAIL_CONTINUE('DOCS: document farewell'), new Error('model not found')]
    });
    const { ctx } = await loopContext(invoker);

    const outcome = await runFixupLoop(ctx, { docs, plan: PLAN });
    expect(outcome.reason).toBe('reviewer_failed');
    expect(outcome.rounds).toHaveLength(2);
    expect(outcome.lastVerdict).toBeNull();
  });
});
