import { join } from 'node:path';

import type { FixloopConfig } from '../config/index.js';
import { WorkspaceToolbox } from '../sandbox/toolbox.js';
import { isNotFound, readOptionalText, readText } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import { isEffectivelyEmpty, truncateForPrompt } from '../utils/text.js';
import { ConfigError, errorMessage } from './errors.js';
import { EvidenceAssembler } from './evidence/assembler.js';
import { openDiffSource } from './evidence/diff-source.js';
import { loadRedFlagCatalogue } from './evidence/red-flags.js';
import { outcomePair, runFixupLoop, type RoundRecord } from './fixup-loop.js';
import { RunLedger } from './ledger/run-ledger.js';
import type { StopReason } from './ledger/types.js';
import { plannerSections, techWriterSections, type ProjectDocs } from './roles/prompts.js';
import type { RoleInvoker } from './roles/types.js';
import { callRole, recordToolEvents, type ProjectPaths, type RunContext } from './run-context.js';
import type { Action, ParsedVerdict, Verdict } from './verdict/types.js';

export const DEMO_TASK = `Create a tiny Python package inside workspace/:
- app/greeter.py with a greet(name: str) -> str function
- pytest tests for greet
- workspace/requirements.txt listing pytest
- workspace/README.md with usage and test instructions
`;

export type TaskSource = 'current.md' | 'demo';

export type TechWriterTrigger = 'pass' | 'docs';

export interface RunOutcome {
  runId: string;
  runDir: string;
  verdict: Verdict;
  action: Action;
  reason: StopReason;
  rounds: readonly RoundRecord[];
  techWriterRan: boolean;
  taskSource: TaskSource;
  error: string | null;
}

export interface PipelineOptions {
  root: string;
  config: FixloopConfig;
  invoker: RoleInvoker;
  logger: Logger;
  now?: Date;
  sleep?: (ms: number) => Promise<void>;
  onStart?: (run: { runId: string; runDir: string; taskSource: TaskSource }) => void;
  onRound?: (record: RoundRecord) => void;
  onStage?: (stage: 'planner' | 'fixup' | 'tech_writer') => void;
}

export function resolveProjectPaths(root: string): ProjectPaths {
  const projectDir = join(root, 'project');
  return {
    root,
    projectDir,
    workspaceDir: join(root, 'workspace'),
    reportsDir: join(projectDir, 'reports')
  };
}

/**
 * Reads the task and the optional project docs. An effectively empty task falls back to the
 * demo task; a missing task file is a configuration problem.
 */
export async function loadProjectDocs(
  paths: ProjectPaths,
  backlogMaxChars: number
): Promise<{ docs: ProjectDocs; taskSource: TaskSource; backlogIncluded: boolean }> {
  const taskPath = join(paths.projectDir, 'tasks', 'current.md');
  let task: string;
  try {
    task = await readText(taskPath);
  } catch (err) {
    if (isNotFound(err)) throw new ConfigError([`Missing required task file: ${taskPath}`]);
    throw err;
  }

  const taskSource: TaskSource = isEffectivelyEmpty(task) ? 'demo' : 'current.md';
  const backlogRaw = await readOptionalText(join(paths.projectDir, 'tasks', 'backlog.md'));
  const backlog = isEffectivelyEmpty(backlogRaw) ? '' : truncateForPrompt(backlogRaw, backlogMaxChars, 'BACKLOG').text;

  const docs: ProjectDocs = {
    task: taskSource === 'demo' ? DEMO_TASK : task,
    backlog,
    vision: await readOptionalText(join(paths.projectDir, 'vision.md')),
    architecture: await readOptionalText(join(paths.projectDir, 'architecture.md')),
    conventions: await readOptionalText(join(paths.projectDir, 'conventions.md'))
  };
  return { docs, taskSource, backlogIncluded: backlog.trim().length > 0 };
}

/** PASS always gets documentation; a FAIL only when the final round's review asked for it. */
export function techWriterTrigger(verdict: Verdict, lastVerdict: ParsedVerdict | null): TechWriterTrigger | null {
  if (verdict === 'PASS') return 'pass';
  if (lastVerdict?.docsRequested) return 'docs';
  return null;
}

/** The final review's FIXES body, or nothing when it listed no fixes (a lone `- None`). */
export function techWriterFixes(lastVerdict: ParsedVerdict | null): string {
  if (!lastVerdict) return '';
  return lastVerdict.fixItems.length > 0 || lastVerdict.docsRequested ? lastVerdict.fixes : '';
}

/** Paths under `project/` the Tech Writer may not touch for a given outcome. */
export function techWriterProtectedPaths(verdict: Verdict): string[] {
  const always = ['reports', 'reports/**'];
  return verdict === 'PASS' ? always : [...always, 'tasks/backlog.md', 'tasks/done.md'];
}

function roundArtifact(r: RoundRecord) {
  return {
    round: r.round,
    state: r.state,
    reason: r.reason,
    verdict: r.verdict,
    stuck: r.stuck,
    malformed: r.malformed,
    error: r.error,
    diffPath: r.diffPath,
    diffTruncated: r.diffTruncated,
    changes: r.changes,
    redFlags: r.redFlags,
    implementerResult: r.implementer?.result ?? null,
    reportedChanges: r.implementer?.changes ?? [],
    reportedCommands: r.implementer?.commands ?? [],
    observedCommands: r.toolEvents.flatMap((e) =>
      e.tool === 'run_cmd' ? [{ cmd: e.cmd, returncode: e.returncode, blocked: e.blocked, blockedReason: e.blockedReason ?? null }] : []
    ),
    filesWritten: r.toolEvents.flatMap((e) => (e.tool === 'fs_write' ? [e.path] : []))
  };
}

interface TechWriterArtifact {
  ran: boolean;
  trigger: TechWriterTrigger | null;
  taskRecordsWritable: boolean;
  path: string | null;
  filesWritten: string[];
  error: string | null;
}

/** Planner, fixup loop, then Tech Writer. Role failures end the run as a FAIL outcome, never as an exception. */
export async function runPipeline(opts: PipelineOptions): Promise<RunOutcome> {
  const { config, logger } = opts;
  const paths = resolveProjectPaths(opts.root);
  const { docs, taskSource, backlogIncluded } = await loadProjectDocs(paths, config.plannerBacklogMaxChars);

  const ledger = await RunLedger.create(paths.reportsDir, opts.now);
  const log = logger.child({ runId: ledger.runId });
  const startedAt = new Date().toISOString();

  // Baseline before any role can touch the product subtree.
  const diffSource = await openDiffSource(paths.workspaceDir);
  const catalogue = await loadRedFlagCatalogue(join(paths.projectDir, 'red-flags.yaml'));
  const evidence = new EvidenceAssembler(diffSource, paths.workspaceDir, catalogue, {
    diffMaxChars: config.reviewerDiffMaxChars,
    redFlagsMaxChars: config.reviewerRedFlagsMaxChars
  });

  let planPath: string | null = null;
  let rounds: readonly RoundRecord[] = [];
  let techWriter: TechWriterArtifact | null = null;

  const snapshot = (final: { verdict: Verdict; action: Action; reason: StopReason; error: string | null } | null) => ({
    runId: ledger.runId,
    runDir: ledger.runDir,
    startedAt,
    endedAt: final ? new Date().toISOString() : null,
    taskSource,
    backlogIncluded,
    config: {
      models: config.models,
      maxTurns: config.maxTurns,
      maxRounds: config.maxRounds,
      retry: config.retry,
      reviewerDiffMaxChars: config.reviewerDiffMaxChars,
      reviewerRedFlagsMaxChars: config.reviewerRedFlagsMaxChars,
      plannerBacklogMaxChars: config.plannerBacklogMaxChars,
      commandTimeoutSeconds: config.commandTimeoutSeconds
    },
    diff: { topology: diffSource.topology, baseline: diffSource.baseline },
    planPath,
    attempts: ledger.attempts,
    rounds: rounds.map(roundArtifact),
    techWriter,
    finalVerdict: final?.verdict ?? null,
    finalAction: final?.action ?? null,
    reason: final?.reason ?? null,
    error: final?.error ?? null
  });

  // artifacts.json is refreshed after every round so an interrupted run still leaves a record.
  const ctx: RunContext = {
    config,
    paths,
    invoker: opts.invoker,
    ledger,
    evidence,
    logger: log,
    sleep: opts.sleep,
    onRound: async (record) => {
      rounds = [...rounds, record];
      await ledger.writeArtifacts(snapshot(null));
      opts.onRound?.(record);
    }
  };

  const complete = async (reason: StopReason, error: string | null, techWriterRan: boolean): Promise<RunOutcome> => {
    const { verdict, action } = outcomePair(reason);
    await ledger.writeArtifacts(snapshot({ verdict, action, reason, error }));
    await ledger.record({ type: 'run_completed', data: { verdict, action, reason, rounds: rounds.length } });
    log.info('run completed', { verdict, action, reason, rounds: rounds.length });
    return { runId: ledger.runId, runDir: ledger.runDir, verdict, action, reason, rounds, techWriterRan, taskSource, error };
  };

  await ledger.record({
    type: 'run_started',
    data: { runId: ledger.runId, taskSource, topology: diffSource.topology, baseline: diffSource.baseline }
  });
  await ledger.writeArtifacts(snapshot(null));
  log.info('run started', { taskSource, topology: diffSource.topology });
  opts.onStart?.({ runId: ledger.runId, runDir: ledger.runDir, taskSource });

  // ── Planner ────────────────────────────────────────────────────────────────
  opts.onStage?.('planner');
  let plan: string;
  try {
    plan = await callRole(ctx, { role: 'planner', round: null, sections: plannerSections(docs) });
  } catch (err) {
    log.error('planner failed', { error: errorMessage(err) });
    return await complete('planner_failed', `Planner failed: ${errorMessage(err)}`, false);
  }
  planPath = await ledger.writePlan(plan);

  // ── Fixup loop ─────────────────────────────────────────────────────────────
  opts.onStage?.('fixup');
  const loop = await runFixupLoop(ctx, { docs, plan });
  rounds = loop.rounds;
  const loopError = rounds.at(-1)?.error ?? null;

  // ── Tech writer ────────────────────────────────────────────────────────────
  const trigger = techWriterTrigger(loop.verdict, loop.lastVerdict);
  const taskRecordsWritable = loop.verdict === 'PASS';
  await ledger.record({ type: 'tech_writer_decision', data: { run: trigger !== null, trigger, taskRecordsWritable } });
  if (!trigger) return await complete(loop.reason, loopError, false);

  opts.onStage?.('tech_writer');
  const toolbox = new WorkspaceToolbox({
    baseDir: paths.projectDir,
    allowWrite: true,
    allowCommands: false,
    protectedPaths: techWriterProtectedPaths(loop.verdict)
  });
  const finalVerdict = [`VERDICT: ${loop.verdict}`, `ACTION: ${loop.action}`, `REASON: ${loop.reason}`].join('\n');

  let report: string;
  try {
    report = await callRole(ctx, {
      role: 'tech_writer',
      round: null,
      sections: techWriterSections(docs.task, finalVerdict, techWriterFixes(loop.lastVerdict)),
      toolbox
    });
  } catch (err) {
    await recordToolEvents(ctx, 'tech_writer', null, toolbox);
    log.error('tech writer failed', { error: errorMessage(err) });
    techWriter = { ran: true, trigger, taskRecordsWritable, path: null, filesWritten: [], error: errorMessage(err) };
    return await complete('tech_writer_failed', `Tech writer failed: ${errorMessage(err)}`, true);
  }

  await recordToolEvents(ctx, 'tech_writer', null, toolbox);
  techWriter = {
    ran: true,
    trigger,
    taskRecordsWritable,
    path: await ledger.writeTechWriter(report),
    filesWritten: toolbox.events.flatMap((e) => (e.tool === 'fs_write' ? [e.path] : [])),
    error: null
  };

  return await complete(loop.reason, loopError, true);
}
