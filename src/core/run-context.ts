import type { FixloopConfig } from '../config/index.js';
import type { Logger } from '../utils/logger.js';
import type { EvidenceAssembler } from './evidence/assembler.js';
import type { RunLedger } from './ledger/run-ledger.js';
import { withRetry } from './retry.js';
import type { PromptSections, RoleInvoker, RoleName } from './roles/types.js';
import type { RoundRecord } from './fixup-loop.js';
import type { WorkspaceToolbox } from '../sandbox/toolbox.js';

export interface ProjectPaths {
  root: string;
  /** `<root>/project`: task records, docs, prompts and reports. */
  projectDir: string;
  /** `<root>/workspace`: the product subtree. */
  workspaceDir: string;
  reportsDir: string;
}

/** Everything one run needs, passed explicitly; nothing here outlives the run. */
export interface RunContext {
  config: FixloopConfig;
  paths: ProjectPaths;
  invoker: RoleInvoker;
  ledger: RunLedger;
  evidence: EvidenceAssembler;
  logger: Logger;
  /** Backoff sleep; tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
  onRound?: (record: RoundRecord) => void | Promise<void>;
}

export interface RoleCall {
  role: RoleName;
  round: number | null;
  sections: PromptSections;
  toolbox?: WorkspaceToolbox;
}

/** One role invocation inside the retry envelope; every attempt lands in the ledger. */
export async function callRole(ctx: RunContext, call: RoleCall): Promise<string> {
  const { role, round, sections, toolbox } = call;
  const run = withRetry(
    () => ctx.invoker.invoke({ role, sections, turnCeiling: ctx.config.maxTurns[role], toolbox }),
    ctx.config.retry[role],
    {
      sleep: ctx.sleep,
      onAttempt: async (attempt) => {
        if (!attempt.outcome.ok) ctx.logger.warn('role attempt failed', { role, round, attempt: attempt.attempt, error: attempt.outcome.error });
        await ctx.ledger.recordAttempt(role, round, attempt);
      }
    }
  );
  return await run();
}

/** Mirrors the toolbox's writes (and commands, for rounds) into the event stream. */
export async function recordToolEvents(ctx: RunContext, role: RoleName, round: number | null, toolbox: WorkspaceToolbox): Promise<void> {
  for (const e of toolbox.events) {
    if (e.tool === 'fs_write') {
      await ctx.ledger.record({ type: 'file_written', data: { role, round, path: e.path, bytes: e.bytes } });
    } else if (e.tool === 'run_cmd' && round !== null) {
      await ctx.ledger.record({
        type: 'command_executed',
        data: { round, cmd: e.cmd, returncode: e.returncode, blocked: e.blocked, ...(e.blockedReason ? { blockedReason: e.blockedReason } : {}) }
      });
    }
  }
}
