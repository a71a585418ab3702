export { loadConfig, DEFAULT_MODEL, DEFAULT_MAX_ROUNDS, type FixloopConfig, type RetrySettings } from './config/index.js';
export {
  ConfigError,
  FatalInvocationError,
  LedgerWriteError,
  MaxTurnsExceededError,
  SandboxError,
  TransientInvocationError
} from './core/errors.js';
export { runPipeline, resolveProjectPaths, DEMO_TASK, type PipelineOptions, type RunOutcome } from './core/pipeline.js';
export { runFixupLoop, decideRound, type RoundRecord, type LoopOutcome } from './core/fixup-loop.js';
export { withRetry, classifyInvocationError, backoffDelayMs, type RetryPolicy } from './core/retry.js';
export { parseReviewerReport, parseImplementerReport } from './core/verdict/parser.js';
export type { ParsedVerdict, ParsedImplementerReport, Verdict, Action } from './core/verdict/types.js';
export { StuckDetector } from './core/stuck-detector.js';
export { OpenAIRoleInvoker, type OpenAIRoleInvokerOptions } from './core/roles/openai-invoker.js';
export { ROLE_NAMES, type RoleName, type RoleInvoker, type RoleInvocation, type PromptSections } from './core/roles/types.js';
export { WorkspaceToolbox, type ToolEvent, type CommandResult, type ToolboxOptions } from './sandbox/toolbox.js';
export { LedgerReader } from './core/ledger/reader.js';
export { listRuns, type RunSummary } from './core/ledger/run-index.js';
export { Logger, type LogLevel } from './utils/logger.js';
