import { join, resolve } from 'node:path';
import dotenv from 'dotenv';

import { loadConfig, type FixloopConfig } from '../../config/index.js';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { runPipeline, resolveProjectPaths, type RunOutcome } from '../../core/pipeline.js';
import { OpenAIRoleInvoker, type OpenAIRoleInvokerOptions } from '../../core/roles/openai-invoker.js';
import type { RoleInvoker } from '../../core/roles/types.js';
import { readOptionalText } from '../../utils/fs.js';
import { Logger } from '../../utils/logger.js';
import { roundLine } from '../ui/format.js';
import type { Renderer } from '../ui/renderer.js';
import type { SpinnerHandle } from '../ui/spinner.js';

export const EXIT_PASS = 0;
export const EXIT_FAIL = 1;
export const EXIT_CONFIG = 2;

export interface RunCommandOptions {
  root?: string;
  maxRounds?: number;
  verbose?: boolean;
  quiet?: boolean;
  renderer: Renderer;
  /** Defaults to `process.env`; `<root>/.env` is loaded into it without overriding set values. */
  env?: NodeJS.ProcessEnv;
  /** Where the plain status lines go. */
  out?: NodeJS.WritableStream;
  createInvoker?: (opts: OpenAIRoleInvokerOptions) => Promise<RoleInvoker>;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunCommandResult {
  exitCode: number;
  outcome: RunOutcome | null;
}

/**
 * `fixloop run`: one Planner → fixup loop → Tech Writer pass over `<root>`. Status lines go to
 * stdout; decoration and logs go to stderr.
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<RunCommandResult> {
  const r = opts.renderer;
  const out = opts.out ?? process.stdout;
  const env = opts.env ?? process.env;
  const root = resolve(opts.root ?? process.cwd());

  await loadDotenv(join(root, '.env'), env);

  let config: FixloopConfig;
  let apiKey: string;
  try {
    config = loadConfig(env);
    if (opts.maxRounds !== undefined) {
      if (!Number.isInteger(opts.maxRounds) || opts.maxRounds < 1) {
        throw new ConfigError([`--max-rounds must be a positive integer (got ${opts.maxRounds})`]);
      }
      config = { ...config, maxRounds: opts.maxRounds };
    }
    apiKey = env.OPENAI_API_KEY?.trim() ?? '';
    if (!apiKey && !opts.createInvoker) throw new ConfigError(['OPENAI_API_KEY is not set (environment or <root>/.env)']);
  } catch (err) {
    return configFailure(r, err);
  }

  const logger = new Logger({
    level: opts.verbose ? 'debug' : opts.quiet ? 'error' : config.logLevel,
    json: opts.quiet ? true : config.logJson
  });
  const paths = resolveProjectPaths(root);
  const invokerOptions: OpenAIRoleInvokerOptions = {
    apiKey,
    models: config.models,
    promptsDir: join(paths.projectDir, 'prompts'),
    logger
  };
  const createInvoker = opts.createInvoker ?? ((o: OpenAIRoleInvokerOptions) => OpenAIRoleInvoker.create(o));

  let spinner: SpinnerHandle | null = null;
  const stopSpinner = () => {
    spinner?.stop();
    spinner = null;
  };
  const startedAt = Date.now();

  try {
    const invoker = await createInvoker(invokerOptions);
    const outcome = await runPipeline({
      root,
      config,
      invoker,
      logger,
      sleep: opts.sleep,
      onStart: (run) => {
        out.write(`Reports: ${run.runDir}\n`);
        if (run.taskSource === 'demo') r.warn('project/tasks/current.md is empty; running the demo task.');
      },
      onStage: (stage) => {
        stopSpinner();
        if (stage === 'planner') {
          r.stageBanner('Planner');
          spinner = r.spinner('Planning…');
        } else if (stage === 'fixup') {
          r.roleComplete('planner', 'Plan written');
          r.stageBanner('Fixup loop');
          spinner = r.spinner('Round 1: implementing…');
        } else {
          r.stageBanner('Tech writer');
          spinner = r.spinner('Updating documentation…');
        }
      },
      onRound: (record) => {
        stopSpinner();
        out.write(`${roundLine(record)}\n`);
        if (record.reason === 'evidence_failed') r.error('Could not collect review evidence', record.error ?? 'unknown error');
        else if (record.error) r.roleFailed(record.reason === 'reviewer_failed' ? 'reviewer' : 'implementer', record.error);
        else if (record.state !== 'PASS' && record.verdict) r.dim(`  ${record.verdict.fixItems.length} fix item(s)${record.stuck ? ', reviewer repeated itself' : ''}`);
        if (record.state === 'FAIL_CONTINUE') spinner = r.spinner(`Round ${record.round + 1}: implementing…`);
      }
    });
    stopSpinner();

    if (outcome.reason === 'planner_failed') r.roleFailed('planner', outcome.error ?? 'failed');
    if (outcome.reason === 'tech_writer_failed') r.roleFailed('tech_writer', outcome.error ?? 'failed');
    else if (outcome.techWriterRan) r.roleComplete('tech_writer', 'Documentation updated');

    out.write(`Verdict: ${outcome.verdict}\n`);
    out.write(`Action: ${outcome.action}\n`);
    r.runComplete({
      runId: outcome.runId,
      runDir: outcome.runDir,
      verdict: outcome.verdict,
      action: outcome.action,
      reason: outcome.reason,
      rounds: outcome.rounds.length,
      durationMs: Date.now() - startedAt
    });
    return { exitCode: outcome.verdict === 'PASS' ? EXIT_PASS : EXIT_FAIL, outcome };
  } catch (err) {
    stopSpinner();
    if (err instanceof ConfigError) return configFailure(r, err);
    r.error('Run failed', errorMessage(err), 'Try running with --verbose for more details.');
    return { exitCode: EXIT_FAIL, outcome: null };
  }
}

/** Values already in `env` win over the file. */
async function loadDotenv(path: string, env: NodeJS.ProcessEnv): Promise<void> {
  const parsed = dotenv.parse(await readOptionalText(path));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) env[key] = value;
  }
}

function configFailure(r: Renderer, err: unknown): RunCommandResult {
  if (!(err instanceof ConfigError)) throw err;
  r.error('Configuration error', err.issues.join('\n'), 'Check the FIXLOOP_* variables and <root>/.env.');
  return { exitCode: EXIT_CONFIG, outcome: null };
}
