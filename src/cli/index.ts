#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runHistoryCommand } from './commands/history.js';
import { runRunCommand } from './commands/run.js';
import { createRenderer } from './ui/renderer.js';

interface GlobalFlags {
  verbose: boolean;
  quiet: boolean;
}

export function buildCli(): Command {
  const program = new Command();
  const version = detectVersionSync() ?? '0.0.0';

  program
    .name('fixloop')
    .description('Planner, implementer/reviewer fixup loop and tech writer over a local project')
    .version(version, '-v, --version')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)');

  const flags = (): GlobalFlags => {
    const o = program.opts<{ verbose?: boolean; quiet?: boolean }>();
    return { verbose: Boolean(o.verbose), quiet: Boolean(o.quiet) };
  };

  program
    .command('run')
    .description('Run the planner, the fixup loop and the tech writer once')
    .option('--root <dir>', 'Project root holding project/ and workspace/', process.cwd())
    .option('--max-rounds <n>', 'Override FIXLOOP_MAX_ROUNDS', parsePositiveInt)
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines on stderr)')
    .action(async (opts: { root: string; maxRounds?: number; verbose?: boolean; quiet?: boolean }) => {
      const global = flags();
      const verbose = global.verbose || Boolean(opts.verbose);
      const quiet = global.quiet || Boolean(opts.quiet);
      const res = await runRunCommand({
        root: opts.root,
        maxRounds: opts.maxRounds,
        verbose,
        quiet,
        renderer: createRenderer({ quiet, verbose })
      });
      process.exitCode = res.exitCode;
    });

  program
    .command('history')
    .description('List past runs, or print one run as a timeline')
    .option('--root <dir>', 'Project root holding project/', process.cwd())
    .option('--detail <run-id>', 'Show the full event timeline for a run')
    .action(async (opts: { root: string; detail?: string }) => {
      const res = await runHistoryCommand({ root: opts.root, detailRunId: opts.detail, renderer: createRenderer(flags()) });
      if (!res.ok) process.exitCode = 1;
    });

  return program;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
  return n;
}

function detectVersionSync(): string | null {
  try {
    let current = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') return parsed.version;
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

await buildCli().parseAsync(process.argv);
