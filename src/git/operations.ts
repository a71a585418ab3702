import { execa } from 'execa';

import { summarizeChanges, type ChangeSummary } from './diff-parser.js';

/** `git hash-object -t tree /dev/null`: the baseline for a repository with no commits. */
export const EMPTY_TREE = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';

export interface GitRepo {
  repoRoot: string;
}

export function git(repoRoot: string): GitRepo {
  return { repoRoot };
}

interface GitResult {
  stdout: string;
  stderr: string;
}

async function exec(repo: GitRepo, args: string[], okExitCodes: number[] = [0]): Promise<GitResult> {
  const res = await execa('git', args, {
    cwd: repo.repoRoot,
    stdout: 'pipe',
    stderr: 'pipe',
    reject: false,
    // Patches are persisted byte for byte.
    stripFinalNewline: false
  });
  if (res.exitCode === undefined || !okExitCodes.includes(res.exitCode)) {
    throw new Error(`git ${args.join(' ')} failed (${res.exitCode ?? 'no exit code'}): ${res.stderr.trim()}`);
  }
  return { stdout: res.stdout, stderr: res.stderr };
}

async function run(repo: GitRepo, args: string[]): Promise<string> {
  return (await exec(repo, args)).stdout;
}

/**
 * `git diff --no-index` exits 1 when the inputs differ, and also when it cannot read one of them;
 * only the second writes to stderr.
 */
async function runNoIndex(repo: GitRepo, args: string[]): Promise<string> {
  const res = await exec(repo, ['diff', '--no-index', ...args], [0, 1]);
  if (res.stderr.trim()) throw new Error(`git diff --no-index ${args.join(' ')} failed: ${res.stderr.trim()}`);
  return res.stdout;
}

/** Absolute top level of the work tree containing `dir`, or null outside any repository. */
export async function findTopLevel(dir: string): Promise<string | null> {
  const res = await execa('git', ['rev-parse', '--show-toplevel'], { cwd: dir, reject: false });
  if (res.exitCode !== 0) return null;
  const top = res.stdout.trim();
  return top || null;
}

export async function getCurrentCommit(repo: GitRepo): Promise<string | null> {
  const res = await execa('git', ['rev-parse', '--verify', '--quiet', 'HEAD'], { cwd: repo.repoRoot, reject: false });
  if (res.exitCode !== 0) return null;
  return res.stdout.trim() || null;
}

/** HEAD at this moment, or the empty tree when nothing has been committed yet. */
export async function resolveBaseline(repo: GitRepo): Promise<string> {
  return (await getCurrentCommit(repo)) ?? EMPTY_TREE;
}

/** Tracked changes (staged and unstaged) between `baseline` and the working tree. */
export async function diffAgainst(repo: GitRepo, baseline: string, pathspec: string): Promise<string> {
  return await run(repo, ['diff', '--no-color', baseline, '--', pathspec]);
}

export async function listUntracked(repo: GitRepo, pathspec: string): Promise<string[]> {
  // -z: names come back verbatim instead of C-quoted.
  const out = await run(repo, ['ls-files', '-z', '--others', '--exclude-standard', '--', pathspec]);
  return out
    .split('\0')
    .filter((name) => name.length > 0)
    .sort();
}

/** Patch creating `path` from nothing. */
export async function noIndexDiff(repo: GitRepo, path: string): Promise<string> {
  return await runNoIndex(repo, ['--no-color', '--', '/dev/null', path]);
}

export async function changeSummary(repo: GitRepo, baseline: string, pathspec: string): Promise<ChangeSummary> {
  const [nameStatus, numStat, untrackedPaths] = await Promise.all([
    run(repo, ['-c', 'core.quotePath=false', 'diff', '--name-status', baseline, '--', pathspec]),
    run(repo, ['-c', 'core.quotePath=false', 'diff', '--numstat', baseline, '--', pathspec]),
    listUntracked(repo, pathspec)
  ]);

  const untracked = await Promise.all(
    untrackedPaths.map(async (path) => {
      const out = await runNoIndex(repo, ['--numstat', '--', '/dev/null', path]);
      const adds = Number.parseInt(out.split('\t')[0] ?? '', 10);
      return { path, lines: Number.isFinite(adds) ? adds : 0 };
    })
  );

  return summarizeChanges({ nameStatus, numStat, untracked });
}
