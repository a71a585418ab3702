import { realpath } from 'node:fs/promises';
import { relative, sep } from 'node:path';

import {
  changeSummary,
  diffAgainst,
  findTopLevel,
  git,
  listUntracked,
  noIndexDiff,
  resolveBaseline,
  type GitRepo
} from '../../git/operations.js';
import type { ChangeSummary } from '../../git/diff-parser.js';
import { fileExists } from '../../utils/fs.js';

export type DiffTopology = 'standalone' | 'nested' | 'none';

export interface DiffSource {
  readonly topology: DiffTopology;
  /** Commit (or empty tree) captured when the source was opened; null without a repository. */
  readonly baseline: string | null;
  /** Tracked diff followed by one creation patch per untracked file, exactly as git printed them. */
  computeDiff(): Promise<string>;
  summarize(): Promise<ChangeSummary>;
}

/** Shared by both git-backed topologies; they differ only in where git runs and the pathspec. */
abstract class GitDiffSource implements DiffSource {
  abstract readonly topology: DiffTopology;

  protected constructor(
    protected readonly repo: GitRepo,
    protected readonly pathspec: string,
    readonly baseline: string
  ) {}

  async computeDiff(): Promise<string> {
    const tracked = await diffAgainst(this.repo, this.baseline, this.pathspec);
    const untracked = await listUntracked(this.repo, this.pathspec);

    const parts = [tracked];
    for (const path of untracked) parts.push(await noIndexDiff(this.repo, path));
    return parts.join('');
  }

  async summarize(): Promise<ChangeSummary> {
    return await changeSummary(this.repo, this.baseline, this.pathspec);
  }
}

/** The product subtree is itself the top level of a git work tree. */
export class StandaloneDiffSource extends GitDiffSource {
  readonly topology = 'standalone' as const;

  static async open(productRoot: string): Promise<StandaloneDiffSource> {
    const repo = git(productRoot);
    return new StandaloneDiffSource(repo, '.', await resolveBaseline(repo));
  }
}

/** The product subtree lives inside an enclosing repository; git runs at its top level. */
export class NestedDiffSource extends GitDiffSource {
  readonly topology = 'nested' as const;

  static async open(topLevel: string, relativePath: string): Promise<NestedDiffSource> {
    const repo = git(topLevel);
    return new NestedDiffSource(repo, relativePath, await resolveBaseline(repo));
  }
}

export class NoRepositoryDiffSource implements DiffSource {
  readonly topology = 'none' as const;
  readonly baseline = null;

  async computeDiff(): Promise<string> {
    return '';
  }

  async summarize(): Promise<ChangeSummary> {
    return { files: [], additions: 0, deletions: 0 };
  }
}

/** Detects the topology of `productRoot` and captures its baseline. Call once, before any role runs. */
export async function openDiffSource(productRoot: string): Promise<DiffSource> {
  if (!(await fileExists(productRoot))) return new NoRepositoryDiffSource();

  const topLevel = await findTopLevel(productRoot);
  if (!topLevel) return new NoRepositoryDiffSource();

  const [realTop, realProduct] = await Promise.all([realpath(topLevel), realpath(productRoot)]);
  const rel = relative(realTop, realProduct);
  if (rel === '') return await StandaloneDiffSource.open(realProduct);
  return await NestedDiffSource.open(realTop, rel.split(sep).join('/'));
}
