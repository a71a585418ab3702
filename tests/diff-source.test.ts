import { describe, expect, it } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { openDiffSource } from '../src/core/evidence/diff-source.js';
import { EMPTY_TREE, git, noIndexDiff } from '../src/git/operations.js';
import { commitAll, createTempDir, createTempGitRepo, initRepo, writeFileInRepo } from './git-fixture.js';

describe('openDiffSource', () => {
  it('diffs a standalone repository against the HEAD captured at open time', async () => {
    const { dir } = await createTempGitRepo();
    const source = await openDiffSource(dir);
    expect(source.topology).toBe('standalone');
    expect(source.baseline).toMatch(/^[0-9a-f]{40}$/);

    await writeFileInRepo(dir, 'README.md', '# temp\nhello\n');
    await writeFileInRepo(dir, 'app.py', 'print(1)\n');

    const diff = await source.computeDiff();
    expect(diff).toContain('diff --git a/README.md b/README.md');
    expect(diff).toContain('+hello');
    expect(diff).toContain('+++ b/app.py');
    expect(diff).toContain('+print(1)');
    expect(diff.indexOf('README.md')).toBeLessThan(diff.indexOf('app.py'));

    const summary = await source.summarize();
    expect(summary.files).toHaveLength(2);
    expect(summary.files).toEqual(
      expect.arrayContaining([
        { path: 'README.md', changeType: 'modified', additions: 1, deletions: 0 },
        { path: 'app.py', changeType: 'added', additions: 1, deletions: 0 }
      ])
    );
    expect(summary.additions).toBe(2);
  });

  it('scopes a nested product directory to its own subtree', async () => {
    const { dir } = await createTempGitRepo();
    await writeFileInRepo(dir, 'workspace/a.txt', 'one\n');
    await commitAll(dir, 'add workspace');

    const source = await openDiffSource(join(dir, 'workspace'));
    expect(source.topology).toBe('nested');

    await writeFileInRepo(dir, 'workspace/a.txt', 'one\ntwo\n');
    await writeFileInRepo(dir, 'workspace/new.txt', 'fresh\n');
    await writeFileInRepo(dir, 'other.txt', 'outside\n');

    const diff = await source.computeDiff();
    expect(diff).toContain('+++ b/workspace/a.txt');
    expect(diff).toContain('+two');
    expect(diff).toContain('+++ b/workspace/new.txt');
    expect(diff).not.toContain('other.txt');
  });

  it('includes new files whose names git would quote', async () => {
    const { dir } = await createTempGitRepo();
    const source = await openDiffSource(dir);

    await writeFileInRepo(dir, 'café.py', 'y = 1\n');
    await writeFileInRepo(dir, 'notes "draft".md', 'draft\n');

    const diff = await source.computeDiff();
    expect(diff).toContain('+y = 1');
    expect(diff).toContain('+draft');

    const summary = await source.summarize();
    expect(summary.files).toEqual([
      { path: 'café.py', changeType: 'added', additions: 1, deletions: 0 },
      { path: 'notes "draft".md', changeType: 'added', additions: 1, deletions: 0 }
    ]);
  });

  it('fails loudly when a new file cannot be read', async () => {
    const { dir } = await createTempGitRepo();
    await expect(noIndexDiff(git(dir), 'does-not-exist.py')).rejects.toThrow(/--no-index/);
  });

  it('uses the empty tree when the repository has no commits', async () => {
    const dir = await createTempDir();
    await initRepo(dir);
    await writeFileInRepo(dir, 'x.txt', 'x\n');

    const source = await openDiffSource(dir);
    expect(source.baseline).toBe(EMPTY_TREE);
    expect(await source.computeDiff()).toContain('+++ b/x.txt');
  });

  it('has nothing to diff outside a repository', async () => {
    const dir = await createTempDir();
    const plain = await openDiffSource(dir);
    expect(plain.topology).toBe('none');
    expect(plain.baseline).toBeNull();
    expect(await plain.computeDiff()).toBe('');

    const missing = join(dir, 'missing');
    expect((await openDiffSource(missing)).topology).toBe('none');

    await mkdir(join(dir, 'empty'));
    expect(await (await openDiffSource(join(dir, 'empty'))).summarize()).toEqual({ files: [], additions: 0, deletions: 0 });
  });
});
