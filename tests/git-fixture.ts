import { execa } from 'execa';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export async function createTempDir(prefix = 'fixloop-'): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

export async function initRepo(dir: string): Promise<void> {
  await execa('git', ['init', '-q'], { cwd: dir });
  await execa('git', ['config', 'user.email', 'test@example.com'], { cwd: dir });
  await execa('git', ['config', 'user.name', 'Fixloop Test'], { cwd: dir });
  await execa('git', ['config', 'commit.gpgsign', 'false'], { cwd: dir });
}

export async function commitAll(dir: string, message = 'init'): Promise<void> {
  await execa('git', ['add', '-A'], { cwd: dir });
  await execa('git', ['commit', '-q', '-m', message], { cwd: dir });
}

/** A repository with one commit holding README.md. */
export async function createTempGitRepo(): Promise<{ dir: string }> {
  const dir = await createTempDir('fixloop-git-');
  await initRepo(dir);
  await writeFile(join(dir, 'README.md'), '# temp\n', 'utf8');
  await commitAll(dir);
  return { dir };
}

export async function writeFileInRepo(repoDir: string, relPath: string, content: string): Promise<void> {
  const abs = join(repoDir, relPath);
  await mkdir(dirname(abs), { recursive: true });
  await writeFile(abs, content, 'utf8');
}
