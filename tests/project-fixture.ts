import { join } from 'node:path';

import { loadConfig, type FixloopConfig } from '../src/config/index.js';
import { commitAll, createTempDir, initRepo, writeFileInRepo } from './git-fixture.js';

export interface ProjectFixture {
  root: string;
  workspaceDir: string;
  projectDir: string;
}

/**
 * `<root>/project` with a task file and `<root>/workspace` as a standalone repository holding one
 * committed README.
 */
export async function createProject(opts: { task?: string | null; git?: boolean } = {}): Promise<ProjectFixture> {
  const root = await createTempDir('fixloop-project-');
  const projectDir = join(root, 'project');
  const workspaceDir = join(root, 'workspace');

  if (opts.task !== null) await writeFileInRepo(projectDir, 'tasks/current.md', opts.task ?? '# Current task\nAdd a farewell() function\n');
  else await writeFileInRepo(projectDir, 'vision.md', 'A greeter.\n');

  await writeFileInRepo(workspaceDir, 'README.md', '# workspace\n');
  if (opts.git !== false) {
    await initRepo(workspaceDir);
    await commitAll(workspaceDir);
  }
  return { root, workspaceDir, projectDir };
}

export function testConfig(overrides: Partial<FixloopConfig> = {}): FixloopConfig {
  return { ...loadConfig({}), ...overrides };
}

export const noSleep = async (_ms: number): Promise<void> => {};
