import { beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { FatalInvocationError, MaxTurnsExceededError, TransientInvocationError } from '../src/core/errors.js';
import { OpenAIRoleInvoker } from '../src/core/roles/openai-invoker.js';
import { renderSections } from '../src/core/roles/prompts.js';
import { WorkspaceToolbox } from '../src/sandbox/toolbox.js';
import { silentLogger } from '../src/utils/logger.js';
import { createTempDir, writeFileInRepo } from './git-fixture.js';

interface AgentConfig {
  name: string;
  model: string;
  instructions: string;
  tools: Array<{ name: string }>;
}

const mocks = vi.hoisted(() => {
  class AgentsMaxTurnsExceededError extends Error {
    constructor() {
      super('Max turns exceeded');
      this.name = 'MaxTurnsExceededError';
    }
  }
  const agents: AgentConfig[] = [];
  return { run: vi.fn(), setKey: vi.fn(), agents, AgentsMaxTurnsExceededError };
});

vi.mock('@openai/agents', () => ({
  Agent: class {
    constructor(config: AgentConfig) {
      mocks.agents.push(config);
    }
  },
  Runner: class {
    run = mocks.run;
  },
  MaxTurnsExceededError: mocks.AgentsMaxTurnsExceededError,
  setDefaultOpenAIKey: mocks.setKey,
  tool: (config: { name: string }) => config
}));

const models = { planner: 'model-p', implementer: 'model-i', reviewer: 'model-r', tech_writer: 'model-t' };

async function makeInvoker(promptsDir: string) {
  return await OpenAIRoleInvoker.create({ apiKey: 'test-secret', models, promptsDir, logger: silentLogger });
}

describe('OpenAIRoleInvoker', () => {
  beforeEach(() => {
    mocks.run.mockReset();
    mocks.agents.length = 0;
  });

  it('runs one agent per call with the rendered sections and the granted tools', async () => {
    const dir = await createTempDir();
    const workspace = join(dir, 'workspace');
    await mkdir(workspace);
    mocks.run.mockResolvedValueOnce({ finalOutput: 'RESULT: PASS' });
    const invoker = await makeInvoker(join(dir, 'prompts'));
    const sections: Array<[string, string]> = [
      ['TASK', 'Add farewell()'],
      ['PLAN', '']
    ];

    const out = await invoker.invoke({
      role: 'implementer',
      sections,
      turnCeiling: 12,
      toolbox: new WorkspaceToolbox({ baseDir: workspace, allowWrite: true, allowCommands: false })
    });

    expect(out).toBe('RESULT: PASS');
    expect(mocks.setKey).toHaveBeenCalledWith('test-secret');
    expect(mocks.run).toHaveBeenCalledWith(expect.anything(), 'TASK:\nAdd farewell()\n\nPLAN:\n- None\n\n', { maxTurns: 12 });
    expect(renderSections(sections)).toBe('TASK:\nAdd farewell()\n\nPLAN:\n- None\n\n');

    const [agent] = mocks.agents;
    expect(agent?.name).toBe('Implementer');
    expect(agent?.model).toBe('model-i');
    expect(agent?.instructions.startsWith('You are Implementer.')).toBe(true);
    expect(agent?.tools.map((t) => t.name)).toEqual(['fs_read', 'fs_list', 'fs_write']);
  });

  it('uses a project instruction override and gives tool-less roles no tools', async () => {
    const dir = await createTempDir();
    await writeFileInRepo(dir, 'prompts/reviewer.md', '\nReview strictly.\n');
    mocks.run.mockResolvedValueOnce({ finalOutput: undefined });
    const invoker = await makeInvoker(join(dir, 'prompts'));

    expect(await invoker.invoke({ role: 'reviewer', sections: [], turnCeiling: 3 })).toBe('');
    expect(mocks.agents[0]?.instructions).toBe('Review strictly.');
    expect(mocks.agents[0]?.tools).toEqual([]);
  });

  it('maps backend failures onto the invocation error taxonomy', async () => {
    const invoker = await makeInvoker(join(await createTempDir(), 'prompts'));
    const call = { role: 'planner' as const, sections: [], turnCeiling: 4 };

    mocks.run.mockRejectedValueOnce(new mocks.AgentsMaxTurnsExceededError());
    await expect(invoker.invoke(call)).rejects.toBeInstanceOf(MaxTurnsExceededError);

    mocks.run.mockRejectedValueOnce(Object.assign(new Error('upstream unavailable'), { status: 503 }));
    await expect(invoker.invoke(call)).rejects.toBeInstanceOf(TransientInvocationError);

    mocks.run.mockRejectedValueOnce(new Error('invalid model'));
    await expect(invoker.invoke(call)).rejects.toThrow(FatalInvocationError);
  });
});
