import { Agent, MaxTurnsExceededError as AgentsMaxTurnsExceededError, Runner, setDefaultOpenAIKey, tool, type Tool } from '@openai/agents';
import { z } from 'zod';

import { FatalInvocationError, MaxTurnsExceededError, TransientInvocationError, errorMessage } from '../errors.js';
import { classifyInvocationError } from '../retry.js';
import type { WorkspaceToolbox } from '../../sandbox/toolbox.js';
import { loadRoleInstructions } from '../../templates/role-instructions.js';
import type { Logger } from '../../utils/logger.js';
import { renderSections } from './prompts.js';
import { ROLE_LABELS, type RoleInvocation, type RoleInvoker, type RoleName } from './types.js';

export interface OpenAIRoleInvokerOptions {
  apiKey: string;
  models: Record<RoleName, string>;
  /** Directory holding optional `<role>.md` instruction overrides. */
  promptsDir: string;
  logger: Logger;
}

function toolboxTools(toolbox: WorkspaceToolbox): Tool[] {
  const tools: Tool[] = [
    tool({
      name: 'fs_read',
      description: 'Read a UTF-8 text file. The path is relative to the base directory.',
      parameters: z.object({ path: z.string() }),
      execute: async ({ path }) => await toolbox.readFile(path)
    }),
    tool({
      name: 'fs_list',
      description: 'List the entries of a directory (or the name of a file). Defaults to the base directory.',
      parameters: z.object({ path: z.string().nullable() }),
      execute: async ({ path }) => JSON.stringify(await toolbox.listDir(path ?? '.'))
    })
  ];

  if (toolbox.canWrite) {
    tools.push(
      tool({
        name: 'fs_write',
        description: 'Create or overwrite a UTF-8 text file. The path is relative to the base directory.',
        parameters: z.object({ path: z.string(), content: z.string() }),
        execute: async ({ path, content }) => JSON.stringify(await toolbox.writeFile(path, content))
      })
    );
  }

  if (toolbox.canRunCommands) {
    tools.push(
      tool({
        name: 'run_cmd',
        description: 'Run a shell command with the base directory as working directory. Install commands, git and directory changes are blocked.',
        parameters: z.object({ cmd: z.string(), timeout_seconds: z.number().int().positive().nullable() }),
        execute: async ({ cmd, timeout_seconds }) => JSON.stringify(await toolbox.runCommand(cmd, timeout_seconds ?? undefined))
      })
    );
  }

  return tools;
}

/**
 * Runs a role as an `@openai/agents` agent. Failures are mapped onto the invocation error taxonomy
 * so the retry envelope can tell transient from fatal.
 */
export class OpenAIRoleInvoker implements RoleInvoker {
  private readonly runner = new Runner();

  private constructor(
    private readonly opts: OpenAIRoleInvokerOptions,
    private readonly instructions: Record<RoleName, string>
  ) {}

  static async create(opts: OpenAIRoleInvokerOptions): Promise<OpenAIRoleInvoker> {
    setDefaultOpenAIKey(opts.apiKey);
    const load = (role: RoleName) => loadRoleInstructions(role, opts.promptsDir);
    return new OpenAIRoleInvoker(opts, {
      planner: await load('planner'),
      implementer: await load('implementer'),
      reviewer: await load('reviewer'),
      tech_writer: await load('tech_writer')
    });
  }

  async invoke(request: RoleInvocation): Promise<string> {
    const { role, sections, turnCeiling, toolbox } = request;
    const agent = new Agent({
      name: ROLE_LABELS[role],
      model: this.opts.models[role],
      instructions: this.instructions[role],
      tools: toolbox ? toolboxTools(toolbox) : []
    });

    this.opts.logger.debug('invoking role', { role, model: this.opts.models[role], turnCeiling });
    try {
      const result = await this.runner.run(agent, renderSections(sections), { maxTurns: turnCeiling });
      return result.finalOutput ?? '';
    } catch (err) {
      if (err instanceof AgentsMaxTurnsExceededError) throw new MaxTurnsExceededError(role, turnCeiling, { cause: err });
      if (classifyInvocationError(err) === 'transient') throw new TransientInvocationError(role, errorMessage(err), { cause: err });
      throw new FatalInvocationError(role, errorMessage(err), { cause: err });
    }
  }
}
