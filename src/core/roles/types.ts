import type { WorkspaceToolbox } from '../../sandbox/toolbox.js';

export const ROLE_NAMES = ['planner', 'implementer', 'reviewer', 'tech_writer'] as const;

export type RoleName = (typeof ROLE_NAMES)[number];

export const ROLE_LABELS: Record<RoleName, string> = {
  planner: 'Planner',
  implementer: 'Implementer',
  reviewer: 'Reviewer',
  tech_writer: 'TechWriter'
};

/** Ordered prompt sections, rendered as `NAME:` blocks in insertion order. */
export type PromptSections = Array<[name: string, body: string]>;

export interface RoleInvocation {
  role: RoleName;
  sections: PromptSections;
  turnCeiling: number;
  /** Sandboxed filesystem/command capability; absent for roles that must not touch files. */
  toolbox?: WorkspaceToolbox;
}

export interface RoleInvoker {
  invoke(request: RoleInvocation): Promise<string>;
}
