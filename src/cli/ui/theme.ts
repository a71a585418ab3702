import chalk, { type ChalkInstance } from 'chalk';

import type { RoleName } from '../../core/roles/types.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Respects NO_COLOR / FORCE_COLOR via chalk.

const roleColors: Record<RoleName, ChalkInstance> = {
  planner: chalk.blue,
  implementer: chalk.yellow,
  reviewer: chalk.magenta,
  tech_writer: chalk.cyan
};

export const theme = {
  bold: chalk.bold,
  dim: chalk.dim,

  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  check: chalk.green('✔'),
  cross: chalk.red('✖'),

  border: chalk.cyan,
  title: chalk.bold.cyan,

  role: (name: RoleName): ChalkInstance => roleColors[name],

  verdict: (verdict: string): ChalkInstance => (verdict === 'PASS' ? chalk.green : chalk.red)
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

export const INDENT = '  ';

/** Width used for horizontal rules and box drawing. */
export const RULE_WIDTH = 56;

/** Column width for role labels in the activity stream. */
export const ROLE_LABEL_WIDTH = 13;
