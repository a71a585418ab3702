import type { RoundRecord } from '../../core/fixup-loop.js';
import { ROLE_LABELS, type RoleName } from '../../core/roles/types.js';
import { theme, INDENT, RULE_WIDTH, ROLE_LABEL_WIDTH } from './theme.js';

// ── Durations ───────────────────────────────────────────────────────────────

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/** `850ms`, `4.2s`, `3m 5s`, `1h 20m`. */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return '-';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < MINUTE_MS) return `${(ms / 1000).toFixed(1)}s`;

  if (ms < HOUR_MS) {
    return compound(Math.floor(ms / MINUTE_MS), 'm', Math.round((ms % MINUTE_MS) / 1000), 's');
  }
  return compound(Math.floor(ms / HOUR_MS), 'h', Math.floor((ms % HOUR_MS) / MINUTE_MS), 'm');
}

function compound(major: number, majorUnit: string, minor: number, minorUnit: string): string {
  return minor === 0 ? `${major}${majorUnit}` : `${major}${majorUnit} ${minor}${minorUnit}`;
}

export function padRight(str: string, width: number): string {
  return str.padEnd(width, ' ');
}

// ── Rounds ──────────────────────────────────────────────────────────────────

/**
 * The plain per-round status line: `Round 2: FAIL CONTINUE`. A run that hits the round ceiling
 * still reports CONTINUE for its last round, matching the run's final action.
 */
export function roundLine(record: RoundRecord): string {
  if (record.state === 'PASS') return `Round ${record.round}: PASS`;
  if (record.state === 'FAIL_CONTINUE' || record.reason === 'max_rounds') return `Round ${record.round}: FAIL CONTINUE`;
  return `Round ${record.round}: FAIL SKIP`;
}

// ── Role Labels ─────────────────────────────────────────────────────────────

export function roleLabel(role: RoleName, width: number = ROLE_LABEL_WIDTH): string {
  return theme.role(role)(theme.bold(padRight(ROLE_LABELS[role], width)));
}

/** Indents a wrapped line so it lines up under the text after a role label. */
export function roleContinuation(text: string, width: number = ROLE_LABEL_WIDTH): string {
  return `${' '.repeat(width)}${text}`;
}

// ── Banners and Boxes ───────────────────────────────────────────────────────

/** `── Planner ─────────────` padded out to the rule width. */
export function stageBanner(name: string, width: number = RULE_WIDTH): string {
  const tail = '─'.repeat(Math.max(4, width - name.length - 4));
  return `${theme.dim('── ')}${theme.bold(name)}${theme.dim(` ${tail}`)}`;
}

/** A rounded box with the title set into the top edge and one blank line of padding above and below. */
export function drawBox(title: string, lines: string[], width: number = RULE_WIDTH): string {
  const edge = theme.border;
  const inner = width - 2;
  const label = ` ${title} `;

  const top = `${edge('╭───')}${theme.title(label)}${edge(`${'─'.repeat(Math.max(0, inner - 3 - label.length))}╮`)}`;
  const blank = `${edge('│')}${' '.repeat(inner)}${edge('│')}`;
  const body = lines.map((line) => {
    const fill = ' '.repeat(Math.max(0, inner - 2 - stripAnsi(line).length));
    return `${edge('│')}  ${line}${fill}${edge('│')}`;
  });
  const bottom = edge(`╰${'─'.repeat(inner)}╯`);

  return [top, blank, ...body, blank, bottom].join('\n');
}

export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return `${INDENT}${theme.dim(padRight(label, labelWidth))}${value}`;
}

const ANSI_SGR = new RegExp(`${String.fromCharCode(27)}\\[[0-9;]*m`, 'g');

export function stripAnsi(str: string): string {
  return str.replace(ANSI_SGR, '');
}
