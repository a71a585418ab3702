import type { RoleName } from '../../core/roles/types.js';
import { theme, INDENT } from './theme.js';
import { drawBox, formatMs, keyValue, roleContinuation, roleLabel, stageBanner } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Decorative CLI output, all of it on stderr:
 * - InteractiveRenderer for colours, spinners and boxes
 * - QuietRenderer for JSON lines (--quiet)
 */
export interface Renderer {
  stageBanner(stage: string): void;

  roleWorking(role: RoleName, task: string): void;
  roleComplete(role: RoleName, summary: string, durationMs?: number): void;
  roleFailed(role: RoleName, reason: string): void;

  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;

  spinner(message: string): SpinnerHandle;

  runComplete(info: { runId: string; runDir: string; verdict: string; action: string; reason: string; rounds: number; durationMs: number }): void;

  text(message: string): void;
  blank(): void;
  dim(message: string): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  constructor(private readonly opts: { verbose?: boolean } = {}) {}

  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  stageBanner(stage: string): void {
    this.writeln();
    this.writeln(stageBanner(stage));
    this.writeln();
  }

  roleWorking(role: RoleName, task: string): void {
    this.writeln(INDENT + roleLabel(role) + theme.dim(task));
  }

  roleComplete(role: RoleName, summary: string, durationMs?: number): void {
    const timing = durationMs !== undefined ? theme.dim(` (${formatMs(durationMs)})`) : '';
    this.writeln(INDENT + roleLabel(role) + theme.check + ' ' + summary + timing);
  }

  roleFailed(role: RoleName, reason: string): void {
    this.writeln(INDENT + roleLabel(role) + theme.cross + ' ' + theme.error(reason));
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(INDENT + theme.cross + ' ' + theme.error(theme.bold(title)));
    for (const line of details.split('\n')) this.writeln(INDENT + roleContinuation(line, 2));
    if (tip) this.writeln(INDENT + theme.dim(`Tip: ${tip}`));
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(INDENT + theme.warning(`⚠ ${message}`));
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message, { static: this.opts.verbose });
  }

  runComplete(info: { runId: string; runDir: string; verdict: string; action: string; reason: string; rounds: number; durationMs: number }): void {
    const colour = theme.verdict(info.verdict);
    const lines = [
      keyValue('Run', info.runId).trimStart(),
      keyValue('Verdict', colour(theme.bold(info.verdict))).trimStart(),
      keyValue('Action', info.action).trimStart(),
      keyValue('Reason', info.reason).trimStart(),
      keyValue('Rounds', String(info.rounds)).trimStart(),
      keyValue('Duration', formatMs(info.durationMs)).trimStart()
    ];
    this.writeln();
    this.writeln(drawBox('Run complete', lines));
    this.writeln(INDENT + theme.dim(info.runDir));
    this.writeln();
  }

  text(message: string): void {
    this.writeln(message);
  }

  blank(): void {
    this.writeln();
  }

  dim(message: string): void {
    this.writeln(theme.dim(message));
  }
}

// ── Quiet Renderer (JSON lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  stageBanner(stage: string): void {
    this.emit('stage_start', { stage });
  }

  roleWorking(role: RoleName, task: string): void {
    this.emit('role_working', { role, task });
  }

  roleComplete(role: RoleName, summary: string, durationMs?: number): void {
    this.emit('role_complete', { role, summary, duration_ms: durationMs });
  }

  roleFailed(role: RoleName, reason: string): void {
    this.emit('role_failed', { role, reason });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('progress', { message });
    return {
      update: (text: string) => this.emit('progress', { message: text }),
      succeed: (text?: string) => {
        if (text) this.emit('progress_done', { message: text, ok: true });
      },
      fail: (text?: string) => {
        if (text) this.emit('progress_done', { message: text, ok: false });
      },
      warn: (text?: string) => {
        if (text) this.emit('warning', { message: text });
      },
      stop: () => {
        // nothing to stop
      }
    };
  }

  runComplete(info: { runId: string; runDir: string; verdict: string; action: string; reason: string; rounds: number; durationMs: number }): void {
    this.emit('run_complete', { ...info, duration_ms: info.durationMs });
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  blank(): void {
    // no-op
  }

  dim(message: string): void {
    this.emit('text', { message });
  }
}

export function createRenderer(opts: { quiet?: boolean; verbose?: boolean }): Renderer {
  return opts.quiet ? new QuietRenderer() : new InteractiveRenderer({ verbose: opts.verbose });
}
