import type { ToolEvent } from './toolbox.js';

const STDERR_SNIPPET_CHARS = 400;

/** What the Reviewer sees of the Implementer's tool use: files written and command results. */
export function formatToolOutputs(events: readonly ToolEvent[]): string {
  const lines: string[] = [];

  const writes = events.flatMap((e) => (e.tool === 'fs_write' ? [e] : []));
  if (writes.length > 0) {
    lines.push('FILES_WRITTEN:');
    for (const e of writes) lines.push(`- ${e.path}`);
  }

  const commands = events.flatMap((e) => (e.tool === 'run_cmd' ? [e] : []));
  if (commands.length > 0) {
    lines.push('COMMAND_RESULTS:');
    for (const e of commands) {
      lines.push(`- ${e.cmd.trim()} -> ${e.returncode}${e.blocked ? ' (BLOCKED)' : ''}`);
      const stderr = e.stderr.trim();
      if (stderr) {
        const snippet = stderr.length <= STDERR_SNIPPET_CHARS ? stderr : `${stderr.slice(0, STDERR_SNIPPET_CHARS)}...<truncated>`;
        lines.push(`  stderr: ${snippet}`);
      }
    }
  }

  return lines.length > 0 ? lines.join('\n') : '- None';
}
