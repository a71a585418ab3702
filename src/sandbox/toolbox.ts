import { execa } from 'execa';
import picomatch from 'picomatch';
import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, isAbsolute, relative, resolve, sep } from 'node:path';

import { SandboxError } from '../core/errors.js';
import { fileExists, writeText } from '../utils/fs.js';
import { truncateStdio } from '../utils/text.js';
import { blockReason, type BlockReason } from './policy.js';

export const STDIO_LIMIT = 4000;
export const BLOCKED_RETURN_CODE = 126;
export const TIMEOUT_RETURN_CODE = 124;

export interface CommandResult {
  cmd: string;
  returncode: number;
  stdout: string;
  stderr: string;
}

export type ToolEvent =
  | { tool: 'fs_read'; path: string }
  | { tool: 'fs_write'; path: string; bytes: number }
  | { tool: 'fs_list'; path: string; count: number }
  | ({ tool: 'run_cmd'; blocked: boolean; blockedReason?: BlockReason } & CommandResult);

export interface ToolboxOptions {
  /** Every path the role passes is resolved against this directory. */
  baseDir: string;
  allowWrite: boolean;
  allowCommands: boolean;
  /** Base-relative globs that stay read-only even when writes are allowed. */
  protectedPaths?: string[];
  commandTimeoutSeconds?: number;
}

/**
 * The only filesystem and shell capability a role gets. One instance per invocation; every
 * action is appended to `events`.
 */
export class WorkspaceToolbox {
  readonly baseDir: string;
  private readonly baseName: string;
  private readonly isProtected: (path: string) => boolean;
  private readonly log: ToolEvent[] = [];

  constructor(private readonly opts: ToolboxOptions) {
    this.baseDir = resolve(opts.baseDir);
    this.baseName = basename(this.baseDir);
    const patterns = opts.protectedPaths ?? [];
    this.isProtected = patterns.length > 0 ? picomatch(patterns, { dot: true }) : () => false;
  }

  get canWrite(): boolean {
    return this.opts.allowWrite;
  }

  get canRunCommands(): boolean {
    return this.opts.allowCommands;
  }

  get events(): readonly ToolEvent[] {
    return this.log;
  }

  async readFile(path: string): Promise<string> {
    const { abs, display } = this.resolvePath(path);
    const content = await readFile(abs, 'utf8');
    this.log.push({ tool: 'fs_read', path: display });
    return content;
  }

  async writeFile(path: string, content: string): Promise<{ ok: true; path: string }> {
    if (!this.opts.allowWrite) throw new SandboxError('Write access is not allowed for this role');
    const { abs, rel, display } = this.resolvePath(path);
    if (rel === '') throw new SandboxError('Cannot write to the base directory itself');
    if (this.isProtected(rel)) throw new SandboxError(`${display} is write-protected for this role`);

    await writeText(abs, content);
    this.log.push({ tool: 'fs_write', path: display, bytes: Buffer.byteLength(content, 'utf8') });
    return { ok: true, path: display };
  }

  async listDir(path = '.'): Promise<{ path: string; entries: string[] }> {
    const { abs, display } = this.resolvePath(path);
    if (!(await fileExists(abs))) throw new SandboxError(`Path does not exist: ${display}`);

    const info = await stat(abs);
    const entries = info.isFile() ? [basename(abs)] : (await readdir(abs)).sort();
    this.log.push({ tool: 'fs_list', path: display, count: entries.length });
    return { path: display, entries };
  }

  async runCommand(cmd: string, timeoutSeconds?: number): Promise<CommandResult> {
    if (!this.opts.allowCommands) throw new SandboxError('Command execution is not allowed for this role');

    const reason = blockReason(cmd);
    if (reason) {
      const blocked: CommandResult = { cmd, returncode: BLOCKED_RETURN_CODE, stdout: '', stderr: 'BLOCKED' };
      this.log.push({ tool: 'run_cmd', ...blocked, blocked: true, blockedReason: reason });
      return blocked;
    }

    if (!(await fileExists(this.baseDir))) throw new SandboxError(`Base directory does not exist: ${this.baseDir}`);

    const timeout = timeoutSeconds ?? this.opts.commandTimeoutSeconds ?? 30;
    const res = await execa(cmd, {
      cwd: this.baseDir,
      shell: true,
      reject: false,
      stdin: 'ignore',
      timeout: timeout * 1000
    });

    const result: CommandResult = res.timedOut
      ? {
          cmd,
          returncode: TIMEOUT_RETURN_CODE,
          stdout: truncateStdio(res.stdout, STDIO_LIMIT),
          stderr: truncateStdio(`TIMEOUT after ${timeout}s`, STDIO_LIMIT)
        }
      : {
          cmd,
          returncode: res.exitCode ?? 1,
          stdout: truncateStdio(res.stdout, STDIO_LIMIT),
          stderr: truncateStdio(res.stderr, STDIO_LIMIT)
        };
    this.log.push({ tool: 'run_cmd', ...result, blocked: false });
    return result;
  }

  /**
   * Resolve a role-supplied path. A leading segment equal to the base directory's own name is
   * dropped, so `workspace/app.py` and `app.py` address the same file.
   */
  private resolvePath(path: string): { abs: string; rel: string; display: string } {
    if (!path) throw new SandboxError('Path is required');
    if (path.startsWith('~')) throw new SandboxError('Tilde paths are not allowed');
    if (isAbsolute(path)) throw new SandboxError('Absolute paths are not allowed');

    const segments = path.split(/[\\/]+/);
    if (segments[0] === this.baseName) segments.shift();
    const candidate = segments.join('/') || '.';

    const abs = resolve(this.baseDir, candidate);
    const rel = relative(this.baseDir, abs);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new SandboxError('Path escapes the allowed base directory');
    }

    const posixRel = rel.split(sep).join('/');
    return { abs, rel: posixRel, display: posixRel ? `${this.baseName}/${posixRel}` : this.baseName };
  }
}
