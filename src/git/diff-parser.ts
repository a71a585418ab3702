export type ChangeType = 'added' | 'modified' | 'deleted' | 'renamed';

export interface ChangedFile {
  path: string;
  changeType: ChangeType;
  additions: number;
  deletions: number;
  oldPath?: string;
}

export interface ChangeSummary {
  files: ChangedFile[];
  additions: number;
  deletions: number;
}

export interface ChangeSummaryInput {
  /** `git diff --name-status <baseline> -- <spec>` */
  nameStatus: string;
  /** `git diff --numstat <baseline> -- <spec>` */
  numStat: string;
  /** Untracked paths with their line counts; git diff never lists them. */
  untracked: Array<{ path: string; lines: number }>;
}

/** Per-file change list for the run record. The patch text itself is kept separately. */
export function summarizeChanges({ nameStatus, numStat, untracked }: ChangeSummaryInput): ChangeSummary {
  const counts = parseNumStat(numStat);
  const types = parseNameStatus(nameStatus);

  const tracked = Array.from(new Set([...counts.keys(), ...types.keys()])).map((path): ChangedFile => {
    const c = counts.get(path) ?? { additions: 0, deletions: 0 };
    const t = types.get(path) ?? { changeType: 'modified' as const };
    return t.oldPath === undefined
      ? { path, changeType: t.changeType, ...c }
      : { path, changeType: t.changeType, oldPath: t.oldPath, ...c };
  });

  const seen = new Set(tracked.map((f) => f.path));
  const added = untracked
    .filter((u) => !seen.has(u.path))
    .map((u): ChangedFile => ({ path: u.path, changeType: 'added', additions: u.lines, deletions: 0 }));

  const files = [...tracked, ...added].sort((a, b) => a.path.localeCompare(b.path));
  return {
    files,
    additions: files.reduce((n, f) => n + f.additions, 0),
    deletions: files.reduce((n, f) => n + f.deletions, 0)
  };
}

function parseNumStat(numStat: string): Map<string, { additions: number; deletions: number }> {
  const out = new Map<string, { additions: number; deletions: number }>();
  for (const line of numStat.split('\n')) {
    const [addsRaw, delsRaw, pathRaw] = line.split('\t');
    const path = pathRaw?.trim();
    if (!path || addsRaw === undefined || delsRaw === undefined) continue;
    // Binary files report '-' for both counts.
    out.set(path, { additions: safeInt(addsRaw), deletions: safeInt(delsRaw) });
  }
  return out;
}

function parseNameStatus(nameStatus: string): Map<string, { changeType: ChangeType; oldPath?: string }> {
  const out = new Map<string, { changeType: ChangeType; oldPath?: string }>();
  for (const line of nameStatus.split('\n')) {
    const [status, first, second] = line.split('\t').map((p) => p.trim());
    if (!status || !first) continue;

    // R100\told\tnew
    if (status.startsWith('R') && second) {
      out.set(second, { changeType: 'renamed', oldPath: first });
      continue;
    }
    out.set(first, { changeType: status === 'A' ? 'added' : status === 'D' ? 'deleted' : 'modified' });
  }
  return out;
}

function safeInt(s: string): number {
  const n = Number.parseInt(s, 10);
  return Number.isFinite(n) ? n : 0;
}
