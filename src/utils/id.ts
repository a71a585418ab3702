export interface RunIdParts {
  yyyyMMdd: string; // YYYYMMDD
  hhmmss: string; // HHMMSS
  suffix?: number;
}

export function formatRunId(parts: RunIdParts): string {
  const base = `run-${parts.yyyyMMdd}-${parts.hhmmss}`;
  return parts.suffix && parts.suffix > 1 ? `${base}-${parts.suffix}` : base;
}

export function parseRunId(runId: string): RunIdParts | null {
  const m = /^run-(\d{8})-(\d{6})(?:-(\d+))?$/.exec(runId);
  if (!m) return null;
  const [, yyyyMMdd, hhmmss, suffix] = m;
  if (!yyyyMMdd || !hhmmss) return null;
  return suffix ? { yyyyMMdd, hhmmss, suffix: Number(suffix) } : { yyyyMMdd, hhmmss };
}

/** UTC, so ids sort the same way regardless of the machine's timezone. */
export function runIdFor(now: Date, suffix?: number): string {
  return formatRunId({ yyyyMMdd: formatDate(now), hhmmss: formatTime(now), suffix });
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}

function formatTime(d: Date): string {
  const hh = String(d.getUTCHours()).padStart(2, '0');
  const mi = String(d.getUTCMinutes()).padStart(2, '0');
  const ss = String(d.getUTCSeconds()).padStart(2, '0');
  return `${hh}${mi}${ss}`;
}
