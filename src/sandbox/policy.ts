export const BLOCK_REASONS = ['install', 'vcs', 'escape'] as const;

export type BlockReason = (typeof BLOCK_REASONS)[number];

// Dependency installation is never allowed from inside a role.
const INSTALL_PATTERNS = [
  /\bpip3?\s+install\b/i,
  /\bpython3?\s+-m\s+pip\s+install\b/i,
  /\buv\s+pip\s+install\b/i,
  /\bpoetry\s+(?:install|add)\b/i,
  /\bpipx\s+install\b/i,
  /\bnpm\s+(?:install|i|add)\b/i,
  /\byarn\s+(?:add|install)\b/i,
  /\bpnpm\s+(?:add|install)\b/i,
  /\bconda\s+install\b/i,
  /\bbrew\s+install\b/i,
  /\bapt-get\s+install\b/i
] as const;

// The run's diff evidence is read from the repository, so roles never touch it.
const VCS_PATTERNS = [/(?:^|[;&|(]\s*|\s)git(?:\s|$)/i, /(?:^|[\s/'"=])\.git(?:[\s/'"]|$)/] as const;

// Anything that could move the shell outside its base directory.
const ESCAPE_PATTERNS = [
  /(?:^|[;&|]\s*|\s)cd\s/i,
  /\.\.\//,
  /\.\.\\/,
  /(?:^|\s)\//,
  /(?:^|\s)~/
] as const;

export function blockReason(cmd: string): BlockReason | null {
  if (INSTALL_PATTERNS.some((re) => re.test(cmd))) return 'install';
  if (VCS_PATTERNS.some((re) => re.test(cmd))) return 'vcs';
  if (ESCAPE_PATTERNS.some((re) => re.test(cmd))) return 'escape';
  return null;
}
