const PLACEHOLDER_TOKENS = new Set(['TODO']);

/**
 * True when the text carries no task content: blank lines, markdown headings, or a bare
 * placeholder marker.
 */
export function isEffectivelyEmpty(text: string): boolean {
  if (!text.trim()) return true;
  const content = text
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith('#') && !PLACEHOLDER_TOKENS.has(l.toUpperCase()));
  return content.length === 0;
}

export function truncationMarker(label: string, maxChars: number): string {
  return `\n...[${label} truncated to ${maxChars} chars]`;
}

/**
 * Cap `text` at `maxChars`, keeping its start. The marker counts against the cap, so the
 * result is never longer than `maxChars`.
 */
export function truncateForPrompt(text: string, maxChars: number, label: string): { text: string; truncated: boolean } {
  if (maxChars <= 0) return { text: '', truncated: text.length > 0 };
  if (text.length <= maxChars) return { text, truncated: false };

  const marker = truncationMarker(label, maxChars);
  if (marker.length >= maxChars) return { text: text.slice(0, maxChars), truncated: true };

  const head = text.slice(0, maxChars - marker.length).trimEnd();
  return { text: `${head}${marker}`, truncated: true };
}

export function truncateStdio(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return `${text.slice(0, limit)}...<truncated>`;
}
