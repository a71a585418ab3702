import picomatch from 'picomatch';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { fileExists, readYaml } from '../../utils/fs.js';
import { truncateForPrompt } from '../../utils/text.js';

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(new URL('../../../data/red-flags.yaml', import.meta.url));

const MAX_SCAN_BYTES = 1_000_000;
const EXCERPT_CHARS = 120;

export const RedFlagPattern = z.object({
  name: z.string().min(1),
  match: z.string().min(1),
  /** Treat `match` as a regular expression instead of a plain substring. */
  regex: z.boolean().default(false)
});

export const RedFlagCatalogue = z.object({
  include: z.array(z.string().min(1)).min(1),
  skipDirs: z.array(z.string().min(1)).default([]),
  patterns: z.array(RedFlagPattern).min(1)
});

export type RedFlagPattern = z.infer<typeof RedFlagPattern>;
export type RedFlagCatalogue = z.infer<typeof RedFlagCatalogue>;

export interface RedFlagFinding {
  file: string;
  line: number;
  pattern: string;
  excerpt: string;
}

/** The project's own catalogue wins over the bundled one when present. */
export async function loadRedFlagCatalogue(overridePath?: string): Promise<RedFlagCatalogue> {
  const path = overridePath && (await fileExists(overridePath)) ? overridePath : DEFAULT_CATALOGUE_PATH;
  return RedFlagCatalogue.parse(await readYaml(path));
}

interface CompiledPattern {
  name: string;
  test(line: string): boolean;
}

function compile(pattern: RedFlagPattern): CompiledPattern {
  if (pattern.regex) {
    const re = new RegExp(pattern.match, 'i');
    return { name: pattern.name, test: (line) => re.test(line) };
  }
  const needle = pattern.match.toLowerCase();
  return { name: pattern.name, test: (line) => line.toLowerCase().includes(needle) };
}

async function listFiles(root: string, skipDirs: Set<string>, prefix = ''): Promise<string[]> {
  const entries = await readdir(join(root, prefix), { withFileTypes: true });
  const out: string[] = [];
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (!skipDirs.has(entry.name)) out.push(...(await listFiles(root, skipDirs, rel)));
    } else if (entry.isFile()) {
      out.push(rel);
    }
  }
  return out;
}

/** Read-only scan of `productRoot`. Findings are sorted by file, line, then pattern name. */
export async function scanRedFlags(productRoot: string, catalogue: RedFlagCatalogue): Promise<RedFlagFinding[]> {
  if (!(await fileExists(productRoot))) return [];

  const included = picomatch(catalogue.include, { dot: true });
  const patterns = catalogue.patterns.map(compile);
  const files = (await listFiles(productRoot, new Set(catalogue.skipDirs))).filter((f) => included(f));

  const findings: RedFlagFinding[] = [];
  for (const file of files) {
    const abs = join(productRoot, file);
    if ((await stat(abs)).size > MAX_SCAN_BYTES) continue;

    const lines = (await readFile(abs, 'utf8')).split(/\r?\n/);
    lines.forEach((text, i) => {
      for (const p of patterns) {
        if (p.test(text)) findings.push({ file, line: i + 1, pattern: p.name, excerpt: text.trim().slice(0, EXCERPT_CHARS) });
      }
    });
  }

  return findings.sort((a, b) => compareStrings(a.file, b.file) || a.line - b.line || compareStrings(a.pattern, b.pattern));
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function formatRedFlags(findings: readonly RedFlagFinding[]): string {
  if (findings.length === 0) return '- None';
  return findings.map((f) => `- ${f.file}:${f.line} [${f.pattern}] ${f.excerpt}`).join('\n');
}

/** Prompt copy of the findings, capped at `maxChars`. */
export function renderRedFlags(findings: readonly RedFlagFinding[], maxChars: number): string {
  if (findings.length === 0) return '- None';
  return truncateForPrompt(formatRedFlags(findings), maxChars, 'RED_FLAGS').text;
}
