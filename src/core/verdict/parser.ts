import type { Action, ChangeKind, ParsedImplementerReport, ParsedVerdict, ReportedChange, ReportedCommand, Verdict } from './types.js';

/** Line-leading keywords that open a section and therefore close the one before it. */
export const SECTION_KEYWORDS = ['VERDICT', 'ACTION', 'FIXES', 'NOTES', 'SUMMARY', 'REPORT', 'RESULT', 'CHANGES', 'COMMANDS', 'TESTS'] as const;

type SectionKeyword = (typeof SECTION_KEYWORDS)[number];

const KEYWORD_LINE = new RegExp(`^(${SECTION_KEYWORDS.join('|')}):(.*)$`);
const BULLET = /^(?:[-*•]|\d+[.)])\s+/;
const NONE_ITEM = /^none\.?$/i;
const DOCS_PREFIX = 'DOCS:';

interface Section {
  /** Text after the keyword on its own line. */
  inline: string;
  /** Following lines up to the next keyword line. */
  lines: string[];
}

/**
 * Splits text into keyword sections. Only the first occurrence of each keyword is kept; a later
 * repeat still closes the section in progress.
 */
function splitSections(text: string): Map<SectionKeyword, Section> {
  const sections = new Map<SectionKeyword, Section>();
  let current: Section | null = null;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    const m = KEYWORD_LINE.exec(line);
    const keyword = m ? asKeyword(m[1]) : undefined;
    if (m && keyword) {
      if (sections.has(keyword)) {
        current = null;
        continue;
      }
      current = { inline: (m[2] ?? '').trim(), lines: [] };
      sections.set(keyword, current);
      continue;
    }
    current?.lines.push(line);
  }
  return sections;
}

function asKeyword(value: string | undefined): SectionKeyword | undefined {
  return SECTION_KEYWORDS.find((k) => k === value);
}

function sectionBody(section: Section | undefined): string {
  if (!section) return '';
  return [section.inline, ...section.lines].join('\n').trim();
}

/** Non-empty lines of a section with any bullet marker removed. */
function sectionEntries(section: Section | undefined): string[] {
  if (!section) return [];
  return [section.inline, ...section.lines].map((l) => l.replace(BULLET, '').trim()).filter((l) => l.length > 0);
}

function parseVerdictValue(value: string | undefined): Verdict | null {
  return value === 'PASS' || value === 'FAIL' ? value : null;
}

function parseActionValue(value: string | undefined): Action | null {
  return value === 'CONTINUE' || value === 'SKIP' ? value : null;
}

function fixItemsOf(section: Section | undefined): string[] {
  if (!section) return [];
  const all = [section.inline, ...section.lines].filter((l) => l.length > 0);
  const bullets = all.filter((l) => BULLET.test(l));
  const items = (bullets.length > 0 ? bullets : all).map((l) => l.replace(BULLET, '').trim()).filter((l) => l.length > 0);
  if (items.length === 1 && NONE_ITEM.test(items[0] ?? '')) return [];
  return items;
}

/**
 * Reads the Reviewer's VERDICT/ACTION/FIXES contract. Any missing or unknown VERDICT or ACTION
 * fails closed to FAIL/SKIP with `malformed` set.
 */
export function parseReviewerReport(text: string): ParsedVerdict {
  const sections = splitSections(text);
  const verdict = parseVerdictValue(sections.get('VERDICT')?.inline);
  const action = parseActionValue(sections.get('ACTION')?.inline);

  const fixesSection = sections.get('FIXES');
  const fixes = sectionBody(fixesSection);
  const fixItems = fixItemsOf(fixesSection);
  const docsRequested = fixes.replace(BULLET, '').startsWith(DOCS_PREFIX) || fixItems.some((item) => item.startsWith(DOCS_PREFIX));

  if (verdict === null || action === null) {
    return { verdict: 'FAIL', action: 'SKIP', fixes, fixItems, docsRequested, malformed: true };
  }
  return { verdict, action, fixes, fixItems, docsRequested, malformed: false };
}

const CHANGE_ENTRY = /^(.+?)\s+\((created|modified|deleted)\)$/;
const COMMAND_ENTRY = /^(.+?)\s+->\s+(-?\d+)$/;

function asChangeKind(value: string | undefined): ChangeKind | undefined {
  return value === 'created' || value === 'modified' || value === 'deleted' ? value : undefined;
}

/** Extracts RESULT, CHANGES and COMMANDS from an Implementer report. Entries that do not fit are counted, not fatal. */
export function parseImplementerReport(text: string): ParsedImplementerReport {
  const sections = splitSections(text);
  let skippedEntries = 0;

  const changes: ReportedChange[] = [];
  for (const entry of sectionEntries(sections.get('CHANGES'))) {
    if (NONE_ITEM.test(entry)) continue;
    const m = CHANGE_ENTRY.exec(entry);
    const kind = asChangeKind(m?.[2]);
    if (m?.[1] && kind) changes.push({ path: m[1].trim(), kind });
    else skippedEntries++;
  }

  const commands: ReportedCommand[] = [];
  for (const entry of sectionEntries(sections.get('COMMANDS'))) {
    if (NONE_ITEM.test(entry)) continue;
    const m = COMMAND_ENTRY.exec(entry);
    if (m?.[1] && m[2] !== undefined) commands.push({ cmd: m[1].trim(), returncode: Number(m[2]) });
    else skippedEntries++;
  }

  return { result: parseVerdictValue(sections.get('RESULT')?.inline), changes, commands, skippedEntries };
}
