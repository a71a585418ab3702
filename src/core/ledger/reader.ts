import { readOptionalText } from '../../utils/fs.js';
import { LedgerEntrySchema, type LedgerEntry, type LedgerEventType } from './types.js';

export class LedgerReader {
  constructor(private ledgerPath: string) {}

  async readAll(): Promise<LedgerEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries;
  }

  async readAllSafe(): Promise<{ entries: LedgerEntry[]; warnings: string[] }> {
    const warnings: string[] = [];
    const entries: LedgerEntry[] = [];

    const lines = (await readOptionalText(this.ledgerPath))
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);

    lines.forEach((line, i) => {
      const parsed = parseLine(line);
      if (parsed.ok) {
        entries.push(parsed.entry);
        return;
      }
      const isLast = i === lines.length - 1;
      warnings.push(`ledger parse failed at line ${i + 1}${isLast ? ' (last line)' : ''}: ${parsed.message}`);
    });

    return { entries, warnings };
  }

  async findByType<T extends LedgerEventType>(type: T): Promise<Array<Extract<LedgerEntry, { type: T }>>> {
    const { entries } = await this.readAllSafe();
    return entries.filter((e): e is Extract<LedgerEntry, { type: T }> => e.type === type);
  }

  async verifyIntegrity(): Promise<{ ok: boolean; message?: string }> {
    const { entries, warnings } = await this.readAllSafe();
    if (warnings.length) {
      return { ok: false, message: warnings.join('\n') };
    }
    for (const [i, entry] of entries.entries()) {
      const expected = i + 1;
      if (entry.seq !== expected) {
        return { ok: false, message: `Sequence gap at index ${i} (expected seq=${expected}, got ${entry.seq})` };
      }
    }
    return { ok: true };
  }
}

function parseLine(line: string): { ok: true; entry: LedgerEntry } | { ok: false; message: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
  const result = LedgerEntrySchema.safeParse(raw);
  if (!result.success) return { ok: false, message: result.error.issues.map((i) => i.message).join('; ') };
  return { ok: true, entry: result.data };
}
