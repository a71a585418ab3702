import type { ChangeSummary } from '../../git/diff-parser.js';
import { formatToolOutputs } from '../../sandbox/format.js';
import type { ToolEvent } from '../../sandbox/toolbox.js';
import { truncateForPrompt } from '../../utils/text.js';
import type { DiffSource } from './diff-source.js';
import { renderRedFlags, scanRedFlags, type RedFlagCatalogue, type RedFlagFinding } from './red-flags.js';

export interface EvidenceLimits {
  diffMaxChars: number;
  redFlagsMaxChars: number;
}

export interface ReviewEvidence {
  /** Complete patch, persisted as the round's diff file. */
  fullDiff: string;
  /** Prompt copy of the diff: truncated to its cap, `- None` when there is nothing to show. */
  diff: string;
  diffTruncated: boolean;
  findings: RedFlagFinding[];
  redFlags: string;
  toolOutputs: string;
  changes: ChangeSummary;
}

/** Gathers what the Reviewer sees after the Implementer's turn. Never writes to the product subtree. */
export class EvidenceAssembler {
  constructor(
    private readonly source: DiffSource,
    private readonly productRoot: string,
    private readonly catalogue: RedFlagCatalogue,
    private readonly limits: EvidenceLimits
  ) {}

  get topology() {
    return this.source.topology;
  }

  async assemble(events: readonly ToolEvent[]): Promise<ReviewEvidence> {
    const fullDiff = await this.source.computeDiff();
    const changes = await this.source.summarize();
    const findings = await scanRedFlags(this.productRoot, this.catalogue);

    const { text, truncated } = fullDiff.trim()
      ? truncateForPrompt(fullDiff, this.limits.diffMaxChars, 'DIFF')
      : { text: '- None', truncated: false };

    return {
      fullDiff,
      diff: text,
      diffTruncated: truncated,
      findings,
      redFlags: renderRedFlags(findings, this.limits.redFlagsMaxChars),
      toolOutputs: formatToolOutputs(events),
      changes
    };
  }
}
