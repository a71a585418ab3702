/**
 * Flags a fixup loop that is going in circles: the Reviewer returned the same text (after
 * trimming) two rounds in a row. One detector per run.
 */
export class StuckDetector {
  private readonly window: Array<{ round: number; text: string }> = [];

  observe(roundIndex: number, reviewerText: string): boolean {
    const text = reviewerText.trim();
    const previous = this.window.at(-1);
    const stuck = previous !== undefined && previous.round === roundIndex - 1 && previous.text === text;

    this.window.push({ round: roundIndex, text });
    if (this.window.length > 2) this.window.shift();
    return stuck;
  }
}
