export type Verdict = 'PASS' | 'FAIL';
export type Action = 'CONTINUE' | 'SKIP';

export interface ParsedVerdict {
  verdict: Verdict;
  action: Action;
  /** Raw FIXES body, trimmed; '' when the section is absent. */
  fixes: string;
  fixItems: string[];
  docsRequested: boolean;
  /** VERDICT or ACTION was missing or carried an unknown value. */
  malformed: boolean;
}

export type ChangeKind = 'created' | 'modified' | 'deleted';

export interface ReportedChange {
  path: string;
  kind: ChangeKind;
}

export interface ReportedCommand {
  cmd: string;
  returncode: number;
}

export interface ParsedImplementerReport {
  result: Verdict | null;
  changes: ReportedChange[];
  commands: ReportedCommand[];
  /** CHANGES/COMMANDS entries that did not match their expected shape. */
  skippedEntries: number;
}
