import { describe, expect, it } from 'vitest';

import { parseImplementerReport, parseReviewerReport } from '../src/core/verdict/parser.js';

describe('parseReviewerReport', () => {
  it('reads a passing verdict with no fixes', () => {
    const parsed = parseReviewerReport('VERDICT: PASS\nACTION: CONTINUE\nFIXES:\n- None\n');
    expect(parsed).toEqual({
      verdict: 'PASS',
      action: 'CONTINUE',
      fixes: '- None',
      fixItems: [],
      docsRequested: false,
      malformed: false
    });
  });

  it('collects bulleted fix items up to the next keyword and spots DOCS requests', () => {
    const parsed = parseReviewerReport(
      ['VERDICT: FAIL', 'ACTION: CONTINUE', 'FIXES:', '- add tests for greet', '- DOCS: update README', 'NOTES: looks close'].join('\n')
    );
    expect(parsed.verdict).toBe('FAIL');
    expect(parsed.action).toBe('CONTINUE');
    expect(parsed.fixes).toBe('- add tests for greet\n- DOCS: update README');
    expect(parsed.fixItems).toEqual(['add tests for greet', 'DOCS: update README']);
    expect(parsed.docsRequested).toBe(true);
    expect(parsed.malformed).toBe(false);
  });

  it('treats plain lines as fix items when there are no bullets', () => {
    const parsed = parseReviewerReport('VERDICT: FAIL\nACTION: CONTINUE\nFIXES:\nrename the module\n\nadd a docstring');
    expect(parsed.fixItems).toEqual(['rename the module', 'add a docstring']);
  });

  it('reads an inline FIXES body', () => {
    const parsed = parseReviewerReport('VERDICT: FAIL\nACTION: SKIP\nFIXES: DOCS: document the CLI');
    expect(parsed.fixes).toBe('DOCS: document the CLI');
    expect(parsed.fixItems).toEqual(['DOCS: document the CLI']);
    expect(parsed.docsRequested).toBe(true);
  });

  it('fails closed when ACTION is missing', () => {
    const parsed = parseReviewerReport('VERDICT: PASS\nFIXES:\n- None');
    expect(parsed.verdict).toBe('FAIL');
    expect(parsed.action).toBe('SKIP');
    expect(parsed.malformed).toBe(true);
  });

  it('fails closed on keyword values in the wrong case', () => {
    const parsed = parseReviewerReport('VERDICT: pass\nACTION: CONTINUE');
    expect(parsed).toMatchObject({ verdict: 'FAIL', action: 'SKIP', malformed: true });
  });

  it('keeps the first VERDICT when the report repeats it', () => {
    const parsed = parseReviewerReport('VERDICT: FAIL\nACTION: CONTINUE\nVERDICT: PASS');
    expect(parsed).toMatchObject({ verdict: 'FAIL', action: 'CONTINUE', malformed: false });
  });

  it('accepts indented keyword lines', () => {
    const parsed = parseReviewerReport('  VERDICT: PASS\n  ACTION: CONTINUE');
    expect(parsed).toMatchObject({ verdict: 'PASS', action: 'CONTINUE', malformed: false });
  });
});

describe('parseImplementerReport', () => {
  it('extracts result, changes and commands and counts entries that do not fit', () => {
    const parsed = parseImplementerReport(
      [
        'RESULT: PASS',
        'CHANGES:',
        '- app/greeter.py (created)',
        '- README.md (modified)',
        '- tidied things up',
        'COMMANDS:',
        '- python -m pytest -q -> 0',
        '- pip install pytest -> 126',
        'NOTES: done'
      ].join('\n')
    );
    expect(parsed.result).toBe('PASS');
    expect(parsed.changes).toEqual([
      { path: 'app/greeter.py', kind: 'created' },
      { path: 'README.md', kind: 'modified' }
    ]);
    expect(parsed.commands).toEqual([
      { cmd: 'python -m pytest -q', returncode: 0 },
      { cmd: 'pip install pytest', returncode: 126 }
    ]);
    expect(parsed.skippedEntries).toBe(1);
  });

  it('skips None entries and leaves an absent RESULT as null', () => {
    const parsed = parseImplementerReport('CHANGES:\n- None\nCOMMANDS: None');
    expect(parsed).toEqual({ result: null, changes: [], commands: [], skippedEntries: 0 });
  });
});
