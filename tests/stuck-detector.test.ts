import { describe, expect, it } from 'vitest';

import { StuckDetector } from '../src/core/stuck-detector.js';

describe('StuckDetector', () => {
  it('flags the same trimmed reviewer text in consecutive rounds', () => {
    const d = new StuckDetector();
    expect(d.observe(1, 'VERDICT: FAIL\nACTION: CONTINUE')).toBe(false);
    expect(d.observe(2, '  VERDICT: FAIL\nACTION: CONTINUE\n\n')).toBe(true);
  });

  it('does not flag changed text or rounds that are not consecutive', () => {
    const d = new StuckDetector();
    expect(d.observe(1, 'a')).toBe(false);
    expect(d.observe(2, 'b')).toBe(false);
    expect(d.observe(4, 'b')).toBe(false);
    expect(d.observe(5, 'c')).toBe(false);
  });
});
