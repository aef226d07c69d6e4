/**
 * Tests for display text sanitization
 */
import { describe, it, expect } from 'vitest';
import { sanitizeDisplayText } from '../../../../src/analyzers/flow-graph/reporter/sanitize.js';

describe('sanitizeDisplayText', () => {
  it('leaves plain text unchanged', () => {
    expect(sanitizeDisplayText('Ask Name')).toBe('Ask Name');
  });

  it('strips color escape sequences', () => {
    expect(sanitizeDisplayText('\u001b[1;31mred\u001b[0m page')).toBe('red page');
  });

  it('strips hyperlink escape sequences', () => {
    expect(sanitizeDisplayText('\u001b]8;;http://example.test\u0007link\u001b]8;;\u0007')).toBe('link');
  });

  it('collapses line breaks and tabs to a single space', () => {
    expect(sanitizeDisplayText('first\r\nsecond\tthird')).toBe('first second third');
  });

  it('removes other control characters', () => {
    expect(sanitizeDisplayText('bell\u0007 and\u0000 nul\u009b')).toBe('bell and nul');
  });
});
