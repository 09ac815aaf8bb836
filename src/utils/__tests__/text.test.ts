import { describe, it, expect } from 'vitest';
import { escapeRegex, formatTimestamp, isObjectIdString } from '../text';

describe('text helpers', () => {
  it('should escape regular expression metacharacters', () => {
    expect(escapeRegex('a.b*(c)')).toBe('a\\.b\\*\\(c\\)');
    expect(escapeRegex('+1')).toBe('\\+1');
  });

  it('should accept only 24-character hex ids', () => {
    expect(isObjectIdString('65f1c0ffee00000000000001')).toBe(true);
    expect(isObjectIdString('999')).toBe(false);
    expect(isObjectIdString('twelve chars')).toBe(false);
  });

  it('should format local time as YYYY-MM-DD HH:MM:SS', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 7, 8, 9))).toBe('2024-01-05 07:08:09');
  });
});
