import { describe, it, expect } from 'vitest';
import { getFlag, getFlags, getNumberFlag } from '../src/args.js';

describe('flags', () => {
  it('reads the value after a flag', () => {
    expect(getFlag(['report', '--out', 'r.md'], '--out')).toBe('r.md');
    expect(getFlag(['report', '--out'], '--out')).toBeUndefined();
    expect(getFlag(['report'], '--out')).toBeUndefined();
  });

  it('collects repeated flags in order', () => {
    expect(getFlags(['--cap', 'a', '--pct', '1', '--cap', 'b'], '--cap')).toEqual(['a', 'b']);
  });

  it('parses numbers and rejects garbage', () => {
    expect(getNumberFlag(['--days', '14'], '--days')).toBe(14);
    expect(getNumberFlag([], '--days')).toBeUndefined();
    expect(() => getNumberFlag(['--days', 'soon'], '--days')).toThrow('--days expects a number, got "soon"');
  });
});
