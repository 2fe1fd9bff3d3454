import { describe, expect, it } from 'vitest';
import { extractNumber } from '../voice-command.js';

describe('voice command number extraction', () => {
  it('pulls an international number out of a sentence', () => {
    expect(extractNumber('call +918001234567 now')).toBe('+918001234567');
  });

  it('returns nothing when the text has no number', () => {
    expect(extractNumber('hello there')).toBeUndefined();
  });

  it('drops spacing and punctuation between digits', () => {
    expect(extractNumber('please ring +1 (800) 555-0100 today')).toBe('+18005550100');
  });

  it('keeps a following count out of the number', () => {
    expect(extractNumber('call +918001234567 2 times')).toBe('+918001234567');
    expect(extractNumber('ring +44 20 7946 0000 once')).toBe('+442079460000');
  });

  it('returns the first number when several are spoken', () => {
    expect(extractNumber('call +441632960000 or +14155550100')).toBe('+441632960000');
  });

  it('ignores numbers without a leading plus', () => {
    expect(extractNumber('dial 8001234567')).toBeUndefined();
  });

  it('rejects digit runs that are too short or too long', () => {
    expect(extractNumber('extension +123 45')).toBeUndefined();
    expect(extractNumber('+1234567890123456')).toBeUndefined();
    expect(extractNumber('room +12, then +14155550100')).toBe('+14155550100');
  });
});
