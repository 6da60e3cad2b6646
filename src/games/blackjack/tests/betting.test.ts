import { describe, it, expect } from '@jest/globals';
import { DEFAULT_RULES } from '../../../config/index.js';
import { betCap, nextBet } from '../betting.js';

describe('bet sizing', () => {
  it('caps at the multiplier or the table maximum', () => {
    expect(betCap(10, DEFAULT_RULES)).toBe(50);
    expect(betCap(10, { ...DEFAULT_RULES, maxBet: 30 })).toBe(30);
    expect(betCap(10, { ...DEFAULT_RULES, maxBet: 500 })).toBe(50);
  });

  it('fixed ignores the count', () => {
    expect(nextBet(10, 'fixed', 7, 50)).toBe(10);
  });

  it('hi_lo adds one unit per whole true count', () => {
    expect(nextBet(10, 'hi_lo', -3, 50)).toBe(10);
    expect(nextBet(10, 'hi_lo', 0.99, 50)).toBe(10);
    expect(nextBet(10, 'hi_lo', 1, 50)).toBe(20);
    expect(nextBet(10, 'hi_lo', 2.5, 50)).toBe(30);
    expect(nextBet(10, 'hi_lo', 20, 50)).toBe(50);
  });
});
