import { describe, it, expect } from '@jest/globals';
import { HiLoCounter, hiLoValue } from '../counting.js';
import { makeShoe } from '../shoe.js';
import type { Rank } from '../types.js';

describe('Hi-Lo counting', () => {
  it('tags low cards +1, tens and aces -1', () => {
    const ranks: Rank[] = ['2', '6', '7', '9', '10', 'K', 'A'];
    expect(ranks.map(hiLoValue)).toEqual([1, 1, 0, 0, -1, -1, -1]);
  });

  it('keeps a running count until reset', () => {
    const c = new HiLoCounter();
    for (const r of ['2', 'K', '7', 'A', '5', '3'] as const) c.observe(r);
    expect(c.runningCount).toBe(1);
    expect(c.observed()).toBe(6);
    c.reset();
    expect(c.runningCount).toBe(0);
    expect(c.observed()).toBe(0);
  });

  it('divides by whole decks left, at least one', () => {
    const c = new HiLoCounter();
    for (let i = 0; i < 6; i++) c.observe('4');
    expect(c.trueCount(2.9)).toBe(3);
    expect(c.trueCount(6)).toBe(1);
    expect(c.trueCount(0.5)).toBe(6);
  });

  it('a whole shoe counts back to zero', () => {
    const c = new HiLoCounter();
    for (const r of makeShoe(6)) c.observe(r);
    expect(c.runningCount).toBe(0);
    expect(c.observed()).toBe(312);
  });
});
