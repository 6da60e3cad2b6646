import { describe, it, expect } from '@jest/globals';
import { handTotal, isBlackjack, isBust, isPair, isRank, newHand, valueOfCard } from '../hand.js';

describe('hand evaluation', () => {
  it('counts aces high until that busts', () => {
    expect(handTotal(['A', '9'])).toEqual({ total: 20, soft: true });
    expect(handTotal(['A', '9', '5'])).toEqual({ total: 15, soft: false });
    expect(handTotal(['A', 'A'])).toEqual({ total: 12, soft: true });
    expect(handTotal(['A', 'A', 'A', '8'])).toEqual({ total: 21, soft: true });
    expect(handTotal(['K', 'Q', '2'])).toEqual({ total: 22, soft: false });
  });

  it('values faces as ten', () => {
    expect(['K', 'Q', 'J', '10'].map((r) => (isRank(r) ? valueOfCard(r) : 0))).toEqual([10, 10, 10, 10]);
    expect(isRank('1')).toBe(false);
  });

  it('detects busts', () => {
    expect(isBust(['10', '6', '6'])).toBe(true);
    expect(isBust(['A', '6', '6'])).toBe(false);
  });

  it('a natural needs two cards and no split', () => {
    expect(isBlackjack({ cards: ['A', 'K'], splitDerived: false })).toBe(true);
    expect(isBlackjack({ cards: ['A', 'K'], splitDerived: true })).toBe(false);
    expect(isBlackjack({ cards: ['A', '5', '5'], splitDerived: false })).toBe(false);
  });

  it('pairs are equal values', () => {
    expect(isPair(['K', '10'])).toBe(true);
    expect(isPair(['A', 'A'])).toBe(true);
    expect(isPair(['9', '8'])).toBe(false);
    expect(isPair(['8', '8', '8'])).toBe(false);
  });

  it('new hands start open', () => {
    expect(newHand(['2', '3'], 10, true)).toEqual({
      cards: ['2', '3'], wager: 10, actions: [], doubled: false, splitDerived: true, done: false,
    });
  });
});
