import type { HandState, Rank } from './types.js';

export const RANKS: readonly Rank[] = ['A', 'K', 'Q', 'J', '10', '9', '8', '7', '6', '5', '4', '3', '2'];

export function isRank(v: string): v is Rank {
  return (RANKS as readonly string[]).includes(v);
}

export function valueOfCard(r: Rank): number {
  if (r === 'A') return 11; // can be 1 later
  if (r === 'K' || r === 'Q' || r === 'J' || r === '10') return 10;
  return parseInt(r, 10);
}

export function handTotal(cards: readonly Rank[]): { total: number; soft: boolean } {
  let total = 0;
  let aces = 0;
  for (const r of cards) {
    total += valueOfCard(r);
    if (r === 'A') aces++;
  }
  while (total > 21 && aces > 0) {
    total -= 10; // count one Ace as 1 instead of 11
    aces--;
  }
  // soft while an Ace still counts as 11
  return { total, soft: aces > 0 };
}

export function isBust(cards: readonly Rank[]): boolean {
  return handTotal(cards).total > 21;
}

/** Natural: two cards totalling 21 on a hand that did not come from a split. */
export function isBlackjack(hand: Pick<HandState, 'cards' | 'splitDerived'>): boolean {
  if (hand.cards.length !== 2 || hand.splitDerived) return false;
  return handTotal(hand.cards).total === 21;
}

export function isPair(cards: readonly Rank[]): boolean {
  return cards.length === 2 && valueOfCard(cards[0]) === valueOfCard(cards[1]);
}

export function newHand(cards: Rank[], wager: number, splitDerived = false): HandState {
  return { cards, wager, actions: [], doubled: false, splitDerived, done: false };
}
