import { RNG, cryptoRNG } from '../../util/rng.js';
import { ShoeEmptyError } from '../../utils/errors.js';
import type { DrawObserver } from './counting.js';
import { RANKS } from './hand.js';
import type { Rank } from './types.js';

export const CARDS_PER_DECK = 52;

export function makeShoe(decks = 6): Rank[] {
  const cards: Rank[] = [];
  for (let d = 0; d < decks; d++) {
    for (const r of RANKS) {
      // four copies per rank stand in for the suits
      for (let k = 0; k < 4; k++) cards.push(r);
    }
  }
  return cards;
}

export function shuffle<T>(cards: readonly T[], rng: RNG = cryptoRNG): T[] {
  const a = cards.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = rng(i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

/**
 * Suitless multi-deck shoe. Cards are dealt from the end of the array, and
 * every card that leaves the shoe is reported to the observer.
 */
export class Shoe {
  private cards: Rank[] = [];
  private shuffles = 0;

  constructor(
    readonly decks: number,
    private readonly rng: RNG = cryptoRNG,
    private readonly observer?: DrawObserver,
  ) {
    this.fill();
  }

  /**
   * Shoe whose next cards are `dealOrder`, first card dealt first. Once they
   * run out a reshuffle brings back the full composition as usual.
   */
  static stacked(
    dealOrder: readonly Rank[],
    opts: { decks?: number; rng?: RNG; observer?: DrawObserver } = {},
  ): Shoe {
    const shoe = new Shoe(opts.decks ?? 1, opts.rng, opts.observer);
    shoe.cards = dealOrder.slice().reverse();
    return shoe;
  }

  private fill(): void {
    this.cards = shuffle(makeShoe(this.decks), this.rng);
    this.shuffles++;
  }

  size(): number {
    return this.decks * CARDS_PER_DECK;
  }

  remaining(): number {
    return this.cards.length;
  }

  decksRemaining(): number {
    return this.cards.length / CARDS_PER_DECK;
  }

  /** Times the shoe has been shuffled, the initial shuffle included. */
  shuffleCount(): number {
    return this.shuffles;
  }

  draw(): Rank {
    const card = this.cards.pop();
    if (card === undefined) throw new ShoeEmptyError(this.size());
    this.observer?.observe(card);
    return card;
  }

  reshuffle(): void {
    this.fill();
    this.observer?.reset();
  }

  reshuffleIfNeeded(threshold: number): boolean {
    if (this.cards.length > threshold) return false;
    this.reshuffle();
    return true;
  }

  composition(): Record<Rank, number> {
    const counts: Record<Rank, number> = {
      A: 0, K: 0, Q: 0, J: 0, '10': 0, '9': 0, '8': 0, '7': 0, '6': 0, '5': 0, '4': 0, '3': 0, '2': 0,
    };
    for (const c of this.cards) counts[c]++;
    return counts;
  }
}
