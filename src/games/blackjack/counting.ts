import type { Rank } from './types.js';

const HI_LO_TAGS: Record<Rank, number> = {
  A: -1,
  K: -1,
  Q: -1,
  J: -1,
  '10': -1,
  '9': 0,
  '8': 0,
  '7': 0,
  '6': 1,
  '5': 1,
  '4': 1,
  '3': 1,
  '2': 1,
};

export function hiLoValue(r: Rank): number {
  return HI_LO_TAGS[r];
}

/** What the shoe reports to as cards leave it. */
export interface DrawObserver {
  observe(card: Rank): void;
  reset(): void;
}

export class HiLoCounter implements DrawObserver {
  private running = 0;
  private seen = 0;

  observe(card: Rank): void {
    this.running += hiLoValue(card);
    this.seen++;
  }

  reset(): void {
    this.running = 0;
    this.seen = 0;
  }

  get runningCount(): number {
    return this.running;
  }

  /** Cards observed since the last reset. */
  observed(): number {
    return this.seen;
  }

  /** Running count per whole deck left, never dividing by less than one deck. */
  trueCount(decksRemaining: number): number {
    return this.running / Math.max(1, Math.floor(decksRemaining));
  }
}
