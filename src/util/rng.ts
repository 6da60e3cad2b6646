import { randomInt as cryptoRandomInt } from 'node:crypto';
import { GeneratorMisuseError } from '../utils/errors.js';

export type RNG = (maxExclusive: number) => number;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new Error('maxExclusive must be > 0');
  return cryptoRandomInt(0, maxExclusive);
};

// Deterministic PRNG
export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return (maxExclusive: number) => {
    if (maxExclusive <= 0) throw new Error('maxExclusive must be > 0');
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    r = ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 0..1
    return Math.floor(r * maxExclusive);
  };
}

export function seededRNG(seed: number): RNG {
  return mulberry32(seed);
}

export function pick<T>(arr: readonly T[], rng: RNG = cryptoRNG): T {
  if (arr.length === 0) throw new Error('Cannot pick from empty array');
  return arr[rng(arr.length)];
}

/**
 * The single random source of a session. Shuffles and the random strategy
 * both draw from it, so a seeded session replays exactly.
 *
 * A generator belongs to one session: it counts its draws and remembers who
 * claimed it, and a seeded one that was already drawn from or claimed cannot
 * start another session.
 */
export class SessionRandom {
  private readonly source: RNG;
  private drawn = 0;
  private owner: string | null = null;

  constructor(readonly seed?: number) {
    this.source = seed === undefined ? cryptoRNG : mulberry32(seed);
  }

  get seeded(): boolean {
    return this.seed !== undefined;
  }

  get draws(): number {
    return this.drawn;
  }

  get claimedBy(): string | null {
    return this.owner;
  }

  /** Integer in [0, maxExclusive). */
  int(maxExclusive: number): number {
    this.drawn++;
    return this.source(maxExclusive);
  }

  /** Plain RNG view for helpers that take one (shuffle, pick). */
  readonly next: RNG = (maxExclusive) => this.int(maxExclusive);

  claim(owner: string, requestedSeed?: number): void {
    if (requestedSeed !== undefined && requestedSeed !== this.seed) {
      throw new GeneratorMisuseError(
        `Generator seeded with ${String(this.seed)} cannot serve a session requesting seed ${requestedSeed}`,
      );
    }
    if (!this.seeded) {
      this.owner = owner;
      return;
    }
    if (this.owner !== null && this.owner !== owner) {
      throw new GeneratorMisuseError(`Seeded generator is already owned by session ${this.owner}`);
    }
    if (this.drawn > 0) {
      throw new GeneratorMisuseError(`Seeded generator was already used for ${this.drawn} draws; a rerun would not replay`);
    }
    this.owner = owner;
  }
}

export function createSessionRandom(seed?: number): SessionRandom {
  return new SessionRandom(seed);
}
