import { nanoid } from 'nanoid';
import { resolveRules, sessionOptionsSchema } from '../../config/index.js';
import type { BetMode, HouseRules } from '../../config/index.js';
import { createLogger } from '../../log.js';
import type { Logger } from '../../log.js';
import { SessionRandom } from '../../util/rng.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { betCap, nextBet } from './betting.js';
import { HiLoCounter } from './counting.js';
import { playRound } from './engine.js';
import type { Table } from './engine.js';
import { toHandRecords } from './records.js';
import type { HandRecord } from './records.js';
import { Shoe } from './shoe.js';
import { getStrategy } from './strategies/index.js';
import type { Strategy } from './strategies/index.js';
import type { RoundResult } from './types.js';

const log = createLogger('blackjack');

/** Fewest cards a round can possibly need: two for the player, two for the dealer. */
export const MIN_ROUND_CARDS = 4;

export interface SessionOptions {
  numDecks: number;
  baseBet: number;
  /** Checked against the registered strategies. */
  strategy: string;
  /** `fixed`, `hi_lo` (or `hi-lo`). */
  betMode: string;
  seed?: number;
  matchId?: string;
  rules?: Partial<HouseRules>;
  /** Bring your own generator; a seeded one must be fresh and unshared. */
  random?: SessionRandom;
  logger?: Logger;
}

export interface RunOptions {
  /** Checked between rounds; the rounds finished so far are kept. */
  signal?: AbortSignal;
  onRound?: (round: RoundResult) => void;
}

/**
 * One match: a fixed strategy playing round after round out of its own shoe.
 * The shoe, the count, the generator and the bankroll all live here, so
 * sessions never share state and each replays from its seed.
 */
export class BlackjackSession {
  readonly id: string;
  readonly strategy: Strategy;
  readonly betMode: BetMode;
  readonly baseBet: number;
  readonly rules: HouseRules;
  readonly random: SessionRandom;
  readonly counter = new HiLoCounter();
  readonly shoe: Shoe;

  private readonly log: Logger;
  private readonly cap: number;
  private readonly history: RoundResult[] = [];
  private bankroll = 0;
  private wagered = 0;
  private reshuffles = 0;

  constructor(options: SessionOptions) {
    const parsed = sessionOptionsSchema.safeParse({
      numDecks: options.numDecks,
      baseBet: options.baseBet,
      strategy: options.strategy,
      betMode: options.betMode,
      seed: options.seed,
      matchId: options.matchId,
      rules: options.rules,
    });
    if (!parsed.success) throw InvalidConfigurationError.fromZod(parsed.error, 'session options');
    const opts = parsed.data;

    this.rules = resolveRules(opts.rules);
    this.cap = betCap(opts.baseBet, this.rules);
    if (this.cap < opts.baseBet) {
      throw new InvalidConfigurationError(`maxBet ${this.cap} is below the base bet ${opts.baseBet}`);
    }
    this.strategy = getStrategy(opts.strategy);
    this.betMode = opts.betMode;
    this.baseBet = opts.baseBet;
    this.log = options.logger ?? log;

    this.random = options.random ?? new SessionRandom(opts.seed);
    this.id = opts.matchId ?? (this.random.seed !== undefined ? `seed-${this.random.seed}` : nanoid());
    // fails fast on a seeded generator that was already used or is owned elsewhere
    this.random.claim(this.id, opts.seed);

    this.shoe = new Shoe(opts.numDecks, this.random.next, this.counter);
    this.log.debug({ msg: 'session_created', matchId: this.id, strategy: this.strategy.name, betMode: this.betMode, decks: opts.numDecks, seeded: this.random.seeded });
  }

  get rounds(): readonly RoundResult[] {
    return this.history;
  }

  get netProfit(): number {
    return this.bankroll;
  }

  get totalWagered(): number {
    return this.wagered;
  }

  /** Reshuffle point: the cut card at the configured penetration, or too few cards for a round. */
  reshuffleThreshold(): number {
    return Math.max(MIN_ROUND_CARDS, this.shoe.size() * (1 - this.rules.penetration));
  }

  private table(): Table {
    return { shoe: this.shoe, counter: this.counter, rules: this.rules, strategy: this.strategy, rng: this.random.next, log: this.log };
  }

  playRound(): RoundResult {
    if (this.shoe.reshuffleIfNeeded(this.reshuffleThreshold())) {
      this.reshuffles++;
      this.log.debug({ msg: 'shoe_reshuffled', matchId: this.id, round: this.history.length + 1 });
    }

    // count as it stood when the previous round resolved (zero on a fresh shoe)
    const priorTrueCount = this.counter.trueCount(this.shoe.decksRemaining());
    const wager = nextBet(this.baseBet, this.betMode, priorTrueCount, this.cap);

    const { state, settled } = playRound(this.table(), wager);
    this.reshuffles += state.reshuffles;

    const round: RoundResult = {
      roundId: this.history.length + 1,
      strategy: this.strategy.name,
      betMode: this.betMode,
      wager,
      dealer: state.dealer,
      hands: settled,
      natural: state.natural,
      dealerPlayed: state.dealerPlayed,
      priorTrueCount,
      count: {
        running: this.counter.runningCount,
        trueCount: this.counter.trueCount(this.shoe.decksRemaining()),
        cardsRemaining: this.shoe.remaining(),
        decksRemaining: this.shoe.decksRemaining(),
      },
      reshuffles: state.reshuffles,
    };
    for (const s of settled) {
      this.bankroll += s.profit;
      this.wagered += s.hand.wager;
    }
    this.history.push(round);
    return round;
  }

  /** Plays up to `n` rounds lazily; stop iterating (or abort) to stop the session. */
  *play(n: number, signal?: AbortSignal): Generator<RoundResult, void, undefined> {
    for (let i = 0; i < n; i++) {
      if (signal?.aborted) return;
      yield this.playRound();
    }
  }

  run(n: number, opts: RunOptions = {}): RoundResult[] {
    const out: RoundResult[] = [];
    for (const round of this.play(n, opts.signal)) {
      out.push(round);
      opts.onRound?.(round);
    }
    if (out.length < n) {
      this.log.info({ msg: 'session_cancelled', matchId: this.id, completed: out.length, requested: n });
    }
    this.log.debug({ msg: 'session_finished', matchId: this.id, rounds: out.length, netProfit: this.bankroll });
    return out;
  }

  records(rounds: readonly RoundResult[] = this.history): HandRecord[] {
    return rounds.flatMap((r) => toHandRecords(this.id, r));
  }

  stats() {
    return {
      matchId: this.id,
      strategy: this.strategy.name,
      rounds: this.history.length,
      netProfit: this.bankroll,
      totalWagered: this.wagered,
      reshuffles: this.reshuffles,
      runningCount: this.counter.runningCount,
      cardsRemaining: this.shoe.remaining(),
    };
  }
}
