import type { BetMode, StrategyName } from '../../config/index.js';

export type Rank = 'A' | 'K' | 'Q' | 'J' | '10' | '9' | '8' | '7' | '6' | '5' | '4' | '3' | '2';

export type Action = 'hit' | 'stand' | 'double' | 'split';

export type HandOutcome = 'win' | 'lose' | 'push' | 'blackjack' | 'bust';
export type HandResult = 'win' | 'lose' | 'push';

export interface HandState {
  cards: Rank[];
  wager: number;
  actions: Action[];
  doubled: boolean;
  splitDerived: boolean;
  done: boolean;
}

export interface SettledHand {
  hand: HandState;
  outcome: HandOutcome;
  profit: number;
}

export interface CountSnapshot {
  running: number;
  trueCount: number;
  cardsRemaining: number;
  decksRemaining: number;
}

export interface RoundResult {
  roundId: number;
  strategy: StrategyName;
  betMode: BetMode;
  wager: number;
  dealer: Rank[];
  hands: SettledHand[];
  natural: boolean;
  dealerPlayed: boolean;
  /** True count the wager was sized from. */
  priorTrueCount: number;
  /** Count state once the round resolved. */
  count: CountSnapshot;
  reshuffles: number;
}
