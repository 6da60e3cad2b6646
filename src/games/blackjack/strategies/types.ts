import type { StrategyName } from '../../../config/index.js';
import type { RNG } from '../../../util/rng.js';
import type { Action, HandState, Rank } from '../types.js';

export interface StrategyContext {
  hand: Readonly<HandState>;
  dealerUpCard: Rank;
  total: number;
  soft: boolean;
  /** Actions the engine will accept right now, in a fixed order. */
  legal: readonly Action[];
  runningCount: number;
  trueCount: number;
  rng: RNG;
}

export interface Strategy {
  readonly name: StrategyName;
  readonly description: string;
  decide(ctx: StrategyContext): Action;
}
