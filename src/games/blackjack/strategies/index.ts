import { STRATEGY_NAMES } from '../../../config/index.js';
import type { HouseRules, StrategyName } from '../../../config/index.js';
import type { Logger } from '../../../log.js';
import { IllegalActionError, InvalidConfigurationError } from '../../../utils/errors.js';
import { isPair } from '../hand.js';
import type { Action, HandState } from '../types.js';
import { basic } from './basic.js';
import { random } from './random.js';
import { simplest } from './simplest.js';
import type { Strategy, StrategyContext } from './types.js';

export type { Strategy, StrategyContext } from './types.js';

// Closed set: a new strategy needs a name in STRATEGY_NAMES and an entry here.
const STRATEGIES: { readonly [K in StrategyName]: Strategy } = {
  simplest,
  random,
  basic,
};

export function listStrategies(): StrategyName[] {
  return [...STRATEGY_NAMES];
}

export function isStrategyName(name: string): name is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(name);
}

export function getStrategy(name: string): Strategy {
  if (!isStrategyName(name)) {
    throw new InvalidConfigurationError(`Unknown strategy "${name}". Available: ${STRATEGY_NAMES.join(', ')}`);
  }
  return STRATEGIES[name];
}

export function canDouble(hand: Readonly<HandState>): boolean {
  return hand.cards.length === 2 && hand.actions.length === 0 && !hand.splitDerived && !hand.doubled;
}

/** A split hand starts with only `split` in its actions; anything else is a decision. */
export function hasDecided(hand: Readonly<HandState>): boolean {
  return hand.actions.some((a) => a !== 'split');
}

export function canSplit(hand: Readonly<HandState>, handsInRound: number, rules: Pick<HouseRules, 'maxSplitHands'>): boolean {
  return !hasDecided(hand) && isPair(hand.cards) && handsInRound < rules.maxSplitHands;
}

export function legalActions(
  hand: Readonly<HandState>,
  handsInRound: number,
  rules: Pick<HouseRules, 'maxSplitHands'>,
): Action[] {
  const out: Action[] = ['hit', 'stand'];
  if (canDouble(hand)) out.push('double');
  if (canSplit(hand, handsInRound, rules)) out.push('split');
  return out;
}

/** Fixed downgrade for an action the hand does not allow. */
export function downgrade(action: Action): Action {
  if (action === 'double') return 'hit';
  if (action === 'split') return 'stand';
  return action;
}

/**
 * Asks the strategy for a decision and makes it legal. An illegal answer is a
 * defect in the strategy: it is logged and replaced by its downgrade, and the
 * round goes on.
 */
export function resolveAction(strategy: Strategy, ctx: StrategyContext, log?: Logger): Action {
  const proposed = strategy.decide(ctx);
  if (ctx.legal.includes(proposed)) return proposed;
  const applied = downgrade(proposed);
  const err = new IllegalActionError(strategy.name, proposed, applied);
  log?.warn({ msg: 'illegal_action', code: err.code, error: err.message, strategy: strategy.name, proposed, applied, cards: ctx.hand.cards });
  return applied;
}
