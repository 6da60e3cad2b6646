export { simulate } from './games/blackjack/simulate.js';
export type { SimulateOptions, SimulateRequest } from './games/blackjack/simulate.js';
export { BlackjackSession, MIN_ROUND_CARDS } from './games/blackjack/session.js';
export type { RunOptions, SessionOptions } from './games/blackjack/session.js';
export { getStrategy, legalActions, listStrategies } from './games/blackjack/strategies/index.js';
export type { Strategy, StrategyContext } from './games/blackjack/strategies/index.js';
export { handRecordSchema, summarize } from './games/blackjack/records.js';
export type { HandRecord, SessionSummary } from './games/blackjack/records.js';
export { Shoe, makeShoe, shuffle } from './games/blackjack/shoe.js';
export { HiLoCounter, hiLoValue } from './games/blackjack/counting.js';
export { handTotal, isBlackjack } from './games/blackjack/hand.js';
export { betCap, nextBet } from './games/blackjack/betting.js';
export type { Action, HandOutcome, Rank, RoundResult } from './games/blackjack/types.js';
export { simulateMany } from './compute/batch.js';
export type { BatchOptions } from './compute/batch.js';
export { ComputePool } from './compute/pool.js';
export { DEFAULT_RULES, getConfig, loadConfig, parseSimulationOptions, resolveRules } from './config/index.js';
export type { AppConfig, BetMode, HouseRules, StrategyName } from './config/index.js';
export { SessionRandom, createSessionRandom, seededRNG } from './util/rng.js';
export type { RNG } from './util/rng.js';
export {
  GeneratorMisuseError,
  IllegalActionError,
  InvalidConfigurationError,
  ShoeEmptyError,
  SimulationError,
  isSimulationError,
} from './utils/errors.js';
