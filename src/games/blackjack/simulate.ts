import { parseSimulationOptions } from '../../config/index.js';
import type { HouseRules } from '../../config/index.js';
import type { Logger } from '../../log.js';
import type { HandRecord } from './records.js';
import { BlackjackSession } from './session.js';
import type { RoundResult } from './types.js';

export interface SimulateRequest {
  rounds: number;
  numDecks: number;
  baseBet: number;
  strategy: string;
  betMode: string;
  seed?: number;
  matchId?: string;
  rules?: Partial<HouseRules>;
}

export interface SimulateOptions {
  signal?: AbortSignal;
  onRound?: (round: RoundResult) => void;
  logger?: Logger;
}

/**
 * Plays a fresh session of `rounds` rounds and returns one record per player
 * hand, in play order. Invalid requests throw before a card is dealt.
 */
export function simulate(request: SimulateRequest, opts: SimulateOptions = {}): HandRecord[] {
  const { rounds, ...sessionOpts } = parseSimulationOptions(request);
  const session = new BlackjackSession({ ...sessionOpts, logger: opts.logger });
  const played = session.run(rounds, { signal: opts.signal, onRound: opts.onRound });
  return session.records(played);
}
