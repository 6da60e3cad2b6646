import { z } from 'zod';
import { BET_MODES, STRATEGY_NAMES } from '../../config/index.js';
import { resultOf } from './engine.js';
import type { RoundResult } from './types.js';

const rankSchema = z.enum(['A', 'K', 'Q', 'J', '10', '9', '8', '7', '6', '5', '4', '3', '2']);

/** One player hand of one round, flattened for the caller's storage. */
export const handRecordSchema = z.object({
  matchId: z.string(),
  roundId: z.number().int().positive(),
  handNumber: z.number().int().positive(),
  strategy: z.enum(STRATEGY_NAMES),
  betMode: z.enum(BET_MODES),
  dealerUpCard: rankSchema,
  dealerCards: z.array(rankSchema),
  playerCards: z.array(rankSchema),
  actions: z.array(z.enum(['hit', 'stand', 'double', 'split'])),
  wager: z.number().positive(),
  doubled: z.boolean(),
  splitDerived: z.boolean(),
  outcome: z.enum(['win', 'lose', 'push', 'blackjack', 'bust']),
  result: z.enum(['win', 'lose', 'push']),
  blackjack: z.boolean(),
  busted: z.boolean(),
  profit: z.number(),
  trueCountPrevRound: z.number(),
  runningCount: z.number(),
  trueCount: z.number(),
  cardsRemaining: z.number().int().min(0),
  decksRemaining: z.number().min(0),
});

export type HandRecord = z.infer<typeof handRecordSchema>;

export const handRecordsSchema = z.array(handRecordSchema);

export function round3(n: number): number {
  return Math.round(n * 1000) / 1000 || 0; // no -0 in records
}

export function toHandRecords(matchId: string, round: RoundResult): HandRecord[] {
  return round.hands.map(({ hand, outcome, profit }, i) => ({
    matchId,
    roundId: round.roundId,
    handNumber: i + 1,
    strategy: round.strategy,
    betMode: round.betMode,
    dealerUpCard: round.dealer[0],
    dealerCards: [...round.dealer],
    playerCards: [...hand.cards],
    actions: [...hand.actions],
    wager: hand.wager,
    doubled: hand.doubled,
    splitDerived: hand.splitDerived,
    outcome,
    result: resultOf(outcome),
    blackjack: outcome === 'blackjack',
    busted: outcome === 'bust',
    profit: round3(profit),
    trueCountPrevRound: round3(round.priorTrueCount),
    runningCount: round.count.running,
    trueCount: round3(round.count.trueCount),
    cardsRemaining: round.count.cardsRemaining,
    decksRemaining: round3(round.count.decksRemaining),
  }));
}

export interface SessionSummary {
  matchId: string;
  strategy: string;
  rounds: number;
  hands: number;
  wins: number;
  losses: number;
  pushes: number;
  blackjacks: number;
  busts: number;
  doubles: number;
  splitRounds: number;
  totalWagered: number;
  netProfit: number;
  /** Net profit per unit wagered, in percent. */
  returnPct: number;
}

export function summarize(records: readonly HandRecord[]): SessionSummary[] {
  const byMatch = new Map<string, HandRecord[]>();
  for (const r of records) {
    const list = byMatch.get(r.matchId);
    if (list) list.push(r);
    else byMatch.set(r.matchId, [r]);
  }
  return [...byMatch.entries()].map(([matchId, rs]) => {
    const totalWagered = rs.reduce((acc, r) => acc + r.wager, 0);
    const netProfit = rs.reduce((acc, r) => acc + r.profit, 0);
    return {
      matchId,
      strategy: rs[0].strategy,
      rounds: new Set(rs.map((r) => r.roundId)).size,
      hands: rs.length,
      wins: rs.filter((r) => r.result === 'win').length,
      losses: rs.filter((r) => r.result === 'lose').length,
      pushes: rs.filter((r) => r.result === 'push').length,
      blackjacks: rs.filter((r) => r.blackjack).length,
      busts: rs.filter((r) => r.busted).length,
      doubles: rs.filter((r) => r.doubled).length,
      splitRounds: rs.filter((r) => r.splitDerived && r.handNumber === 1).length,
      totalWagered: round3(totalWagered),
      netProfit: round3(netProfit),
      returnPct: totalWagered > 0 ? round3((netProfit / totalWagered) * 100) : 0,
    };
  });
}
