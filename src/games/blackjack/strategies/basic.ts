import { z } from 'zod';
import { isPair, valueOfCard } from '../hand.js';
import type { Action, Rank } from '../types.js';
import rawTable from './basic-strategy.json';
import type { Strategy, StrategyContext } from './types.js';

/**
 * Table codes:
 *   H  hit
 *   S  stand
 *   D  double, hit when doubling is not allowed
 *   Ds double, stand when doubling is not allowed
 *   P  split; when splitting is not allowed the soft/hard rows decide
 */
const codeSchema = z.enum(['H', 'S', 'D', 'Ds', 'P']);
type Code = z.infer<typeof codeSchema>;

const row = z.array(codeSchema).length(10);

const tableSchema = z.object({
  dealerColumns: z.tuple([
    z.literal('2'), z.literal('3'), z.literal('4'), z.literal('5'), z.literal('6'),
    z.literal('7'), z.literal('8'), z.literal('9'), z.literal('10'), z.literal('A'),
  ]),
  pairs: z.record(z.string().regex(/^(A|10|[2-9])$/), row),
  soft: z.record(z.string().regex(/^\d+$/), row),
  hard: z.record(z.string().regex(/^\d+$/), row),
});

export type BasicStrategyTable = z.infer<typeof tableSchema>;

export const BASIC_TABLE: BasicStrategyTable = tableSchema.parse(rawTable);

/** Column of the table for a dealer up-card: 2..9, then any ten, then the Ace. */
export function dealerColumn(up: Rank): number {
  if (up === 'A') return 9;
  return valueOfCard(up) - 2;
}

function pairKey(card: Rank): string {
  if (card === 'A') return 'A';
  return String(valueOfCard(card));
}

export function lookupPair(cards: readonly Rank[], up: Rank): Code | undefined {
  if (!isPair(cards)) return undefined;
  const r = BASIC_TABLE.pairs[pairKey(cards[0])];
  return r ? r[dealerColumn(up)] : undefined;
}

export function lookupTotal(total: number, soft: boolean, up: Rank): Code {
  const r = (soft ? BASIC_TABLE.soft : BASIC_TABLE.hard)[String(total)];
  if (r) return r[dealerColumn(up)];
  return total >= 17 ? 'S' : 'H';
}

function apply(code: Code, legal: readonly Action[]): Action {
  switch (code) {
    case 'H':
      return 'hit';
    case 'S':
      return 'stand';
    case 'D':
      return legal.includes('double') ? 'double' : 'hit';
    case 'Ds':
      return legal.includes('double') ? 'double' : 'stand';
    case 'P':
      return 'split';
  }
}

export const basic: Strategy = {
  name: 'basic',
  description: 'Table-driven basic strategy: pairs, then soft totals, then hard totals by dealer up-card.',
  decide({ hand, dealerUpCard, total, soft, legal }: StrategyContext) {
    const pair = lookupPair(hand.cards, dealerUpCard);
    if (pair !== undefined && (pair !== 'P' || legal.includes('split'))) return apply(pair, legal);
    // no pair, or a pair we may not split any more: play the total
    return apply(lookupTotal(total, soft, dealerUpCard), legal);
  },
};
