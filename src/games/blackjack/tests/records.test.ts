import { describe, it, expect } from '@jest/globals';
import fixture from '../../../../tests/fixtures/seed42-basic.json';
import { simulate } from '../simulate.js';
import { handRecordSchema, round3, summarize } from '../records.js';

describe('records', () => {
  it('rounds to three decimals without negative zero', () => {
    expect(round3(1.23456)).toBe(1.235);
    expect(round3(-1 / 3)).toBe(-0.333);
    expect(Object.is(round3(-0.0001), 0)).toBe(true);
  });

  it('every simulated record fits the schema', () => {
    const records = simulate({ rounds: 30, numDecks: 2, baseBet: 5, strategy: 'random', betMode: 'hi_lo', seed: 4 });
    for (const r of records) expect(handRecordSchema.safeParse(r).success).toBe(true);
  });

  it('flags follow the outcome', () => {
    const records = simulate({ rounds: 200, numDecks: 6, baseBet: 10, strategy: 'basic', betMode: 'fixed', seed: 3 });
    for (const r of records) {
      expect(r.blackjack).toBe(r.outcome === 'blackjack');
      expect(r.busted).toBe(r.outcome === 'bust');
      expect(r.dealerUpCard).toBe(r.dealerCards[0]);
      expect(r.actions[0] === 'split').toBe(r.splitDerived);
    }
  });
});

describe('summarize', () => {
  it('totals one session', () => {
    const [s] = summarize(handRecordSchema.array().parse(fixture.records));
    expect(s).toEqual({
      matchId: 'seed-42',
      strategy: 'basic',
      rounds: 5,
      hands: 5,
      wins: 2,
      losses: 3,
      pushes: 0,
      blackjacks: 0,
      busts: 2,
      doubles: 1,
      splitRounds: 0,
      totalWagered: 60,
      netProfit: -20,
      returnPct: -33.333,
    });
  });

  it('groups by match in first-seen order', () => {
    const base = { rounds: 10, numDecks: 6, baseBet: 10, strategy: 'simplest', betMode: 'fixed' };
    const records = [...simulate({ ...base, seed: 1 }), ...simulate({ ...base, seed: 2 })];
    const summaries = summarize(records);
    expect(summaries.map((s) => s.matchId)).toEqual(['seed-1', 'seed-2']);
    expect(summaries.map((s) => s.rounds)).toEqual([10, 10]);
  });

  it('is empty without records', () => {
    expect(summarize([])).toEqual([]);
  });
});
