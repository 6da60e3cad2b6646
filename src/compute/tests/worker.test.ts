import { describe, it, expect } from '@jest/globals';
import { simulate } from '../../games/blackjack/simulate.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { simulateMany } from '../batch.js';
import { ComputePool } from '../pool.js';
import run, { handleRequest } from '../worker.js';

const request = { rounds: 8, numDecks: 6, baseBet: 10, strategy: 'basic', betMode: 'fixed', seed: 5 };

describe('compute worker', () => {
  it('dispatches by op', () => {
    expect(handleRequest({ op: 'blackjack.strategies', args: [] })).toEqual(['simplest', 'random', 'basic']);
    expect(handleRequest({ op: 'blackjack.simulate', args: [request] })).toEqual(simulate(request));
  });

  it('returns errors as data', () => {
    expect(run({ op: 'blackjack.simulate', args: [{ ...request, rounds: 0 }] })).toEqual({
      ok: false,
      error: {
        name: 'InvalidConfigurationError',
        message: 'Invalid simulation options: rounds: rounds must be at least 1',
        code: 'ERR_INVALID_CONFIG',
      },
    });
    expect(run({ op: 'blackjack.strategies', args: [] })).toEqual({ ok: true, result: ['simplest', 'random', 'basic'] });
  });
});

describe('simulateMany', () => {
  it('runs inline without a pool, in request order', async () => {
    const requests = [request, { ...request, seed: 6 }];
    const seen: number[] = [];
    const results = await simulateMany(requests, { onSession: (i) => seen.push(i) });
    expect(results).toEqual([simulate(requests[0]), simulate(requests[1])]);
    expect(seen).toEqual([0, 1]);
  });

  it('sessions are independent of batch neighbours', async () => {
    const [alone] = await simulateMany([request]);
    const [first] = await simulateMany([request, { ...request, seed: 99, strategy: 'random' }]);
    expect(first).toEqual(alone);
  });

  it('fails the batch on an invalid request', async () => {
    await expect(simulateMany([request, { ...request, numDecks: 12 }])).rejects.toThrow(InvalidConfigurationError);
  });
});

describe('ComputePool', () => {
  it('must be initialized before running', async () => {
    const pool = new ComputePool({ size: 1 });
    expect(pool.initialized).toBe(false);
    expect(pool.getStats()).toEqual({ threads: 0, completed: 0, queueSize: 0 });
    await expect(pool.run({ op: 'blackjack.strategies', args: [] })).rejects.toThrow('Compute pool not initialized');
    await pool.destroy();
  });
});
