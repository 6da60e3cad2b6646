import { describe, it, expect, afterEach } from '@jest/globals';
import path from 'node:path';
import { simulate } from '../../games/blackjack/simulate.js';
import { InvalidConfigurationError } from '../../utils/errors.js';
import { simulateMany } from '../batch.js';
import { ComputePool } from '../pool.js';

// Worker threads load the TypeScript sources through tsx
const WORKER = path.resolve(__dirname, '../../../tests/fixtures/ts-worker.js');
const SLOW = 30_000;

const request = { rounds: 20, numDecks: 6, baseBet: 10, strategy: 'basic', betMode: 'fixed', seed: 5 };

describe('ComputePool with worker threads', () => {
  let pool: ComputePool | undefined;

  afterEach(async () => {
    await pool?.destroy();
    pool = undefined;
  });

  it('answers requests and reports its threads', async () => {
    pool = new ComputePool({ size: 1, filename: WORKER });
    pool.init();
    expect(pool.initialized).toBe(true);
    await expect(pool.run({ op: 'blackjack.strategies', args: [] })).resolves.toEqual({
      ok: true,
      result: ['simplest', 'random', 'basic'],
    });
    expect(pool.getStats().completed).toBe(1);
  }, SLOW);

  it('pooled sessions match inline ones', async () => {
    pool = new ComputePool({ size: 2, filename: WORKER });
    const requests = [request, { ...request, seed: 6, betMode: 'hi_lo' }, { ...request, seed: 7, strategy: 'random' }];
    const results = await simulateMany(requests, { pool });
    expect(results).toEqual(requests.map((r) => simulate(r)));
  }, SLOW);

  it('a worker-side configuration error comes back typed', async () => {
    pool = new ComputePool({ size: 1, filename: WORKER });
    const run = simulateMany([request, { ...request, numDecks: 12 }], { pool });
    await expect(run).rejects.toThrow(InvalidConfigurationError);
    await expect(run).rejects.toThrow('Invalid simulation options: numDecks: numDecks must be between 1 and 8');
  }, SLOW);

  it('keeps finished sessions when the batch is aborted', async () => {
    pool = new ComputePool({ size: 1, filename: WORKER });
    const controller = new AbortController();
    const long = { ...request, rounds: 50_000 };
    const finished: number[] = [];
    const results = await simulateMany([request, { ...long, seed: 8 }, { ...long, seed: 9 }], {
      pool,
      signal: controller.signal,
      onSession: (i) => {
        finished.push(i);
        controller.abort();
      },
    });
    expect(finished).toEqual([0]);
    expect(results).toEqual([simulate(request), [], []]);
  }, SLOW);
});
