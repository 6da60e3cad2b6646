import { z } from 'zod';
import { handRecordsSchema } from '../games/blackjack/records.js';
import type { HandRecord } from '../games/blackjack/records.js';
import { simulate } from '../games/blackjack/simulate.js';
import type { SimulateRequest } from '../games/blackjack/simulate.js';
import { InvalidConfigurationError, SimulationError } from '../utils/errors.js';
import type { ComputePool } from './pool.js';

const responseSchema = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), result: z.unknown() }),
    z.object({
        ok: z.literal(false),
        error: z.object({ name: z.string(), message: z.string(), code: z.string().optional() }),
    }),
]);

export interface BatchOptions {
    pool?: ComputePool;
    signal?: AbortSignal;
    /** Called as each session finishes, in completion order. */
    onSession?: (index: number, records: HandRecord[]) => void;
}

function rethrow(error: { name: string; message: string; code?: string }): never {
    if (error.code === 'ERR_INVALID_CONFIG') throw new InvalidConfigurationError(error.message);
    if (error.code === 'ERR_GENERATOR_MISUSE' || error.code === 'ERR_SHOE_EMPTY' || error.code === 'ERR_ILLEGAL_ACTION') {
        throw new SimulationError(error.message, error.code);
    }
    const err = new Error(error.message);
    err.name = error.name;
    throw err;
}

function isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === 'AbortError';
}

/**
 * Runs independent sessions, one per request. With a pool they run on worker
 * threads; without one they run inline, one after another. Results keep the
 * order of `requests`. On abort, sessions that never finished come back empty.
 */
export async function simulateMany(requests: readonly SimulateRequest[], opts: BatchOptions = {}): Promise<HandRecord[][]> {
    const { pool } = opts;
    if (!pool) {
        return requests.map((req, i) => {
            const records = simulate(req, { signal: opts.signal });
            opts.onSession?.(i, records);
            return records;
        });
    }
    pool.init();
    const settled = await Promise.allSettled(
        requests.map(async (req, i) => {
            const raw = await pool.run({ op: 'blackjack.simulate', args: [req] }, opts.signal);
            const response = responseSchema.parse(raw);
            if (!response.ok) rethrow(response.error);
            const records = handRecordsSchema.parse(response.result);
            opts.onSession?.(i, records);
            return records;
        }),
    );
    return settled.map((s) => {
        if (s.status === 'fulfilled') return s.value;
        // an aborted session did not run; the finished ones are kept
        if (opts.signal?.aborted && isAbortError(s.reason)) return [];
        throw s.reason;
    });
}
