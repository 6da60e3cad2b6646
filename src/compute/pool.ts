import Piscina from 'piscina';
import path from 'node:path';
import type { SimulateRequest } from '../games/blackjack/simulate.js';
import { createLogger } from '../log.js';

const log = createLogger('compute');

export type ComputeRequest =
    | { op: 'blackjack.simulate'; args: [SimulateRequest] }
    | { op: 'blackjack.strategies'; args: [] };

export interface ComputePoolOptions {
    size: number;
    /** Compiled worker module; defaults to worker.js beside this file. */
    filename?: string;
    idleTimeoutMs?: number;
}

/**
 * Worker-thread pool for independent sessions. Each task is a whole session,
 * so nothing is shared between threads.
 */
export class ComputePool {
    private pool?: Piscina;

    constructor(private readonly options: ComputePoolOptions) {}

    get initialized(): boolean {
        return this.pool !== undefined;
    }

    init(): void {
        if (this.pool) return;
        const size = Math.max(1, this.options.size);
        this.pool = new Piscina({
            filename: this.options.filename ?? path.join(__dirname, 'worker.js'),
            maxThreads: size,
            minThreads: Math.min(2, size),
            idleTimeout: this.options.idleTimeoutMs ?? 30000,
            resourceLimits: {
                maxOldGenerationSizeMb: 512,
                maxYoungGenerationSizeMb: 128,
            },
        });
        log.info({ msg: 'compute_pool_initialized', maxThreads: size });
    }

    async run(request: ComputeRequest, signal?: AbortSignal): Promise<unknown> {
        if (!this.pool) {
            throw new Error('Compute pool not initialized');
        }
        try {
            const result: unknown = await this.pool.run(request, { signal });
            return result;
        } catch (error) {
            log.error({ msg: 'compute_task_error', op: request.op, error: error instanceof Error ? error.message : String(error) });
            throw error;
        }
    }

    async destroy(): Promise<void> {
        if (this.pool) {
            await this.pool.destroy();
            this.pool = undefined;
            log.info({ msg: 'compute_pool_destroyed' });
        }
    }

    getStats() {
        if (!this.pool) return { threads: 0, completed: 0, queueSize: 0 };
        return { threads: this.pool.threads.length, completed: this.pool.completed, queueSize: this.pool.queueSize };
    }
}
