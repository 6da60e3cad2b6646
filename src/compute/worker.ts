import type { ComputeRequest } from './pool.js';
import { normalizeError } from '../utils/errors.js';

// Import task handlers
import * as blackjackTasks from './tasks/blackjack.js';

export type ComputeResponse =
    | { ok: true; result: unknown }
    | { ok: false; error: { name: string; message: string; code?: string } };

export function handleRequest(request: ComputeRequest): unknown {
    switch (request.op) {
        case 'blackjack.simulate':
            return blackjackTasks.simulateTask(request.args[0]);
        case 'blackjack.strategies':
            return blackjackTasks.strategiesTask();
    }
}

/**
 * Worker entry. Errors travel back as data so the caller sees the original
 * error name and code rather than a structured-clone of the Error.
 */
export default function run(request: ComputeRequest): ComputeResponse {
    try {
        return { ok: true, result: handleRequest(request) };
    } catch (error) {
        const { name, message, code } = normalizeError(error);
        return { ok: false, error: { name, message, code } };
    }
}
