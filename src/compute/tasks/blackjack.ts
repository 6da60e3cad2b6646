import type { StrategyName } from '../../config/index.js';
import type { HandRecord } from '../../games/blackjack/records.js';
import { simulate } from '../../games/blackjack/simulate.js';
import type { SimulateRequest } from '../../games/blackjack/simulate.js';
import { listStrategies } from '../../games/blackjack/strategies/index.js';

export function simulateTask(request: SimulateRequest): HandRecord[] {
    return simulate(request);
}

export function strategiesTask(): StrategyName[] {
    return listStrategies();
}
