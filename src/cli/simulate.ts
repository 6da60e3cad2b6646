#!/usr/bin/env node
import dotenv from 'dotenv';
import { parseArgs } from 'node:util';
import { getConfig } from '../config/index.js';
import type { AppConfig } from '../config/index.js';
import { ComputePool } from '../compute/pool.js';
import { simulateMany } from '../compute/batch.js';
import { summarize } from '../games/blackjack/records.js';
import type { HandRecord, SessionSummary } from '../games/blackjack/records.js';
import { simulate } from '../games/blackjack/simulate.js';
import type { SimulateRequest } from '../games/blackjack/simulate.js';
import { listStrategies } from '../games/blackjack/strategies/index.js';
import { createLogger } from '../log.js';
import { InvalidConfigurationError, normalizeError } from '../utils/errors.js';
import { getPalette } from './theme.js';
import { ui } from './ui.js';
import type { Row } from './ui.js';

const log = createLogger('cli');

export type OutputFormat = 'table' | 'ndjson';

export interface CliCommand {
  help: boolean;
  listStrategies: boolean;
  format: OutputFormat;
  sessions: number;
  request: SimulateRequest;
}

const USAGE = `Usage: bj-sim [options]

  --rounds N           rounds per session
  --decks N            decks in the shoe (1-8)
  --bet X              base bet
  --strategy NAME      ${listStrategies().join(' | ')}
  --bet-mode MODE      fixed | hi_lo
  --seed N             seed for a reproducible run
  --sessions K         independent sessions (seeds seed, seed+1, ...) run in parallel
  --format FMT         table | ndjson
  --list-strategies    print strategy names and exit
  --quiet              only records and errors
  --no-color
`;

function intOpt(name: string, v: string | undefined): number | undefined {
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new InvalidConfigurationError(`--${name} expects a number, got "${v}"`);
  return n;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        rounds: { type: 'string' },
        decks: { type: 'string' },
        bet: { type: 'string' },
        strategy: { type: 'string' },
        'bet-mode': { type: 'string' },
        seed: { type: 'string' },
        sessions: { type: 'string' },
        format: { type: 'string' },
        'list-strategies': { type: 'boolean' },
        quiet: { type: 'boolean' },
        'no-color': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
    }).values;
  } catch (err) {
    throw new InvalidConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

/** Turns argv into a command, falling back to configuration defaults. */
export function parseCommand(argv: readonly string[], config: AppConfig): CliCommand {
  const values = readArgs(argv);

  const format = values.format ?? 'table';
  if (format !== 'table' && format !== 'ndjson') {
    throw new InvalidConfigurationError(`--format must be table or ndjson, got "${format}"`);
  }
  const sessions = intOpt('sessions', values.sessions) ?? 1;
  if (!Number.isInteger(sessions) || sessions < 1) {
    throw new InvalidConfigurationError('--sessions must be a positive integer');
  }

  const defaults = config.simulation;
  return {
    help: values.help ?? false,
    listStrategies: values['list-strategies'] ?? false,
    format,
    sessions,
    request: {
      rounds: intOpt('rounds', values.rounds) ?? defaults.rounds,
      numDecks: intOpt('decks', values.decks) ?? defaults.numDecks,
      baseBet: intOpt('bet', values.bet) ?? defaults.baseBet,
      strategy: values.strategy ?? defaults.strategy,
      betMode: values['bet-mode'] ?? defaults.betMode,
      seed: intOpt('seed', values.seed),
      rules: config.rules,
    },
  };
}

export function recordRow(r: HandRecord): Row {
  return {
    round: r.roundId,
    hand: r.handNumber,
    dealer: r.dealerCards.join(' '),
    player: r.playerCards.join(' '),
    actions: r.actions.join(',') || '-',
    wager: r.wager,
    outcome: r.outcome,
    profit: r.profit,
    rc: r.runningCount,
    tc: r.trueCount,
  };
}

export function summaryLine(s: SessionSummary): string {
  const sign = s.netProfit > 0 ? '+' : '';
  return `${s.matchId} [${s.strategy}] ${s.rounds} rounds, ${s.hands} hands: ` +
    `${s.wins}W ${s.losses}L ${s.pushes}P, ${s.blackjacks} blackjacks, ${s.busts} busts; ` +
    `wagered ${s.totalWagered}, net ${sign}${s.netProfit} (${sign}${s.returnPct}%)`;
}

function print(records: readonly HandRecord[], format: OutputFormat) {
  if (format === 'ndjson') {
    for (const r of records) process.stdout.write(JSON.stringify(r) + '\n');
    return;
  }
  const palette = getPalette();
  ui.table(records.map(recordRow), (header, value) => {
    if (header !== 'outcome') return value;
    if (value === 'win' || value === 'blackjack') return palette.success(value);
    if (value === 'push') return palette.dim(value);
    return palette.error(value);
  });
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  dotenv.config({ override: false });
  const config = getConfig();
  const cmd = parseCommand(argv, config);

  if (cmd.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (cmd.listStrategies) {
    for (const name of listStrategies()) console.log(name);
    return 0;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);
  const started = Date.now();
  try {
    let all: HandRecord[];
    if (cmd.sessions === 1) {
      all = simulate(cmd.request, { signal: controller.signal });
    } else {
      const base = cmd.request.seed;
      const requests = Array.from({ length: cmd.sessions }, (_, i): SimulateRequest => ({
        ...cmd.request,
        seed: base === undefined ? undefined : base + i,
      }));
      const pool = new ComputePool({ size: Math.min(config.concurrency.workerPoolSize, cmd.sessions) });
      const progress = ui.bar(cmd.sessions);
      try {
        const results = await simulateMany(requests, { pool, signal: controller.signal, onSession: () => progress.tick() });
        all = results.flat();
      } finally {
        progress.stop();
        await pool.destroy();
      }
    }
    print(all, cmd.format);
    for (const s of summarize(all)) ui.say(summaryLine(s), s.netProfit >= 0 ? 'success' : 'warn');
    ui.say(`done in ${ui.elapsed(Date.now() - started)}`, 'dim');
    return 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main().then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
      const info = normalizeError(err);
      if (err instanceof InvalidConfigurationError) {
        ui.say(info.message, 'error');
        process.exitCode = 2;
        return;
      }
      log.error({ msg: 'cli_error', error: info });
      ui.say(`${info.name}: ${info.message}`, 'error');
      process.exitCode = 1;
    },
  );
}
