import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { InvalidConfigurationError } from '../utils/errors.js';

export const STRATEGY_NAMES = ['simplest', 'random', 'basic'] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

export const BET_MODES = ['fixed', 'hi_lo'] as const;
export type BetMode = (typeof BET_MODES)[number];

export const MIN_DECKS = 1;
export const MAX_DECKS = 8;
export const MAX_ROUNDS = 100_000;

const betModeSchema = z.preprocess(
  (v) => (v === 'hi-lo' ? 'hi_lo' : v),
  z.enum(BET_MODES, { errorMap: () => ({ message: `bet mode must be one of ${BET_MODES.join(', ')}` }) }),
);

const strategySchema = z.enum(STRATEGY_NAMES, {
  errorMap: () => ({ message: `strategy must be one of ${STRATEGY_NAMES.join(', ')}` }),
});

export const houseRulesSchema = z.object({
  blackjackPayout: z.number().positive(),
  dealerHitsSoft17: z.boolean(),
  penetration: z.number().gt(0).lt(1),
  maxSplitHands: z.number().int().min(2).max(8),
  maxBetMultiplier: z.number().min(1),
  maxBet: z.number().positive().optional(),
}).strict();

export type HouseRules = z.infer<typeof houseRulesSchema>;

export const DEFAULT_RULES: HouseRules = {
  blackjackPayout: 1.5,
  dealerHitsSoft17: false,
  penetration: 0.75,
  maxSplitHands: 4,
  maxBetMultiplier: 5,
};

const simulationDefaultsSchema = z.object({
  rounds: z.number().int().min(1).max(MAX_ROUNDS),
  numDecks: z.number().int().min(MIN_DECKS).max(MAX_DECKS),
  baseBet: z.number().positive(),
  strategy: strategySchema,
  betMode: betModeSchema,
}).strict();

export type SimulationDefaults = z.infer<typeof simulationDefaultsSchema>;

const concurrencySchema = z.object({
  workerPoolSize: z.number().int().min(1),
}).strict();

export type ConcurrencyConfig = z.infer<typeof concurrencySchema>;

const appConfigSchema = z.object({
  simulation: simulationDefaultsSchema,
  rules: houseRulesSchema,
  concurrency: concurrencySchema,
}).strict();

export type AppConfig = z.infer<typeof appConfigSchema>;

/** A single `simulate` request, before defaults from configuration apply. */
export const simulationOptionsSchema = z.object({
  rounds: z.number({ invalid_type_error: 'rounds must be a number' })
    .int('rounds must be an integer')
    .min(1, 'rounds must be at least 1')
    .max(MAX_ROUNDS, `rounds must be at most ${MAX_ROUNDS}`),
  numDecks: z.number({ invalid_type_error: 'numDecks must be a number' })
    .int('numDecks must be an integer')
    .min(MIN_DECKS, `numDecks must be between ${MIN_DECKS} and ${MAX_DECKS}`)
    .max(MAX_DECKS, `numDecks must be between ${MIN_DECKS} and ${MAX_DECKS}`),
  baseBet: z.number({ invalid_type_error: 'baseBet must be a number' })
    .positive('baseBet must be greater than 0')
    .finite(),
  strategy: strategySchema,
  betMode: betModeSchema,
  seed: z.number().int('seed must be an integer').optional(),
  matchId: z.string().min(1).optional(),
  rules: houseRulesSchema.partial().optional(),
});

export const sessionOptionsSchema = simulationOptionsSchema.omit({ rounds: true });

export type SimulationOptions = z.output<typeof simulationOptionsSchema>;

export function parseSimulationOptions(input: unknown): SimulationOptions {
  const res = simulationOptionsSchema.safeParse(input);
  if (!res.success) throw InvalidConfigurationError.fromZod(res.error, 'simulation options');
  return res.data;
}

/** Fills unset rules from the defaults and checks the result. */
export function resolveRules(partial: Partial<HouseRules> = {}, base: HouseRules = DEFAULT_RULES): HouseRules {
  const res = houseRulesSchema.safeParse({ ...base, ...partial });
  if (!res.success) throw InvalidConfigurationError.fromZod(res.error, 'house rules');
  return res.data;
}

function defaultPoolSize(): number {
  const n = typeof os.availableParallelism === 'function' ? os.availableParallelism() : os.cpus().length;
  return Math.max(1, n - 1);
}

export function defaultConfig(): AppConfig {
  return {
    simulation: { rounds: 10, numDecks: 6, baseBet: 10, strategy: 'basic', betMode: 'fixed' },
    rules: { ...DEFAULT_RULES },
    concurrency: { workerPoolSize: defaultPoolSize() },
  };
}

const FILE = path.resolve(process.cwd(), 'config', 'config.json');
let cfg: AppConfig | null = null;

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

function num(v: string | undefined): number | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : Number.NaN; // NaN fails validation with a readable path
}

function bool(v: string | undefined): boolean | undefined {
  if (v === undefined || v.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
}

function defined(o: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(o)) if (v !== undefined) out[k] = v;
  return out;
}

type RawSections = { simulation?: object; rules?: object; concurrency?: object };

function readFileSections(file: string): RawSections {
  if (!fs.existsSync(file)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new InvalidConfigurationError(`Cannot parse ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const res = z.object({
    simulation: z.object({}).passthrough().optional(),
    rules: z.object({}).passthrough().optional(),
    concurrency: z.object({}).passthrough().optional(),
  }).strict().safeParse(parsed);
  if (!res.success) throw InvalidConfigurationError.fromZod(res.error, `config file ${file}`);
  return res.data;
}

export function loadConfig(file: string = FILE, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaults = defaultConfig();
  const fromFile = readFileSections(file);

  // Apply env overrides
  const envSimulation = defined({
    numDecks: num(env.BJ_NUM_DECKS),
    baseBet: num(env.BJ_BASE_BET),
    strategy: env.BJ_STRATEGY || undefined,
    betMode: env.BJ_BET_MODE || undefined,
  });
  const envRules = defined({
    dealerHitsSoft17: bool(env.BJ_DEALER_HITS_SOFT17),
    blackjackPayout: num(env.BJ_BLACKJACK_PAYOUT),
    penetration: num(env.BJ_PENETRATION),
  });
  const envConcurrency = defined({ workerPoolSize: num(env.BJ_WORKER_POOL_SIZE) });

  const merged = {
    simulation: { ...defaults.simulation, ...fromFile.simulation, ...envSimulation },
    rules: { ...defaults.rules, ...fromFile.rules, ...envRules },
    concurrency: { ...defaults.concurrency, ...fromFile.concurrency, ...envConcurrency },
  };

  const res = appConfigSchema.safeParse(merged);
  if (!res.success) throw InvalidConfigurationError.fromZod(res.error);
  cfg = res.data;
  return res.data;
}

export function getConfig(): AppConfig {
  if (!cfg) return loadConfig();
  return cfg;
}
