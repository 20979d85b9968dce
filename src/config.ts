/**
 * Kernel configuration.
 *
 * A typed config with defaults. Callers pass partial overrides, which are
 * merged over DEFAULT_KERNEL_CONFIG (auction settings merge one level deep).
 *
 * Usage:
 *   const config = resolveKernelConfig({
 *     ...loadConfigFromEnv(process.env),
 *     principals: ['alice', 'bob'],
 *   });
 *   const result = validateKernelConfig(config);
 *   if (!result.valid) throw new Error(result.errors.join('; '));
 */

import { LogLevel, parseLogLevel } from './logger';
import { TieBreak } from './domain/mint';
import { RESOURCE_DISK } from './domain/principal';

export interface AuctionConfig {
  /** Delay from kernel start to the first bidding window. */
  firstAuctionDelayMs: number;
  biddingWindowMs: number;
  /** Time between the starts of consecutive bidding windows. */
  periodMs: number;
  minimumBid: number;
  /** Score points per minted scrip: minted = floor(score / mintRatio). */
  mintRatio: number;
  tieBreak: TieBreak;
  /** Seed for the random tie-break. */
  randomSeed: number;
  acceptBidsOutsideWindow: boolean;
  /** Upper bound on one oracle scoring call. */
  scoringTimeoutMs: number;
}

export interface KernelConfig {
  port: number;
  logLevel: LogLevel;
  /** JSONL event log file. Events stay in memory only when unset. */
  eventLogPath?: string;
  allowNegativeScrip: boolean;
  /** Genesis agent principals. */
  principals: string[];
  startingScrip: number;
  /** Allocatable quota limits given to each genesis principal. */
  defaultQuotas: Record<string, number>;
  startingLlmBudget: number;
  /** Upper bound on one sandboxed invocation. */
  invocationTimeoutMs: number;
  /** Interval of the server's tick loop. */
  tickIntervalMs: number;
  maxSubscriptions: number;
  /** Per (payer, charger) cap on remembered charges. */
  delegationMaxHistory: number;
  /** JSON file of mint tasks. No tasks are open when unset. */
  mintTasksPath?: string;
  auction: AuctionConfig;
}

export type KernelConfigOverrides = Partial<Omit<KernelConfig, 'auction'>> & {
  auction?: Partial<AuctionConfig>;
};

export const DEFAULT_AUCTION_CONFIG: AuctionConfig = {
  firstAuctionDelayMs: 30_000,
  biddingWindowMs: 60_000,
  periodMs: 120_000,
  minimumBid: 1,
  mintRatio: 10,
  tieBreak: 'earliest',
  randomSeed: 42,
  acceptBidsOutsideWindow: false,
  scoringTimeoutMs: 30_000,
};

export const DEFAULT_KERNEL_CONFIG: KernelConfig = {
  port: 5000,
  logLevel: LogLevel.Info,
  allowNegativeScrip: false,
  principals: [],
  startingScrip: 100,
  defaultQuotas: { [RESOURCE_DISK]: 10_000 },
  startingLlmBudget: 0,
  invocationTimeoutMs: 5_000,
  tickIntervalMs: 1_000,
  maxSubscriptions: 5,
  delegationMaxHistory: 1000,
  auction: DEFAULT_AUCTION_CONFIG,
};

/** Merge overrides over the defaults. */
export function resolveKernelConfig(overrides: KernelConfigOverrides = {}): KernelConfig {
  const { auction, ...rest } = overrides;
  return {
    ...DEFAULT_KERNEL_CONFIG,
    ...rest,
    defaultQuotas: { ...(rest.defaultQuotas ?? DEFAULT_KERNEL_CONFIG.defaultQuotas) },
    principals: [...(rest.principals ?? DEFAULT_KERNEL_CONFIG.principals)],
    auction: { ...DEFAULT_AUCTION_CONFIG, ...auction },
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`${name} must be a boolean, got "${raw}"`);
}

/**
 * Read overrides from `SCRIP_KERNEL_*` environment variables. Unset
 * variables are left out so they do not shadow defaults. Malformed values throw.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): KernelConfigOverrides {
  const overrides: KernelConfigOverrides = {};
  const auction: Partial<AuctionConfig> = {};

  const port = readInt(env, 'SCRIP_KERNEL_PORT') ?? readInt(env, 'PORT');
  if (port !== undefined) overrides.port = port;

  const rawLevel = env.SCRIP_KERNEL_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel.trim() !== '') {
    const level = parseLogLevel(rawLevel);
    if (!level) throw new Error(`SCRIP_KERNEL_LOG_LEVEL must be one of debug, info, warn, error, got "${rawLevel}"`);
    overrides.logLevel = level;
  }

  const eventLog = env.SCRIP_KERNEL_EVENT_LOG?.trim();
  if (eventLog) overrides.eventLogPath = eventLog;

  const tasks = env.SCRIP_KERNEL_MINT_TASKS?.trim();
  if (tasks) overrides.mintTasksPath = tasks;

  const principals = env.SCRIP_KERNEL_PRINCIPALS;
  if (principals !== undefined && principals.trim() !== '') {
    overrides.principals = principals
      .split(',')
      .map((p) => p.trim())
      .filter((p) => p.length > 0);
  }

  const startingScrip = readInt(env, 'SCRIP_KERNEL_STARTING_SCRIP');
  if (startingScrip !== undefined) overrides.startingScrip = startingScrip;

  const disk = readInt(env, 'SCRIP_KERNEL_DISK_QUOTA');
  if (disk !== undefined) overrides.defaultQuotas = { [RESOURCE_DISK]: disk };

  const llmBudget = readNumber(env, 'SCRIP_KERNEL_LLM_BUDGET');
  if (llmBudget !== undefined) overrides.startingLlmBudget = llmBudget;

  const allowNegative = readBool(env, 'SCRIP_KERNEL_ALLOW_NEGATIVE_SCRIP');
  if (allowNegative !== undefined) overrides.allowNegativeScrip = allowNegative;

  const invocationTimeout = readInt(env, 'SCRIP_KERNEL_INVOCATION_TIMEOUT_MS');
  if (invocationTimeout !== undefined) overrides.invocationTimeoutMs = invocationTimeout;

  const tickInterval = readInt(env, 'SCRIP_KERNEL_TICK_INTERVAL_MS');
  if (tickInterval !== undefined) overrides.tickIntervalMs = tickInterval;

  const firstDelay = readInt(env, 'SCRIP_KERNEL_FIRST_AUCTION_DELAY_MS');
  if (firstDelay !== undefined) auction.firstAuctionDelayMs = firstDelay;
  const window = readInt(env, 'SCRIP_KERNEL_BIDDING_WINDOW_MS');
  if (window !== undefined) auction.biddingWindowMs = window;
  const period = readInt(env, 'SCRIP_KERNEL_AUCTION_PERIOD_MS');
  if (period !== undefined) auction.periodMs = period;
  const minimumBid = readInt(env, 'SCRIP_KERNEL_MINIMUM_BID');
  if (minimumBid !== undefined) auction.minimumBid = minimumBid;
  const mintRatio = readNumber(env, 'SCRIP_KERNEL_MINT_RATIO');
  if (mintRatio !== undefined) auction.mintRatio = mintRatio;

  if (Object.keys(auction).length > 0) overrides.auction = auction;
  return overrides;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Validate a resolved configuration for consistency. */
export function validateKernelConfig(config: KernelConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('port must be an integer between 0 and 65535');
  }
  if (!Number.isInteger(config.startingScrip) || config.startingScrip < 0) {
    errors.push('startingScrip must be a non-negative integer');
  }
  for (const [resource, limit] of Object.entries(config.defaultQuotas)) {
    if (!Number.isFinite(limit) || limit < 0) {
      errors.push(`defaultQuotas.${resource} must be non-negative`);
    }
  }
  if (config.startingLlmBudget < 0) errors.push('startingLlmBudget cannot be negative');
  if (config.invocationTimeoutMs <= 0) errors.push('invocationTimeoutMs must be positive');
  if (config.tickIntervalMs <= 0) errors.push('tickIntervalMs must be positive');
  if (config.maxSubscriptions < 0) errors.push('maxSubscriptions cannot be negative');
  if (new Set(config.principals).size !== config.principals.length) {
    errors.push('principals must be unique');
  }

  const auction = config.auction;
  if (auction.biddingWindowMs <= 0) errors.push('auction.biddingWindowMs must be positive');
  if (auction.periodMs < auction.biddingWindowMs) {
    errors.push('auction.periodMs must be at least auction.biddingWindowMs');
  }
  if (auction.firstAuctionDelayMs < 0) errors.push('auction.firstAuctionDelayMs cannot be negative');
  if (!Number.isInteger(auction.minimumBid) || auction.minimumBid < 1) {
    errors.push('auction.minimumBid must be a positive integer');
  }
  if (auction.mintRatio <= 0) errors.push('auction.mintRatio must be positive');
  if (auction.scoringTimeoutMs <= 0) errors.push('auction.scoringTimeoutMs must be positive');
  if (auction.acceptBidsOutsideWindow) {
    warnings.push('auction.acceptBidsOutsideWindow is set; bids placed between windows join the next round');
  }
  if (config.allowNegativeScrip) {
    warnings.push('allowNegativeScrip is set; balances may go below zero');
  }

  return { valid: errors.length === 0, errors, warnings };
}
