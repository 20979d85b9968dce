import {
  DEFAULT_AUCTION_CONFIG,
  DEFAULT_KERNEL_CONFIG,
  loadConfigFromEnv,
  resolveKernelConfig,
  validateKernelConfig,
} from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfigFromEnv', () => {
  it('returns no overrides for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it('reads kernel settings', () => {
    const overrides = loadConfigFromEnv({
      SCRIP_KERNEL_PORT: '8080',
      SCRIP_KERNEL_LOG_LEVEL: 'WARN',
      SCRIP_KERNEL_PRINCIPALS: ' alice, bob,,carol ',
      SCRIP_KERNEL_STARTING_SCRIP: '250',
      SCRIP_KERNEL_DISK_QUOTA: '2048',
      SCRIP_KERNEL_LLM_BUDGET: '1.5',
      SCRIP_KERNEL_ALLOW_NEGATIVE_SCRIP: 'yes',
      SCRIP_KERNEL_EVENT_LOG: '/tmp/events.jsonl',
    });
    expect(overrides).toEqual({
      port: 8080,
      logLevel: LogLevel.Warn,
      principals: ['alice', 'bob', 'carol'],
      startingScrip: 250,
      defaultQuotas: { disk: 2048 },
      startingLlmBudget: 1.5,
      allowNegativeScrip: true,
      eventLogPath: '/tmp/events.jsonl',
    });
  });

  it('falls back to PORT', () => {
    expect(loadConfigFromEnv({ PORT: '3000' })).toEqual({ port: 3000 });
    expect(loadConfigFromEnv({ PORT: '3000', SCRIP_KERNEL_PORT: '4000' })).toEqual({ port: 4000 });
  });

  it('groups auction settings', () => {
    const overrides = loadConfigFromEnv({
      SCRIP_KERNEL_BIDDING_WINDOW_MS: '1000',
      SCRIP_KERNEL_MINIMUM_BID: '3',
    });
    expect(overrides).toEqual({ auction: { biddingWindowMs: 1000, minimumBid: 3 } });
  });

  it('throws on malformed values', () => {
    expect(() => loadConfigFromEnv({ SCRIP_KERNEL_STARTING_SCRIP: 'abc' })).toThrow(
      'SCRIP_KERNEL_STARTING_SCRIP must be an integer, got "abc"',
    );
    expect(() => loadConfigFromEnv({ SCRIP_KERNEL_ALLOW_NEGATIVE_SCRIP: 'maybe' })).toThrow(
      'SCRIP_KERNEL_ALLOW_NEGATIVE_SCRIP must be a boolean, got "maybe"',
    );
    expect(() => loadConfigFromEnv({ SCRIP_KERNEL_LOG_LEVEL: 'loud' })).toThrow(
      'SCRIP_KERNEL_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
    );
  });
});

describe('resolveKernelConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveKernelConfig()).toEqual(DEFAULT_KERNEL_CONFIG);
  });

  it('merges auction settings one level deep', () => {
    const config = resolveKernelConfig({ startingScrip: 50, auction: { minimumBid: 5 } });
    expect(config.startingScrip).toBe(50);
    expect(config.auction).toEqual({ ...DEFAULT_AUCTION_CONFIG, minimumBid: 5 });
  });

  it('does not share arrays with the defaults', () => {
    const config = resolveKernelConfig();
    config.principals.push('alice');
    config.defaultQuotas.disk = 1;
    expect(DEFAULT_KERNEL_CONFIG.principals).toEqual([]);
    expect(DEFAULT_KERNEL_CONFIG.defaultQuotas).toEqual({ disk: 10_000 });
  });
});

describe('validateKernelConfig', () => {
  it('accepts the defaults', () => {
    expect(validateKernelConfig(resolveKernelConfig())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('collects every error', () => {
    const result = validateKernelConfig(
      resolveKernelConfig({
        port: 70_000,
        principals: ['alice', 'alice'],
        auction: { biddingWindowMs: 200_000, minimumBid: 0 },
      }),
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'port must be an integer between 0 and 65535',
      'principals must be unique',
      'auction.periodMs must be at least auction.biddingWindowMs',
      'auction.minimumBid must be a positive integer',
    ]);
  });

  it('warns about permissive settings', () => {
    const result = validateKernelConfig(
      resolveKernelConfig({ allowNegativeScrip: true, auction: { acceptBidsOutsideWindow: true } }),
    );
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'auction.acceptBidsOutsideWindow is set; bids placed between windows join the next round',
      'allowNegativeScrip is set; balances may go below zero',
    ]);
  });
});
