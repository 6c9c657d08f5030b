import { loadPoolEnv, toPoolConfig } from '@config/env-config.provider';

const BASE_ENV = { POOL_ID: 'savings-usdc', ROUND_DURATION_MS: '86400000' };

describe('loadPoolEnv', () => {
  it('applies defaults for everything but the pool id and round duration', () => {
    expect(loadPoolEnv(BASE_ENV)).toEqual({
      POOL_ID: 'savings-usdc',
      ROUND_DURATION_MS: 86_400_000,
      MAX_BATCH_SIZE: 500,
      ENTROPY_FINALITY_DELAY_MS: 0,
      EARLY_ENTROPY_REQUEST: true,
      SEED_CHAIN_LENGTH: 10_000,
      MINIMUM_DEPOSIT: '0',
      BONUS_REQUIRES_BALANCE: true,
      PRIZE_DISTRIBUTION: { type: 'single' },
      KEEPER_INTERVAL_MS: undefined,
    });
  });

  it('coerces numeric strings and boolean flags', () => {
    const env = loadPoolEnv({
      ...BASE_ENV,
      MAX_BATCH_SIZE: '250',
      ENTROPY_FINALITY_DELAY_MS: '3000',
      EARLY_ENTROPY_REQUEST: 'false',
      BONUS_REQUIRES_BALANCE: 'false',
      KEEPER_INTERVAL_MS: '1000',
    });

    expect(env.MAX_BATCH_SIZE).toBe(250);
    expect(env.ENTROPY_FINALITY_DELAY_MS).toBe(3_000);
    expect(env.EARLY_ENTROPY_REQUEST).toBe(false);
    expect(env.BONUS_REQUIRES_BALANCE).toBe(false);
    expect(env.KEEPER_INTERVAL_MS).toBe(1_000);
  });

  it('parses a split prize distribution from JSON', () => {
    const env = loadPoolEnv({
      ...BASE_ENV,
      PRIZE_DISTRIBUTION: '{"type":"split","winnerCount":2,"splits":["0.7","0.3"]}',
    });

    expect(env.PRIZE_DISTRIBUTION).toEqual({
      type: 'split',
      winnerCount: 2,
      splits: ['0.7', '0.3'],
    });
  });

  it('parses fixed prize tiers from JSON', () => {
    const env = loadPoolEnv({
      ...BASE_ENV,
      PRIZE_DISTRIBUTION: JSON.stringify({
        type: 'tiers',
        tiers: [{ name: 'grand', amount: '1000', winnerCount: 1 }],
      }),
    });

    expect(env.PRIZE_DISTRIBUTION).toEqual({
      type: 'tiers',
      tiers: [{ name: 'grand', amount: '1000', winnerCount: 1 }],
    });
  });

  it('rejects PRIZE_DISTRIBUTION that is not JSON', () => {
    expect(() => loadPoolEnv({ ...BASE_ENV, PRIZE_DISTRIBUTION: 'single' })).toThrow(
      'PRIZE_DISTRIBUTION must be valid JSON',
    );
  });

  it('rejects an unknown distribution type', () => {
    expect(() =>
      loadPoolEnv({ ...BASE_ENV, PRIZE_DISTRIBUTION: '{"type":"lottery"}' }),
    ).toThrow('[PoolConfig] Invalid environment variables');
  });

  it('rejects a flag that is not "true" or "false"', () => {
    expect(() => loadPoolEnv({ ...BASE_ENV, EARLY_ENTROPY_REQUEST: 'yes' })).toThrow(
      'EARLY_ENTROPY_REQUEST must be "true" or "false"',
    );
  });

  it('rejects a POOL_ID that is not a lowercase slug', () => {
    expect(() => loadPoolEnv({ ...BASE_ENV, POOL_ID: 'Savings_USDC' })).toThrow(
      'POOL_ID must be a lowercase slug',
    );
  });

  it('rejects a negative minimum deposit', () => {
    expect(() => loadPoolEnv({ ...BASE_ENV, MINIMUM_DEPOSIT: '-1' })).toThrow(
      'MINIMUM_DEPOSIT: must be a non-negative decimal string',
    );
  });

  it('requires the round duration', () => {
    expect(() => loadPoolEnv({ POOL_ID: 'savings-usdc' })).toThrow('ROUND_DURATION_MS');
  });
});

describe('toPoolConfig', () => {
  it('maps the validated env onto the domain config', () => {
    const config = toPoolConfig(
      loadPoolEnv({ ...BASE_ENV, MINIMUM_DEPOSIT: '2.5', EARLY_ENTROPY_REQUEST: 'false' }),
    );

    expect(config.roundDurationMs).toBe(86_400_000);
    expect(config.maxBatchSize).toBe(500);
    expect(config.earlyEntropyRequest).toBe(false);
    expect(config.minimumDeposit.toString()).toBe('2.5');
    expect(config.bonusRequiresBalance).toBe(true);
    expect(config.prizeDistribution).toEqual({ type: 'single' });
  });
});
