import { Provider } from '@nestjs/common';
import { PoolConfig } from '@shared/kernel/PoolConfig';
import { PoolTopics, createTopics } from '@messaging/topics';
import { poolConfigSchema, RawPoolConfig, minimumDepositOf } from './pool-config.schema';

export const VALIDATED_ENV = 'VALIDATED_ENV';
export const POOL_CONFIG = 'POOL_CONFIG';
export const NATS_TOPICS = 'NATS_TOPICS';

/**
 * Runs Zod validation once at boot. All other providers
 * derive their values from this single source of truth.
 */
export const validatedEnvProvider: Provider<RawPoolConfig> = {
  provide: VALIDATED_ENV,
  useFactory: (): RawPoolConfig => loadPoolEnv(process.env),
};

export function loadPoolEnv(env: NodeJS.ProcessEnv): RawPoolConfig {
  const result = poolConfigSchema.safeParse({
    POOL_ID: env.POOL_ID,
    ROUND_DURATION_MS: env.ROUND_DURATION_MS,
    MAX_BATCH_SIZE: env.MAX_BATCH_SIZE,
    ENTROPY_FINALITY_DELAY_MS: env.ENTROPY_FINALITY_DELAY_MS,
    EARLY_ENTROPY_REQUEST: env.EARLY_ENTROPY_REQUEST,
    SEED_CHAIN_LENGTH: env.SEED_CHAIN_LENGTH,
    MINIMUM_DEPOSIT: env.MINIMUM_DEPOSIT,
    BONUS_REQUIRES_BALANCE: env.BONUS_REQUIRES_BALANCE,
    PRIZE_DISTRIBUTION: env.PRIZE_DISTRIBUTION,
    KEEPER_INTERVAL_MS: env.KEEPER_INTERVAL_MS,
  });

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[PoolConfig] Invalid environment variables:\n${messages}`);
  }

  return result.data;
}

/**
 * Domain config: no pool id, no infrastructure concerns.
 */
export const poolConfigProvider: Provider<PoolConfig> = {
  provide: POOL_CONFIG,
  useFactory: (env: RawPoolConfig): PoolConfig => toPoolConfig(env),
  inject: [VALIDATED_ENV],
};

export function toPoolConfig(env: RawPoolConfig): PoolConfig {
  return {
    roundDurationMs: env.ROUND_DURATION_MS,
    maxBatchSize: env.MAX_BATCH_SIZE,
    earlyEntropyRequest: env.EARLY_ENTROPY_REQUEST,
    minimumDeposit: minimumDepositOf(env),
    bonusRequiresBalance: env.BONUS_REQUIRES_BALANCE,
    prizeDistribution: env.PRIZE_DISTRIBUTION,
  };
}

/**
 * Infrastructure-only: pool-scoped NATS subjects.
 * Domain and application layers never see this.
 */
export const natsTopicsProvider: Provider<PoolTopics> = {
  provide: NATS_TOPICS,
  useFactory: (env: RawPoolConfig): PoolTopics => createTopics(env.POOL_ID),
  inject: [VALIDATED_ENV],
};
