import { Module } from '@nestjs/common';
import { PoolConfigModule } from '@config/config.module';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { RawPoolConfig } from '@config/pool-config.schema';
import { ClockModule, CLOCK } from '@clock/clock.module';
import { MessagingModule } from '@messaging/messaging.module';
import { LOGGER } from '@messaging/tokens';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import { SeedChainRandomnessGateway } from '@rng/infrastructure/SeedChainRandomnessGateway';

export const RANDOMNESS_GATEWAY = 'RandomnessGateway';

@Module({
  imports: [PoolConfigModule, MessagingModule, ClockModule],
  providers: [
    {
      provide: RANDOMNESS_GATEWAY,
      useFactory: (env: RawPoolConfig, clock: Clock, logger: Logger): RandomnessGateway =>
        new SeedChainRandomnessGateway(
          env.SEED_CHAIN_LENGTH,
          env.ENTROPY_FINALITY_DELAY_MS,
          clock,
          logger,
        ),
      inject: [VALIDATED_ENV, CLOCK, LOGGER],
    },
  ],
  exports: [RANDOMNESS_GATEWAY],
})
export class RngModule {}
