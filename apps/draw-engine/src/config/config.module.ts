import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  validatedEnvProvider,
  poolConfigProvider,
  natsTopicsProvider,
  VALIDATED_ENV,
  POOL_CONFIG,
  NATS_TOPICS,
} from './env-config.provider';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [validatedEnvProvider, poolConfigProvider, natsTopicsProvider],
  exports: [VALIDATED_ENV, POOL_CONFIG, NATS_TOPICS],
})
export class PoolConfigModule {}
