import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { LOGGER } from '@messaging/tokens';
import { GET_DRAW_STATUS_USE_CASE } from '@engine/infrastructure/engine.module';
import { GetDrawStatusUseCase } from '@engine/application/GetDrawStatusUseCase';
import { Logger } from '@shared/ports/Logger';

const SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  const logger = app.get<Logger>(LOGGER);
  const status = app.get<GetDrawStatusUseCase>(GET_DRAW_STATUS_USE_CASE).execute();

  logger.info('Draw engine started', {
    roundId: status?.roundId ?? null,
    endTime: status?.endTime ?? null,
  });

  let closing: Promise<void> | null = null;
  const shutdown = (signal: NodeJS.Signals): Promise<void> => {
    if (!closing) {
      closing = (async () => {
        logger.info('Draw engine shutting down', { signal });
        await app.close();
        logger.info('Draw engine stopped');
      })();
    }
    return closing;
  };

  for (const signal of SIGNALS) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error('Shutdown failed', {
          error: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      });
    });
  }
}

bootstrap().catch((err) => {
  console.error('[DrawEngine] Fatal bootstrap error:', err);
  process.exit(1);
});
