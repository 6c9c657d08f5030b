import { FactoryProvider } from '@nestjs/common';
import { connect, NatsConnection, Events, DebugEvents } from 'nats';
import { z } from 'zod';
import { RawPoolConfig } from '@config/pool-config.schema';
import { NATS_CONNECTION, LOGGER, VALIDATED_ENV } from './tokens';
import { Logger } from '@shared/ports/Logger';

export const natsUrlSchema = z
  .string({ error: 'NATS_URL is required' })
  .regex(
    /^(nats|tls):\/\/[^\s]+$/,
    'NATS_URL must use nats:// or tls:// scheme',
  );

export function connectionName(poolId: string): string {
  return `draw-engine:${poolId}`;
}

export const natsConnectionProvider: FactoryProvider<NatsConnection> = {
  provide: NATS_CONNECTION,
  useFactory: async (logger: Logger, env: RawPoolConfig): Promise<NatsConnection> => {
    const url = natsUrlSchema.safeParse(process.env.NATS_URL);
    if (!url.success) {
      const messages = url.error.issues.map((issue) => `  - ${issue.message}`).join('\n');
      throw new Error(`[MessagingModule] Invalid NATS_URL for pool ${env.POOL_ID}:\n${messages}`);
    }

    const nc = await connect({
      servers: url.data,
      name: connectionName(env.POOL_ID),
      maxReconnectAttempts: -1,
      reconnectTimeWait: 2_000,
      waitOnFirstConnect: true,
    });
    logger.info('NATS connected', { server: nc.getServer(), name: connectionName(env.POOL_ID) });

    watchStatus(nc, logger);
    return nc;
  },
  inject: [LOGGER, VALIDATED_ENV],
};

interface StatusLogEntry {
  level: 'warn' | 'error';
  message: string;
}

// Status types not listed here (pings, stale connections) are not logged.
function statusLogFor(type: string): StatusLogEntry | undefined {
  switch (type) {
    case Events.Disconnect:
      return { level: 'warn', message: 'NATS disconnected' };
    case DebugEvents.Reconnecting:
      return { level: 'warn', message: 'NATS reconnecting' };
    case Events.Reconnect:
      return { level: 'warn', message: 'NATS reconnected, draw commands resume' };
    case Events.LDM:
      return { level: 'warn', message: 'NATS server entering lame duck mode' };
    case Events.Error:
      return { level: 'error', message: 'NATS error' };
    default:
      return undefined;
  }
}

function watchStatus(nc: NatsConnection, logger: Logger): void {
  (async () => {
    for await (const status of nc.status()) {
      const entry = statusLogFor(status.type);
      if (entry) {
        logger[entry.level](entry.message, { data: String(status.data) });
      }
    }
  })().catch((err) => {
    logger.error('NATS status watcher stopped', {
      error: err instanceof Error ? err.message : String(err),
    });
  });
}
