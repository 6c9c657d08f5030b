import { Module, OnApplicationShutdown, Inject } from '@nestjs/common';
import { NatsConnection } from 'nats';
import { PoolConfigModule } from '@config/config.module';
import { NatsEventPublisher } from './NatsEventPublisher';
import { NatsCommandSubscriber } from './NatsCommandSubscriber';
import { natsConnectionProvider } from './nats-connection.provider';
import { ConsoleLogger } from './console-logger.adapter';
import { NATS_CONNECTION, LOGGER, EVENT_PUBLISHER, COMMAND_SUBSCRIBER } from './tokens';

@Module({
  imports: [PoolConfigModule],
  providers: [
    { provide: LOGGER, useClass: ConsoleLogger },
    natsConnectionProvider,
    { provide: EVENT_PUBLISHER, useClass: NatsEventPublisher },
    { provide: COMMAND_SUBSCRIBER, useClass: NatsCommandSubscriber },
  ],
  exports: [LOGGER, EVENT_PUBLISHER, COMMAND_SUBSCRIBER],
})
export class MessagingModule implements OnApplicationShutdown {
  constructor(
    @Inject(NATS_CONNECTION) private readonly nats: NatsConnection,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    if (!this.nats.isClosed() && !this.nats.isDraining()) {
      await this.nats.drain();
    }
  }
}
