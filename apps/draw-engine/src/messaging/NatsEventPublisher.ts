import { Injectable, Inject } from '@nestjs/common';
import { NatsConnection } from 'nats';
import { DrawCompletedEvent, EventPublisher } from '@engine/application/ports/EventPublisher';
import { Logger } from '@shared/ports/Logger';
import { PoolTopics } from './topics';
import { NATS_CONNECTION, NATS_TOPICS, LOGGER } from './tokens';

@Injectable()
export class NatsEventPublisher implements EventPublisher {
  private readonly encoder = new TextEncoder();

  constructor(
    @Inject(NATS_CONNECTION) private readonly nats: NatsConnection,
    @Inject(NATS_TOPICS) private readonly topics: PoolTopics,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  async roundStarted(roundId: number, startTime: number, endTime: number): Promise<void> {
    this.safePublish(this.topics.ROUND_STARTED, { roundId, startTime, endTime });
  }

  async drawStarted(
    roundId: number,
    actualEndTime: number,
    commitment: string | null,
  ): Promise<void> {
    this.safePublish(this.topics.DRAW_STARTED, { roundId, actualEndTime, commitment });
  }

  async batchProcessed(
    roundId: number,
    position: number,
    remaining: number,
    complete: boolean,
  ): Promise<void> {
    this.safePublish(this.topics.DRAW_BATCH, { roundId, position, remaining, complete });
  }

  async drawCompleted(event: DrawCompletedEvent): Promise<void> {
    this.safePublish(this.topics.DRAW_COMPLETED, event);
  }

  /**
   * Publishes a JSON payload to the given NATS subject. Errors are logged,
   * never re-thrown: a draw that has already moved state stays moved.
   */
  private safePublish(subject: string, payload: unknown): void {
    try {
      this.nats.publish(subject, this.encoder.encode(JSON.stringify(payload)));
    } catch (err) {
      this.logger.error('NATS publish failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
