import { NatsConnection } from 'nats';
import { NatsEventPublisher } from '@messaging/NatsEventPublisher';
import { createTopics, PoolTopics } from '@messaging/topics';
import { DrawCompletedEvent } from '@engine/application/ports/EventPublisher';
import { MockLogger, mockLogger } from '../integration/helpers/test-config';

const encode = (obj: unknown): Uint8Array => new TextEncoder().encode(JSON.stringify(obj));

describe('NatsEventPublisher', () => {
  let publisher: NatsEventPublisher;
  let mockNats: { publish: jest.Mock };
  let logger: MockLogger;
  let topics: PoolTopics;

  beforeEach(() => {
    mockNats = { publish: jest.fn() };
    logger = mockLogger();
    topics = createTopics('savings-usdc');
    publisher = new NatsEventPublisher(mockNats as unknown as NatsConnection, topics, logger);
  });

  it('publishes roundStarted', async () => {
    await publisher.roundStarted(3, 1_000, 61_000);

    expect(mockNats.publish).toHaveBeenCalledWith(
      'pool.savings-usdc.round.started',
      encode({ roundId: 3, startTime: 1_000, endTime: 61_000 }),
    );
  });

  it('publishes drawStarted with a null commitment for late entropy', async () => {
    await publisher.drawStarted(3, 61_500, null);

    expect(mockNats.publish).toHaveBeenCalledWith(
      'pool.savings-usdc.draw.started',
      encode({ roundId: 3, actualEndTime: 61_500, commitment: null }),
    );
  });

  it('publishes batch progress', async () => {
    await publisher.batchProcessed(3, 500, 120, false);

    expect(mockNats.publish).toHaveBeenCalledWith(
      'pool.savings-usdc.draw.batch',
      encode({ roundId: 3, position: 500, remaining: 120, complete: false }),
    );
  });

  it('publishes the completed draw as-is', async () => {
    const event: DrawCompletedEvent = {
      roundId: 3,
      requestId: 'req-3',
      secret: 'secret-3',
      randomValue: '0x01',
      awarded: true,
      awards: [{ account: 'alice', amount: '25', tier: 'grand' }],
      carryOver: '0',
      issues: [],
    };

    await publisher.drawCompleted(event);

    expect(mockNats.publish).toHaveBeenCalledWith(
      'pool.savings-usdc.draw.completed',
      encode(event),
    );
  });

  it('logs and swallows publish failures', async () => {
    mockNats.publish.mockImplementation(() => {
      throw new Error('connection closed');
    });

    await expect(publisher.roundStarted(1, 0, 10)).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('NATS publish failed', {
      subject: 'pool.savings-usdc.round.started',
      error: 'connection closed',
    });
  });
});
