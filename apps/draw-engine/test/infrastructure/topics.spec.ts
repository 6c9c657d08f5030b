import { commandSubject, createTopics, PoolTopics } from '@messaging/topics';

describe('createTopics', () => {
  let topics: PoolTopics;

  beforeEach(() => {
    topics = createTopics('savings-usdc');
  });

  it('prefixes round and draw topics with pool.{poolId}', () => {
    expect(topics.ROUND_STARTED).toBe('pool.savings-usdc.round.started');
    expect(topics.DRAW_STARTED).toBe('pool.savings-usdc.draw.started');
    expect(topics.DRAW_BATCH).toBe('pool.savings-usdc.draw.batch');
    expect(topics.DRAW_COMPLETED).toBe('pool.savings-usdc.draw.completed');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(topics)).toBe(true);
  });

  it('throws on a poolId with NATS special characters', () => {
    expect(() => createTopics('a.b')).toThrow('Invalid poolId');
    expect(() => createTopics('a*')).toThrow('Invalid poolId');
    expect(() => createTopics('a>')).toThrow('Invalid poolId');
  });
});

describe('commandSubject', () => {
  const topics = createTopics('savings-usdc');

  it('kebab-cases the command name under the command prefix', () => {
    expect(commandSubject(topics, 'deposit')).toBe('pool.savings-usdc.cmd.deposit');
    expect(commandSubject(topics, 'startNextRound')).toBe(
      'pool.savings-usdc.cmd.start-next-round',
    );
    expect(commandSubject(topics, 'getDrawStatus')).toBe('pool.savings-usdc.cmd.get-draw-status');
  });
});
