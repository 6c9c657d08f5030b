import { RoundState } from '@engine/domain/RoundState';
import {
  DrawAlreadyInProgress,
  NoOpenRound,
  OperationBlocked,
  RoundNotEnded,
} from '@shared/kernel/DomainError';
import { FixedRandomness, PoolHarness, createPoolHarness } from '../integration/helpers/pool-harness';
import { ROUND_MS, T0 } from '../integration/helpers/test-config';

describe('StartDrawUseCase', () => {
  let h: PoolHarness;
  let randomness: FixedRandomness;

  beforeEach(() => {
    randomness = new FixedRandomness(1n);
    h = createPoolHarness({ randomness });
    h.startNextRound.execute();
    h.deposit.execute({ account: 'alice', amount: '100' });
  });

  it('rejects a draw before any round exists', () => {
    expect(() => createPoolHarness().startDraw.execute()).toThrow(NoOpenRound);
  });

  it('rejects a draw before the round end time without requesting entropy', () => {
    const request = jest.spyOn(randomness, 'requestEntropy');
    h.clock.advance(ROUND_MS - 1);

    expect(() => h.startDraw.execute()).toThrow(RoundNotEnded);
    expect(request).not.toHaveBeenCalled();
    expect(h.status.execute()?.state).toBe(RoundState.ROUND_ACTIVE);
  });

  it('records actualEndTime and requests entropy early', () => {
    h.clock.advance(ROUND_MS);

    expect(h.startDraw.execute()).toEqual({
      roundId: 1,
      actualEndTime: T0 + ROUND_MS,
      randomnessRequestId: 'req-1',
      commitment: 'commit-1',
    });
    expect(h.status.execute()?.state).toBe(RoundState.DRAW_PROCESSING);
    expect(h.accumulator.currentWindow?.cap).toBe(T0 + ROUND_MS);
  });

  it('uses the late call time as actualEndTime, accruing weight to it', () => {
    h.clock.advance(ROUND_MS + ROUND_MS / 2);

    expect(h.startDraw.execute().actualEndTime).toBe(T0 + 90_000);
    expect(h.weights.weightOf('alice', T0 + 500_000).toString()).toBe('150');
  });

  it('ignores balance changes made after the draw started', () => {
    h.clock.advance(ROUND_MS);
    h.startDraw.execute();
    h.clock.advance(1_000);

    h.deposit.execute({ account: 'bob', amount: '100' });
    h.withdraw.execute({ account: 'alice', amount: '100' });

    expect(h.accumulator.weightAsOf('bob', h.clock.now()).toString()).toBe('0');
    expect(h.accumulator.weightAsOf('alice', h.clock.now()).toString()).toBe('100');
  });

  it('rejects a second start while the draw is in progress', () => {
    h.clock.advance(ROUND_MS);
    h.startDraw.execute();

    expect(() => h.startDraw.execute()).toThrow(DrawAlreadyInProgress);
  });

  it('leaves randomness unrequested when early requests are disabled', () => {
    const late = createPoolHarness({ config: { earlyEntropyRequest: false } });
    late.startNextRound.execute();
    late.clock.advance(ROUND_MS);

    const started = late.startDraw.execute();

    expect(started.randomnessRequestId).toBeNull();
    expect(started.commitment).toBeNull();
    expect(late.status.execute()?.isRandomnessRequested).toBe(false);
  });

  it('publishes drawStarted with the commitment', () => {
    h.clock.advance(ROUND_MS);
    h.startDraw.execute();

    expect(h.publisher.ofType('drawStarted')).toEqual([
      { type: 'drawStarted', roundId: 1, actualEndTime: T0 + ROUND_MS, commitment: 'commit-1' },
    ]);
  });

  it('is blocked by the gate and leaves the round waiting', () => {
    h.clock.advance(ROUND_MS);
    h.gate.setMode('PAUSED', 'maintenance');

    expect(() => h.startDraw.execute()).toThrow(OperationBlocked);
    expect(h.status.execute()?.state).toBe(RoundState.AWAITING_DRAW);
  });
});
