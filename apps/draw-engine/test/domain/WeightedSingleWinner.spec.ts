import { Decimal } from 'decimal.js';
import { WeightedSingleWinner } from '@selection/domain/WeightedSingleWinner';
import { WeightedPool } from '@selection/domain/WeightedPool';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';

const snapshotOf = (weights: Record<string, number | string>): WeightSnapshot => {
  const entries = Object.entries(weights).map(([account, w]) => ({
    account,
    weight: new Decimal(w),
  }));
  return {
    roundId: 1,
    entries,
    totalWeight: entries.reduce((t, e) => t.add(e.weight), new Decimal(0)),
  };
};

describe('WeightedPool', () => {
  const snapshot = snapshotOf({ a: 10, b: 20, c: 30 });

  const cases: [bigint, string][] = [
    [0n, 'a'],
    [999_999_999n, 'a'],
    [1_000_000_000n, 'b'],
    [2_999_999_999n, 'b'],
    [3_000_000_000n, 'c'],
    [6_000_000_000n, 'a'],
  ];

  it.each(cases)('random %s lands on %s', (random, expected) => {
    expect(new WeightedPool(snapshot).draw(random)).toBe(expected);
  });

  it('skips zero-weight entries', () => {
    const pool = new WeightedPool(snapshotOf({ ghost: 0, a: 1 }));
    expect(pool.size).toBe(1);
    expect(pool.draw(0n)).toBe('a');
  });

  it('draws without replacement', () => {
    const pool = new WeightedPool(snapshotOf({ a: 1, b: 1 }));
    const first = pool.draw(0n);
    const second = pool.draw(0n);
    expect([first, second].sort()).toEqual(['a', 'b']);
    expect(pool.draw(0n)).toBeNull();
  });
});

describe('WeightedSingleWinner', () => {
  const strategy = new WeightedSingleWinner();

  it('picks the second participant for weights 10/20/30 and r = 1.5e9', () => {
    const result = strategy.select(
      snapshotOf({ a: 10, b: 20, c: 30 }),
      1_500_000_000n,
      new Decimal(100),
    );

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards).toHaveLength(1);
    expect(result.awards[0].account).toBe('b');
    expect(result.awards[0].amount.toString()).toBe('100');
    expect(result.awards[0].tier).toBe('grand');
    expect(result.carryOver.toString()).toBe('0');
  });

  it('reports ZERO_TOTAL_WEIGHT and carries the prize over', () => {
    const result = strategy.select(snapshotOf({ a: 0, b: 0 }), 42n, new Decimal(75));
    expect(result).toMatchObject({ awarded: false, reason: 'ZERO_TOTAL_WEIGHT' });
    expect(result.carryOver.toString()).toBe('75');
  });

  it('reports NO_PRIZE when there is nothing to award', () => {
    const result = strategy.select(snapshotOf({ a: 5 }), 1n, new Decimal(0));
    expect(result).toMatchObject({ awarded: false, reason: 'NO_PRIZE' });
  });

  it('is deterministic for the same inputs', () => {
    const snapshot = snapshotOf({ a: 3, b: 4, c: 5 });
    const first = strategy.select(snapshot, 77_777_777_777n, new Decimal(1));
    const second = strategy.select(snapshot, 77_777_777_777n, new Decimal(1));
    expect(first).toEqual(second);
  });

  it('win frequency tracks weight share', () => {
    const snapshot = snapshotOf({ a: 1, b: 3 });
    let bWins = 0;
    // Evenly spread targets across the 4e8-unit total.
    for (let i = 0n; i < 400n; i++) {
      const result = strategy.select(snapshot, i * 1_000_000n, new Decimal(1));
      if (result.awarded && result.awards[0].account === 'b') bWins++;
    }
    expect(bWins).toBe(300);
  });
});
