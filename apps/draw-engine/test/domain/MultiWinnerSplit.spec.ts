import { Decimal } from 'decimal.js';
import { MultiWinnerSplit } from '@selection/domain/MultiWinnerSplit';
import { InvalidStrategyConfig } from '@shared/kernel/DomainError';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';

const snapshotOf = (weights: Record<string, number>): WeightSnapshot => {
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

describe('MultiWinnerSplit', () => {
  describe('configuration', () => {
    it('rejects splits that do not sum to 1', () => {
      expect(() => new MultiWinnerSplit(2, ['0.5', '0.4'])).toThrow(InvalidStrategyConfig);
    });

    it('rejects a split count that differs from the winner count', () => {
      expect(() => new MultiWinnerSplit(3, ['0.5', '0.5'])).toThrow(InvalidStrategyConfig);
    });

    it('rejects zero splits', () => {
      expect(() => new MultiWinnerSplit(2, ['1', '0'])).toThrow(InvalidStrategyConfig);
    });

    it('rejects a zero winner count', () => {
      expect(() => new MultiWinnerSplit(0, [])).toThrow(InvalidStrategyConfig);
    });

    it('accepts decimal fractions that sum exactly to 1', () => {
      expect(() => new MultiWinnerSplit(3, ['0.1', '0.2', '0.7'])).not.toThrow();
    });
  });

  it('awards every place to distinct winners', () => {
    const strategy = new MultiWinnerSplit(3, ['0.5', '0.3', '0.2']);
    const result = strategy.select(
      snapshotOf({ a: 10, b: 20, c: 30, d: 40 }),
      123_456_789_012_345n,
      new Decimal(100),
    );

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    const accounts = result.awards.map((a) => a.account);
    expect(new Set(accounts).size).toBe(3);
    expect(result.awards.map((a) => a.amount.toString())).toEqual(['50', '30', '20']);
    expect(result.awards.map((a) => a.tier)).toEqual(['place-1', 'place-2', 'place-3']);
    expect(result.issues).toEqual([]);
  });

  it('the first place uses the random value itself', () => {
    const strategy = new MultiWinnerSplit(2, ['0.5', '0.5']);
    const result = strategy.select(snapshotOf({ a: 10, b: 20, c: 30 }), 1_500_000_000n, new Decimal(10));
    expect(result.awarded && result.awards[0].account).toBe('b');
  });

  it('with two participants for three places, shares 62.5 / 37.5 and reports the shortfall', () => {
    const strategy = new MultiWinnerSplit(3, ['0.5', '0.3', '0.2']);
    const result = strategy.select(snapshotOf({ a: 5, b: 7 }), 99n, new Decimal(100));

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards.map((a) => a.amount.toString())).toEqual(['62.5', '37.5']);
    expect(result.awards.map((a) => a.account).sort()).toEqual(['a', 'b']);
    expect(result.carryOver.toString()).toBe('0');
    expect(result.issues).toEqual([
      { kind: 'INSUFFICIENT_PARTICIPANTS', tier: 'split', required: 3, selected: 2 },
    ]);
  });

  it('rounds down to 8 decimals and gives the remainder to the last place', () => {
    const strategy = new MultiWinnerSplit(2, ['0.5', '0.5']);
    const result = strategy.select(snapshotOf({ a: 1, b: 1 }), 5n, new Decimal('0.00000001'));

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards.map((a) => a.amount.toFixed())).toEqual(['0', '0.00000001']);
    const total = result.awards.reduce((t, a) => t.add(a.amount), new Decimal(0));
    expect(total.eq('0.00000001')).toBe(true);
  });

  it('carries everything over when no one holds weight', () => {
    const strategy = new MultiWinnerSplit(2, ['0.5', '0.5']);
    const result = strategy.select(snapshotOf({}), 1n, new Decimal(40));
    expect(result).toMatchObject({ awarded: false, reason: 'ZERO_TOTAL_WEIGHT' });
    expect(result.carryOver.toString()).toBe('40');
  });
});
