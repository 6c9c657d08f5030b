import { Decimal } from 'decimal.js';
import { FixedPrizeTiers } from '@selection/domain/FixedPrizeTiers';
import { createSelectionStrategy } from '@selection/domain/createSelectionStrategy';
import { describeIssue } from '@selection/domain/SelectionResult';
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

const FOUR = snapshotOf({ a: 10, b: 20, c: 30, d: 40 });

describe('FixedPrizeTiers', () => {
  const strategy = new FixedPrizeTiers([
    { name: 'grand', amount: '50', winnerCount: 1 },
    { name: 'runner-up', amount: '10', winnerCount: 2 },
  ]);

  describe('configuration', () => {
    it('rejects an empty tier list', () => {
      expect(() => new FixedPrizeTiers([])).toThrow(InvalidStrategyConfig);
    });

    it('rejects duplicate tier names', () => {
      expect(
        () =>
          new FixedPrizeTiers([
            { name: 'grand', amount: 1, winnerCount: 1 },
            { name: 'grand', amount: 2, winnerCount: 1 },
          ]),
      ).toThrow('Duplicate tier name "grand"');
    });

    it('rejects a zero winner count', () => {
      expect(() => new FixedPrizeTiers([{ name: 'x', amount: 1, winnerCount: 0 }])).toThrow(
        InvalidStrategyConfig,
      );
    });

    it('rejects a zero amount', () => {
      expect(() => new FixedPrizeTiers([{ name: 'x', amount: '0', winnerCount: 1 }])).toThrow(
        InvalidStrategyConfig,
      );
    });
  });

  it('pays every tier in order to distinct winners and carries the rest over', () => {
    const result = strategy.select(FOUR, 1_500_000_000n, new Decimal(100));

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards.map((a) => a.tier)).toEqual(['grand', 'runner-up', 'runner-up']);
    expect(result.awards.map((a) => a.amount.toString())).toEqual(['50', '10', '10']);
    expect(result.awards[0].account).toBe('b');
    expect(new Set(result.awards.map((a) => a.account)).size).toBe(3);
    expect(result.carryOver.toString()).toBe('30');
    expect(result.issues).toEqual([]);
  });

  it('skips a tier the remaining prize cannot fund', () => {
    const result = strategy.select(FOUR, 7n, new Decimal(55));

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards.map((a) => a.tier)).toEqual(['grand']);
    expect(result.carryOver.toString()).toBe('5');
    expect(result.issues.map(describeIssue)).toEqual([
      { kind: 'INSUFFICIENT_PRIZE_POOL', tier: 'runner-up', required: '20', available: '5' },
    ]);
  });

  it('still funds a cheaper tier after skipping an expensive one', () => {
    const tiers = new FixedPrizeTiers([
      { name: 'jackpot', amount: '200', winnerCount: 1 },
      { name: 'small', amount: '10', winnerCount: 1 },
    ]);
    const result = tiers.select(FOUR, 7n, new Decimal(50));

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards.map((a) => a.tier)).toEqual(['small']);
    expect(result.carryOver.toString()).toBe('40');
    expect(result.issues.map((i) => i.kind)).toEqual(['INSUFFICIENT_PRIZE_POOL']);
  });

  it('pays a partially filled tier and reports the missing winners', () => {
    const tiers = new FixedPrizeTiers([
      { name: 'grand', amount: '50', winnerCount: 1 },
      { name: 'runner-up', amount: '10', winnerCount: 3 },
    ]);
    const result = tiers.select(snapshotOf({ a: 1, b: 1 }), 3n, new Decimal(100));

    expect(result.awarded).toBe(true);
    if (!result.awarded) return;
    expect(result.awards.map((a) => a.tier)).toEqual(['grand', 'runner-up']);
    expect(result.carryOver.toString()).toBe('40');
    expect(result.issues).toEqual([
      { kind: 'INSUFFICIENT_PARTICIPANTS', tier: 'runner-up', required: 3, selected: 1 },
    ]);
  });

  it('reports INSUFFICIENT_PRIZE_POOL when no tier can be funded', () => {
    const result = strategy.select(FOUR, 1n, new Decimal(5));
    expect(result).toMatchObject({ awarded: false, reason: 'INSUFFICIENT_PRIZE_POOL' });
    expect(result.carryOver.toString()).toBe('5');
    expect(result.issues).toHaveLength(2);
  });

  it('reports ZERO_TOTAL_WEIGHT before looking at tiers', () => {
    const result = strategy.select(snapshotOf({ a: 0 }), 1n, new Decimal(500));
    expect(result).toMatchObject({ awarded: false, reason: 'ZERO_TOTAL_WEIGHT', issues: [] });
  });
});

describe('createSelectionStrategy', () => {
  it('builds the strategy named by the distribution', () => {
    expect(createSelectionStrategy({ type: 'single' }).kind).toBe('WEIGHTED_SINGLE_WINNER');
    expect(
      createSelectionStrategy({ type: 'split', winnerCount: 2, splits: ['0.6', '0.4'] }).kind,
    ).toBe('MULTI_WINNER_SPLIT');
    expect(
      createSelectionStrategy({
        type: 'tiers',
        tiers: [{ name: 'grand', amount: '5', winnerCount: 1 }],
      }).kind,
    ).toBe('FIXED_PRIZE_TIERS');
  });

  it('surfaces configuration errors', () => {
    expect(() =>
      createSelectionStrategy({ type: 'split', winnerCount: 2, splits: ['0.6', '0.6'] }),
    ).toThrow(InvalidStrategyConfig);
  });
});
