import { Decimal } from 'decimal.js';
import { PRIZE_DECIMALS, ZERO, sum } from '@shared/kernel/Amount';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';
import { InvalidStrategyConfig } from '@shared/kernel/DomainError';
import { deriveSubValue } from '@rng/domain/Entropy';
import { Award, SelectionIssue, SelectionResult, noWinner } from '@selection/domain/SelectionResult';
import { WeightedPool } from '@selection/domain/WeightedPool';
import { StrategyKind, WinnerSelectionStrategy } from '@selection/domain/WinnerSelectionStrategy';

/**
 * `winnerCount` weighted draws without replacement; place `i` receives
 * `splits[i]` of the prize.
 *
 * When fewer participants hold weight than there are places, the places
 * that were filled share the whole prize in proportion to their splits.
 */
export class MultiWinnerSplit implements WinnerSelectionStrategy {
  readonly kind: StrategyKind = 'MULTI_WINNER_SPLIT';
  private readonly splits: readonly Decimal[];

  constructor(readonly winnerCount: number, splits: readonly Decimal.Value[]) {
    if (!Number.isInteger(winnerCount) || winnerCount < 1) {
      throw new InvalidStrategyConfig(`Winner count must be a positive integer, got ${winnerCount}`);
    }
    if (splits.length !== winnerCount) {
      throw new InvalidStrategyConfig(
        `Expected ${winnerCount} split fractions, got ${splits.length}`,
      );
    }
    const parsed = splits.map((value) => {
      let split: Decimal;
      try {
        split = new Decimal(value);
      } catch {
        throw new InvalidStrategyConfig(`Split fraction is not a number: ${String(value)}`);
      }
      if (!split.isFinite() || split.lte(0)) {
        throw new InvalidStrategyConfig(`Split fractions must be positive, got ${split.toString()}`);
      }
      return split;
    });
    const total = sum(parsed);
    if (!total.eq(1)) {
      throw new InvalidStrategyConfig(`Split fractions must sum to 1, got ${total.toString()}`);
    }
    this.splits = parsed;
  }

  select(snapshot: WeightSnapshot, randomValue: bigint, prizeAmount: Decimal): SelectionResult {
    if (prizeAmount.lte(0)) return noWinner('NO_PRIZE', prizeAmount);

    const pool = new WeightedPool(snapshot);
    const winners: string[] = [];
    for (let i = 0; i < this.winnerCount; i++) {
      const winner = pool.draw(deriveSubValue(randomValue, i));
      if (winner === null) break;
      winners.push(winner);
    }
    if (winners.length === 0) return noWinner('ZERO_TOTAL_WEIGHT', prizeAmount);

    const issues: SelectionIssue[] = [];
    if (winners.length < this.winnerCount) {
      issues.push({
        kind: 'INSUFFICIENT_PARTICIPANTS',
        tier: 'split',
        required: this.winnerCount,
        selected: winners.length,
      });
    }

    return {
      awarded: true,
      awards: this.allocate(winners, prizeAmount),
      carryOver: ZERO,
      issues,
    };
  }

  private allocate(winners: readonly string[], prizeAmount: Decimal): Award[] {
    const used = this.splits.slice(0, winners.length);
    const usedTotal = sum(used);
    const awards: Award[] = [];
    let allocated = ZERO;

    winners.forEach((account, i) => {
      const tier = `place-${i + 1}`;
      // Last place takes the remainder so rounding never leaks value.
      if (i === winners.length - 1) {
        awards.push({ account, amount: prizeAmount.sub(allocated), tier });
        return;
      }
      const amount = prizeAmount
        .mul(used[i])
        .div(usedTotal)
        .toDecimalPlaces(PRIZE_DECIMALS, Decimal.ROUND_DOWN);
      allocated = allocated.add(amount);
      awards.push({ account, amount, tier });
    });
    return awards;
  }
}
