import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';
import { InvalidStrategyConfig } from '@shared/kernel/DomainError';
import { SelectionResult, noWinner } from '@selection/domain/SelectionResult';
import { WeightedPool } from '@selection/domain/WeightedPool';
import { StrategyKind, WinnerSelectionStrategy } from '@selection/domain/WinnerSelectionStrategy';

export class WeightedSingleWinner implements WinnerSelectionStrategy {
  readonly kind: StrategyKind = 'WEIGHTED_SINGLE_WINNER';

  constructor(private readonly tierName: string = 'grand') {
    if (tierName.trim().length === 0) {
      throw new InvalidStrategyConfig('Tier name must be non-empty');
    }
  }

  select(snapshot: WeightSnapshot, randomValue: bigint, prizeAmount: Decimal): SelectionResult {
    if (prizeAmount.lte(0)) return noWinner('NO_PRIZE', prizeAmount);

    const winner = new WeightedPool(snapshot).draw(randomValue);
    if (winner === null) return noWinner('ZERO_TOTAL_WEIGHT', prizeAmount);

    return {
      awarded: true,
      awards: [{ account: winner, amount: prizeAmount, tier: this.tierName }],
      carryOver: ZERO,
      issues: [],
    };
  }
}
