import { Decimal } from 'decimal.js';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';
import { SelectionResult } from '@selection/domain/SelectionResult';

export type StrategyKind =
  | 'WEIGHTED_SINGLE_WINNER'
  | 'MULTI_WINNER_SPLIT'
  | 'FIXED_PRIZE_TIERS';

/**
 * Implementations validate their configuration in the constructor and
 * never throw from `select`, whatever the snapshot holds.
 */
export interface WinnerSelectionStrategy {
  readonly kind: StrategyKind;
  select(snapshot: WeightSnapshot, randomValue: bigint, prizeAmount: Decimal): SelectionResult;
}
