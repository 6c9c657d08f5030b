import { Decimal } from 'decimal.js';

export interface WeightEntry {
  readonly account: string;
  readonly weight: Decimal;
}

/**
 * Finalized per-participant draw weights for one round, in the order the
 * batch pass visited the registry.
 */
export interface WeightSnapshot {
  readonly roundId: number;
  readonly entries: readonly WeightEntry[];
  readonly totalWeight: Decimal;
}
