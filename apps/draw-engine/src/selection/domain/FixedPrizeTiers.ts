import { Decimal } from 'decimal.js';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';
import { InvalidStrategyConfig } from '@shared/kernel/DomainError';
import { deriveSubValue } from '@rng/domain/Entropy';
import { Award, SelectionIssue, SelectionResult, noWinner } from '@selection/domain/SelectionResult';
import { WeightedPool } from '@selection/domain/WeightedPool';
import { StrategyKind, WinnerSelectionStrategy } from '@selection/domain/WinnerSelectionStrategy';

export interface PrizeTier {
  readonly name: string;
  /** Paid to each winner of the tier. */
  readonly amount: Decimal;
  readonly winnerCount: number;
}

export interface PrizeTierInput {
  name: string;
  amount: Decimal.Value;
  winnerCount: number;
}

/**
 * Ordered tiers drawn without replacement across the whole draw, so no
 * participant wins twice. A tier the remaining prize cannot fully fund
 * is skipped; a tier that runs out of participants is paid partially.
 * Both are reported as issues, and whatever is not paid carries over.
 */
export class FixedPrizeTiers implements WinnerSelectionStrategy {
  readonly kind: StrategyKind = 'FIXED_PRIZE_TIERS';
  readonly tiers: readonly PrizeTier[];

  constructor(tiers: readonly PrizeTierInput[]) {
    if (tiers.length === 0) {
      throw new InvalidStrategyConfig('At least one prize tier is required');
    }
    const names = new Set<string>();
    this.tiers = tiers.map((tier) => {
      if (tier.name.trim().length === 0) {
        throw new InvalidStrategyConfig('Tier name must be non-empty');
      }
      if (names.has(tier.name)) {
        throw new InvalidStrategyConfig(`Duplicate tier name "${tier.name}"`);
      }
      names.add(tier.name);
      if (!Number.isInteger(tier.winnerCount) || tier.winnerCount < 1) {
        throw new InvalidStrategyConfig(
          `Tier "${tier.name}" needs a positive integer winner count, got ${tier.winnerCount}`,
        );
      }
      let amount: Decimal;
      try {
        amount = new Decimal(tier.amount);
      } catch {
        throw new InvalidStrategyConfig(`Tier "${tier.name}" amount is not a number`);
      }
      if (!amount.isFinite() || amount.lte(0)) {
        throw new InvalidStrategyConfig(
          `Tier "${tier.name}" amount must be positive, got ${amount.toString()}`,
        );
      }
      return { name: tier.name, amount, winnerCount: tier.winnerCount };
    });
  }

  select(snapshot: WeightSnapshot, randomValue: bigint, prizeAmount: Decimal): SelectionResult {
    if (prizeAmount.lte(0)) return noWinner('NO_PRIZE', prizeAmount);

    const pool = new WeightedPool(snapshot);
    if (pool.totalUnits === 0n) return noWinner('ZERO_TOTAL_WEIGHT', prizeAmount);

    const awards: Award[] = [];
    const issues: SelectionIssue[] = [];
    let remaining = prizeAmount;
    let drawIndex = 0;

    for (const tier of this.tiers) {
      const required = tier.amount.mul(tier.winnerCount);
      if (required.gt(remaining)) {
        issues.push({
          kind: 'INSUFFICIENT_PRIZE_POOL',
          tier: tier.name,
          required,
          available: remaining,
        });
        continue;
      }

      let selected = 0;
      while (selected < tier.winnerCount) {
        const winner = pool.draw(deriveSubValue(randomValue, drawIndex++));
        if (winner === null) break;
        awards.push({ account: winner, amount: tier.amount, tier: tier.name });
        remaining = remaining.sub(tier.amount);
        selected++;
      }
      if (selected < tier.winnerCount) {
        issues.push({
          kind: 'INSUFFICIENT_PARTICIPANTS',
          tier: tier.name,
          required: tier.winnerCount,
          selected,
        });
      }
    }

    if (awards.length === 0) {
      // Weight was present, so nothing was paid only because no tier was funded.
      return noWinner('INSUFFICIENT_PRIZE_POOL', prizeAmount, issues);
    }
    return { awarded: true, awards, carryOver: remaining, issues };
  }
}
