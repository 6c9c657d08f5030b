import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { BonusWeightRegistry } from '@bonus/domain/BonusWeightRegistry';

export interface WeightBreakdown {
  twab: Decimal;
  bonus: Decimal;
  total: Decimal;
}

/**
 * Draw weight = TWAB weight + bonus weight. With `bonusRequiresBalance`
 * the bonus counts only for accounts holding a balance at the round's cap,
 * so a deposit after the draw started cannot switch it on.
 */
export class DrawWeightCalculator {
  constructor(
    private readonly accumulator: TwabAccumulator,
    private readonly bonuses: BonusWeightRegistry,
    private readonly bonusRequiresBalance: boolean,
  ) {}

  weightOf(account: string, at: number): Decimal {
    return this.breakdown(account, at).total;
  }

  breakdown(account: string, at: number): WeightBreakdown {
    return this.combine(account, this.accumulator.weightAsOf(account, at));
  }

  /** Read-only {@link breakdown} for accounts outside the registry. */
  preview(account: string, at: number): WeightBreakdown {
    return this.combine(account, this.accumulator.previewWeight(account, at));
  }

  private combine(account: string, twab: Decimal): WeightBreakdown {
    const bonus = this.bonusFor(account);
    return { twab, bonus, total: twab.add(bonus) };
  }

  private bonusFor(account: string): Decimal {
    if (this.bonusRequiresBalance && this.accumulator.balanceHeld(account).lte(0)) {
      return ZERO;
    }
    return this.bonuses.weightOf(account);
  }
}
