import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';
import { InvalidBonusWeight } from '@shared/kernel/DomainError';

export interface BonusWeight {
  readonly weight: Decimal;
  /** Audit only; never affects the draw. */
  readonly reason: string;
  readonly updatedAt: number;
}

/**
 * Admin-assigned draw weight added on top of TWAB. Entries survive
 * rounds and draws and do not depend on balance or round state.
 */
export class BonusWeightRegistry {
  private readonly entries = new Map<string, BonusWeight>();

  set(account: string, weight: Decimal.Value, reason: string, at: number): BonusWeight {
    const value = this.parseWeight(weight);
    if (value.lt(0)) {
      throw new InvalidBonusWeight(`Bonus weight cannot be negative, got ${value.toString()}`);
    }
    return this.store(account, value, reason, at);
  }

  add(account: string, delta: Decimal.Value, reason: string, at: number): BonusWeight {
    const next = this.weightOf(account).add(this.parseWeight(delta));
    if (next.lt(0)) {
      throw new InvalidBonusWeight(
        `Bonus weight for ${account} would become negative (${next.toString()})`,
      );
    }
    return this.store(account, next, reason, at);
  }

  remove(account: string): boolean {
    return this.entries.delete(account);
  }

  get(account: string): BonusWeight | undefined {
    return this.entries.get(account);
  }

  weightOf(account: string): Decimal {
    return this.entries.get(account)?.weight ?? ZERO;
  }

  get size(): number {
    return this.entries.size;
  }

  private store(account: string, weight: Decimal, reason: string, at: number): BonusWeight {
    if (account.trim().length === 0) {
      throw new InvalidBonusWeight('Account must be non-empty');
    }
    if (reason.trim().length === 0) {
      throw new InvalidBonusWeight('A reason is required for bonus weight changes');
    }
    const entry: BonusWeight = { weight, reason, updatedAt: at };
    this.entries.set(account, entry);
    return entry;
  }

  private parseWeight(value: Decimal.Value): Decimal {
    let weight: Decimal;
    try {
      weight = new Decimal(value);
    } catch {
      throw new InvalidBonusWeight(`Bonus weight is not a number: ${String(value)}`);
    }
    if (!weight.isFinite()) {
      throw new InvalidBonusWeight('Bonus weight must be finite');
    }
    return weight;
  }
}
