import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';
import { InsufficientBalance } from '@shared/kernel/DomainError';
import { PrizeTreasury } from '@pool/application/ports/PrizeTreasury';

export interface PrizeClaim {
  readonly account: string;
  readonly amount: Decimal;
  readonly tier: string | null;
}

/** Prize pool with a per-account record of unclaimed awards. */
export class InMemoryPrizeTreasury implements PrizeTreasury {
  private prizePool: Decimal = ZERO;
  private readonly claims: PrizeClaim[] = [];

  availablePrize(): Decimal {
    return this.prizePool;
  }

  fund(amount: Decimal): void {
    this.prizePool = this.prizePool.add(amount);
  }

  award(account: string, amount: Decimal, tier?: string): void {
    if (amount.gt(this.prizePool)) {
      throw new InsufficientBalance(
        `Prize pool holds ${this.prizePool.toString()}, cannot award ${amount.toString()}`,
      );
    }
    this.prizePool = this.prizePool.sub(amount);
    this.claims.push({ account, amount, tier: tier ?? null });
  }

  claimableBy(account: string): Decimal {
    return this.claims
      .filter((claim) => claim.account === account)
      .reduce((total, claim) => total.add(claim.amount), ZERO);
  }

  allClaims(): readonly PrizeClaim[] {
    return this.claims;
  }
}
