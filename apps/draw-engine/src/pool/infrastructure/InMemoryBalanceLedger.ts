import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';
import { InsufficientBalance } from '@shared/kernel/DomainError';
import { BalanceLedger } from '@pool/application/ports/BalanceLedger';

export class InMemoryBalanceLedger implements BalanceLedger {
  private readonly balances = new Map<string, Decimal>();

  balanceOf(account: string): Decimal {
    return this.balances.get(account) ?? ZERO;
  }

  credit(account: string, amount: Decimal): void {
    this.balances.set(account, this.balanceOf(account).add(amount));
  }

  debit(account: string, amount: Decimal): void {
    const balance = this.balanceOf(account);
    if (amount.gt(balance)) {
      throw new InsufficientBalance(
        `Ledger balance of ${account} is ${balance.toString()}, cannot debit ${amount.toString()}`,
      );
    }
    this.balances.set(account, balance.sub(amount));
  }

  totalDeposited(): Decimal {
    let total = ZERO;
    for (const balance of this.balances.values()) total = total.add(balance);
    return total;
  }
}
