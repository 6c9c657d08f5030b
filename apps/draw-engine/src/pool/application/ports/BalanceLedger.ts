import { Decimal } from 'decimal.js';
import { BalanceSource } from '@twab/domain/TwabAccumulator';

/**
 * Per-account principal held by the pool. Yield, share pricing and payouts
 * live behind this port.
 */
export interface BalanceLedger extends BalanceSource {
  balanceOf(account: string): Decimal;
  credit(account: string, amount: Decimal): void;
  debit(account: string, amount: Decimal): void;
}
