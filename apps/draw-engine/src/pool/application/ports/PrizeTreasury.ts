import { Decimal } from 'decimal.js';

export interface PrizeTreasury {
  /** Funds available to the next draw, including earlier carry-over. */
  availablePrize(): Decimal;
  fund(amount: Decimal): void;
  award(account: string, amount: Decimal, tier?: string): void;
}
