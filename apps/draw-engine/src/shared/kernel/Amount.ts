import { Decimal } from 'decimal.js';
import { InvalidAmount } from '@shared/kernel/DomainError';

/** Fractional digits kept when a weight is turned into integer draw units. */
export const WEIGHT_DECIMALS = 8;

/** Fractional digits kept when a prize is split between winners. */
export const PRIZE_DECIMALS = 8;

const WEIGHT_UNIT = new Decimal(10).pow(WEIGHT_DECIMALS);

export const ZERO = new Decimal(0);

/**
 * Parses a caller-supplied amount. Rejects anything that is not a
 * finite, strictly positive decimal.
 */
export function parseAmount(value: Decimal.Value, label = 'Amount'): Decimal {
  let amount: Decimal;
  try {
    amount = new Decimal(value);
  } catch {
    throw new InvalidAmount(`${label} is not a number: ${String(value)}`);
  }
  if (!amount.isFinite()) throw new InvalidAmount(`${label} must be finite`);
  if (amount.lte(0)) throw new InvalidAmount(`${label} must be positive, got ${amount.toString()}`);
  return amount;
}

/**
 * Converts a weight into integer units (floored at {@link WEIGHT_DECIMALS})
 * so that modular reduction of a random value is exact.
 */
export function toWeightUnits(weight: Decimal): bigint {
  if (weight.lte(0)) return 0n;
  return BigInt(weight.mul(WEIGHT_UNIT).floor().toFixed(0));
}

export function sum(values: readonly Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.add(v), ZERO);
}
