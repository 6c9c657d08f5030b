import { createHash } from 'crypto';

export interface EntropyHandle {
  readonly requestId: string;
  readonly requestedAt: number;
  /** sha256 of the secret the value will be derived from. */
  readonly commitment: string;
}

/** A consumed request with its secret opened, so anyone can re-derive `value`. */
export interface RevealedEntropy {
  readonly requestId: string;
  readonly secret: string;
  readonly value: bigint;
}

function sha256ToBigInt(input: string): bigint {
  return BigInt(`0x${createHash('sha256').update(input).digest('hex')}`);
}

export function entropyFromSecret(secret: string, requestId: string): bigint {
  return sha256ToBigInt(`${secret}:${requestId}`);
}

/**
 * Deterministic sub-value for the `index`-th pick of a multi-winner draw.
 * Index 0 is the random value itself.
 */
export function deriveSubValue(randomValue: bigint, index: number): bigint {
  if (index === 0) return randomValue;
  return sha256ToBigInt(`${randomValue.toString(16)}:${index}`);
}

export function toHex(value: bigint): string {
  return `0x${value.toString(16).padStart(64, '0')}`;
}
