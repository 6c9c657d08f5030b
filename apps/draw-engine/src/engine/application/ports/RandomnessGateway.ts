import { EntropyHandle, RevealedEntropy } from '@rng/domain/Entropy';

export type { EntropyHandle, RevealedEntropy };

/**
 * Request/poll/consume wrapper around a delayed-reveal entropy source.
 * Every call returns immediately; callers poll `isAvailable`.
 */
export interface RandomnessGateway {
  requestEntropy(): EntropyHandle;
  isAvailable(handle: EntropyHandle): boolean;
  /** Single use. Throws `NotAvailable` before release and `AlreadyConsumed` on reuse. */
  consume(handle: EntropyHandle): RevealedEntropy;
}
