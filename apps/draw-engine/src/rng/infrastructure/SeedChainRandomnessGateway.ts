import { randomUUID } from 'crypto';
import { SeedChain } from '@rng/domain/SeedChain';
import { EntropyHandle, RevealedEntropy, entropyFromSecret } from '@rng/domain/Entropy';
import { RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import {
  AlreadyConsumed,
  NotAvailable,
  UnknownEntropyRequest,
} from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';

interface PendingRequest {
  readonly secret: string;
  readonly availableAt: number;
}

/**
 * Commit-then-reveal entropy backed by a rotating seed chain. The secret
 * for a request is fixed (and its hash published) when the request is made,
 * but the derived value is only released after the finality delay. Consuming
 * a request reveals its secret and forgets it; only the id is kept.
 */
export class SeedChainRandomnessGateway implements RandomnessGateway {
  private chain: SeedChain;
  private readonly requests = new Map<string, PendingRequest>();
  private readonly consumed = new Set<string>();

  constructor(
    private readonly chainLength: number,
    private readonly finalityDelayMs: number,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {
    this.chain = this.createChain();
  }

  requestEntropy(): EntropyHandle {
    if (this.chain.remaining === 0) {
      this.chain = this.createChain();
    }
    const secret = this.chain.next();
    const requestedAt = this.clock.now();
    const handle: EntropyHandle = {
      requestId: randomUUID(),
      requestedAt,
      commitment: SeedChain.hash(secret),
    };
    this.requests.set(handle.requestId, {
      secret,
      availableAt: requestedAt + this.finalityDelayMs,
    });
    return handle;
  }

  isAvailable(handle: EntropyHandle): boolean {
    const request = this.requests.get(handle.requestId);
    return request !== undefined && this.clock.now() >= request.availableAt;
  }

  consume(handle: EntropyHandle): RevealedEntropy {
    if (this.consumed.has(handle.requestId)) {
      throw new AlreadyConsumed(`Entropy request ${handle.requestId} was already consumed`);
    }
    const request = this.requests.get(handle.requestId);
    if (!request) {
      throw new UnknownEntropyRequest(`Unknown entropy request ${handle.requestId}`);
    }
    if (this.clock.now() < request.availableAt) {
      throw new NotAvailable(
        `Entropy request ${handle.requestId} is not available until ${request.availableAt}`,
      );
    }
    this.requests.delete(handle.requestId);
    this.consumed.add(handle.requestId);
    return {
      requestId: handle.requestId,
      secret: request.secret,
      value: entropyFromSecret(request.secret, handle.requestId),
    };
  }

  get pendingCount(): number {
    return this.requests.size;
  }

  private createChain(): SeedChain {
    const chain = new SeedChain(SeedChain.generateSeed(), this.chainLength);
    this.logger.info('Seed chain initialized', {
      anchor: chain.anchor,
      chainLength: this.chainLength,
    });
    return chain;
  }
}
