import { createHash, randomBytes } from 'crypto';
import { SeedChainExhausted } from '@shared/kernel/DomainError';

/**
 * Hash chain of entropy secrets. Secrets are revealed head first, and each
 * revealed secret hashes to the one revealed before it, so publishing the
 * chain anchor commits to every future secret at once.
 */
export class SeedChain {
  private readonly seeds: string[];
  private currentIndex: number = 0;
  readonly anchor: string;

  constructor(terminalSeed: string, length: number) {
    if (!Number.isInteger(length) || length < 1) {
      throw new RangeError('Seed chain length must be a positive integer');
    }

    this.seeds = new Array<string>(length);
    this.seeds[length - 1] = terminalSeed;

    // Build chain backwards: seed[i] = hash(seed[i+1])
    for (let i = length - 2; i >= 0; i--) {
      this.seeds[i] = SeedChain.hash(this.seeds[i + 1]);
    }
    this.anchor = SeedChain.hash(this.seeds[0]);
  }

  static generateSeed(): string {
    return randomBytes(32).toString('hex');
  }

  static hash(seed: string): string {
    return createHash('sha256').update(seed).digest('hex');
  }

  static verify(currentSeed: string, previousSeed: string): boolean {
    return SeedChain.hash(currentSeed) === previousSeed;
  }

  next(): string {
    if (this.currentIndex >= this.seeds.length) {
      throw new SeedChainExhausted('Seed chain exhausted');
    }
    return this.seeds[this.currentIndex++];
  }

  get remaining(): number {
    return this.seeds.length - this.currentIndex;
  }
}
