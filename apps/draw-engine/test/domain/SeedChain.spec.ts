import { SeedChain } from '@rng/domain/SeedChain';
import { SeedChainExhausted } from '@shared/kernel/DomainError';

describe('SeedChain', () => {
  const terminalSeed = 'a'.repeat(64);

  it('creates a chain of specified length', () => {
    const chain = new SeedChain(terminalSeed, 5);
    expect(chain.remaining).toBe(5);
  });

  it('last seed revealed is the terminal seed', () => {
    const chain = new SeedChain(terminalSeed, 3);
    chain.next();
    chain.next();
    expect(chain.next()).toBe(terminalSeed);
  });

  it('anchor commits to the first revealed seed', () => {
    const chain = new SeedChain(terminalSeed, 4);
    const anchor = chain.anchor;
    expect(SeedChain.verify(chain.next(), anchor)).toBe(true);
  });

  it('is deterministic for a given terminal seed', () => {
    const a = new SeedChain(terminalSeed, 3);
    const b = new SeedChain(terminalSeed, 3);
    expect(a.anchor).toBe(b.anchor);
    expect(a.next()).toBe(b.next());
  });

  it('throws SeedChainExhausted when every seed is used', () => {
    const chain = new SeedChain(terminalSeed, 1);
    chain.next();
    expect(chain.remaining).toBe(0);
    expect(() => chain.next()).toThrow(SeedChainExhausted);
  });

  describe('verify', () => {
    it('each revealed seed hashes to the one revealed before it', () => {
      const chain = new SeedChain(terminalSeed, 5);
      const seeds: string[] = [];
      for (let i = 0; i < 5; i++) {
        seeds.push(chain.next());
      }

      for (let i = 1; i < seeds.length; i++) {
        expect(SeedChain.verify(seeds[i], seeds[i - 1])).toBe(true);
      }
    });

    it('rejects an unrelated pair', () => {
      expect(SeedChain.verify('invalid', 'also-invalid')).toBe(false);
    });
  });

  it('generateSeed returns 32 random bytes as hex', () => {
    const seed = SeedChain.generateSeed();
    expect(seed).toMatch(/^[0-9a-f]{64}$/);
    expect(SeedChain.generateSeed()).not.toBe(seed);
  });

  it('rejects length < 1', () => {
    expect(() => new SeedChain(terminalSeed, 0)).toThrow(RangeError);
  });
});
