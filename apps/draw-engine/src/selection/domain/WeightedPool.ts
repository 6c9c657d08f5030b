import { toWeightUnits } from '@shared/kernel/Amount';
import { WeightSnapshot } from '@shared/kernel/WeightSnapshot';

interface Candidate {
  readonly account: string;
  readonly units: bigint;
}

/**
 * Snapshot weights as integer units, drawn from without replacement.
 * Candidates keep snapshot order so a given random value always walks
 * the same cumulative sums.
 */
export class WeightedPool {
  private readonly candidates: Candidate[] = [];
  private total = 0n;

  constructor(snapshot: WeightSnapshot) {
    for (const entry of snapshot.entries) {
      const units = toWeightUnits(entry.weight);
      if (units === 0n) continue;
      this.candidates.push({ account: entry.account, units });
      this.total += units;
    }
  }

  get size(): number {
    return this.candidates.length;
  }

  get totalUnits(): bigint {
    return this.total;
  }

  /** Picks the first candidate whose running sum exceeds `random mod total`. */
  draw(random: bigint): string | null {
    if (this.total === 0n) return null;

    const target = random % this.total;
    let cumulative = 0n;
    for (let i = 0; i < this.candidates.length; i++) {
      const candidate = this.candidates[i];
      cumulative += candidate.units;
      if (cumulative > target) {
        this.candidates.splice(i, 1);
        this.total -= candidate.units;
        return candidate.account;
      }
    }
    return null;
  }
}
