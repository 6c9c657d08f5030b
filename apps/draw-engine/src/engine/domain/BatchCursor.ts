import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';
import { WeightEntry, WeightSnapshot } from '@shared/kernel/WeightSnapshot';

/**
 * Resumable position in the participant registry for one round's draw.
 * The cursor is a plain index so it survives across calls; entries are
 * only ever added during a pass.
 */
export class BatchCursor {
  private _position = 0;
  private _complete = false;
  private _totalWeight: Decimal = ZERO;
  private readonly weights = new Map<string, Decimal>();

  constructor(readonly roundId: number) {}

  get position(): number {
    return this._position;
  }

  get complete(): boolean {
    return this._complete;
  }

  get totalWeight(): Decimal {
    return this._totalWeight;
  }

  get size(): number {
    return this.weights.size;
  }

  weightOf(account: string): Decimal | undefined {
    return this.weights.get(account);
  }

  remaining(registrySize: number): number {
    return this._complete ? 0 : Math.max(0, registrySize - this._position);
  }

  /**
   * Visits up to `limit` registry slots starting at the current position.
   * Returns the number of slots still to visit.
   */
  advance(
    limit: number,
    registrySize: number,
    weigh: (index: number) => WeightEntry,
  ): number {
    if (this._complete) return 0;

    const end = Math.min(this._position + limit, registrySize);
    while (this._position < end) {
      this.record(weigh(this._position));
      this._position++;
    }
    if (this._position >= registrySize) {
      this._complete = true;
    }
    return this.remaining(registrySize);
  }

  toSnapshot(): WeightSnapshot {
    const entries: WeightEntry[] = [];
    for (const [account, weight] of this.weights) {
      entries.push({ account, weight });
    }
    return { roundId: this.roundId, entries, totalWeight: this._totalWeight };
  }

  private record(entry: WeightEntry): void {
    if (this.weights.has(entry.account)) return;
    this.weights.set(entry.account, entry.weight);
    this._totalWeight = this._totalWeight.add(entry.weight);
  }
}
