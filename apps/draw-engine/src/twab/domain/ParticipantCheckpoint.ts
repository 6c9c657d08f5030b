import { Decimal } from 'decimal.js';
import { ZERO } from '@shared/kernel/Amount';

/**
 * Normalized TWAB state for one account within one round. Weight is
 * balance × elapsed / roundDuration, so a full-round holder converges to
 * their balance.
 */
export class ParticipantCheckpoint {
  private constructor(
    private _lastCheckpointTime: number,
    private _lastCheckpointBalance: Decimal,
    private _accumulatedWeight: Decimal,
  ) {}

  /** Lazy fallback: the account is assumed to have held `balance` since the round opened. */
  static synthesize(roundStart: number, balance: Decimal): ParticipantCheckpoint {
    return new ParticipantCheckpoint(roundStart, balance, ZERO);
  }

  get lastCheckpointTime(): number {
    return this._lastCheckpointTime;
  }

  get lastCheckpointBalance(): Decimal {
    return this._lastCheckpointBalance;
  }

  get accumulatedWeight(): Decimal {
    return this._accumulatedWeight;
  }

  /** Folds the current balance's contribution up to `at` into the accumulator. */
  advance(at: number, durationMs: number): void {
    if (at <= this._lastCheckpointTime) return;
    this._accumulatedWeight = this._accumulatedWeight.add(
      this.contribution(at, durationMs),
    );
    this._lastCheckpointTime = at;
  }

  rebalance(newBalance: Decimal): void {
    this._lastCheckpointBalance = newBalance;
  }

  weightAt(at: number, durationMs: number): Decimal {
    if (at <= this._lastCheckpointTime) return this._accumulatedWeight;
    return this._accumulatedWeight.add(this.contribution(at, durationMs));
  }

  private contribution(at: number, durationMs: number): Decimal {
    return this._lastCheckpointBalance
      .mul(at - this._lastCheckpointTime)
      .div(durationMs);
  }
}
