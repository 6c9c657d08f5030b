import { RoundState, canTransition } from '@engine/domain/RoundState';
import { BatchCursor } from '@engine/domain/BatchCursor';
import { EntropyHandle } from '@rng/domain/Entropy';
import {
  BatchNotComplete,
  DrawAlreadyInProgress,
  InvalidStateTransition,
  NoActiveBatch,
  RandomnessAlreadyRequested,
  RoundNotEnded,
} from '@shared/kernel/DomainError';

type StoredState =
  | RoundState.ROUND_ACTIVE
  | RoundState.DRAW_PROCESSING
  | RoundState.INTERMISSION;

export class Round {
  private _state: StoredState = RoundState.ROUND_ACTIVE;
  private _actualEndTime: number | null = null;
  private _batch: BatchCursor | null = null;
  private _randomnessHandle: EntropyHandle | null = null;

  constructor(
    readonly id: number,
    readonly startTime: number,
    readonly durationMs: number,
  ) {
    if (!Number.isInteger(id) || id < 1) {
      throw new RangeError(`Round id must be a positive integer, got ${id}`);
    }
    if (!Number.isFinite(durationMs) || durationMs <= 0) {
      throw new RangeError(`Round duration must be positive, got ${durationMs}`);
    }
  }

  get endTime(): number {
    return this.startTime + this.durationMs;
  }

  get actualEndTime(): number | null {
    return this._actualEndTime;
  }

  get batch(): BatchCursor | null {
    return this._batch;
  }

  get randomnessHandle(): EntropyHandle | null {
    return this._randomnessHandle;
  }

  get isDrawInProgress(): boolean {
    return this._state === RoundState.DRAW_PROCESSING;
  }

  stateAt(now: number): RoundState {
    if (this._state === RoundState.ROUND_ACTIVE && now >= this.endTime) {
      return RoundState.AWAITING_DRAW;
    }
    return this._state;
  }

  assertCanBeginDraw(now: number): void {
    if (this._state === RoundState.DRAW_PROCESSING) {
      throw new DrawAlreadyInProgress(`Draw for round ${this.id} is already in progress`);
    }
    if (this._state === RoundState.INTERMISSION) {
      throw new InvalidStateTransition(`Round ${this.id} has already been drawn`);
    }
    if (now < this.endTime) {
      throw new RoundNotEnded(
        `Round ${this.id} ends at ${this.endTime}, ${this.endTime - now}ms from now`,
      );
    }
  }

  /** Sets actualEndTime (once) and opens a fresh batch pass. */
  beginDraw(now: number, handle: EntropyHandle | null): BatchCursor {
    this.assertCanBeginDraw(now);
    this.transitionTo(now, RoundState.DRAW_PROCESSING);
    this._actualEndTime = now;
    this._batch = new BatchCursor(this.id);
    this._randomnessHandle = handle;
    return this._batch;
  }

  requireBatch(): BatchCursor {
    if (this._state !== RoundState.DRAW_PROCESSING || !this._batch) {
      throw new NoActiveBatch(`Round ${this.id} has no draw in progress`);
    }
    return this._batch;
  }

  assertCanAttachRandomness(): void {
    this.requireBatch();
    if (this._randomnessHandle) {
      throw new RandomnessAlreadyRequested(
        `Randomness for round ${this.id} was already requested (${this._randomnessHandle.requestId})`,
      );
    }
  }

  attachRandomness(handle: EntropyHandle): void {
    this.assertCanAttachRandomness();
    this._randomnessHandle = handle;
  }

  /** Clears the batch and randomness handle; the round then sits in intermission. */
  finishDraw(now: number): void {
    const batch = this.requireBatch();
    if (!batch.complete) {
      throw new BatchNotComplete(`Batch for round ${this.id} stopped at ${batch.position}`);
    }
    this.transitionTo(now, RoundState.INTERMISSION);
    this._batch = null;
    this._randomnessHandle = null;
  }

  private transitionTo(now: number, newState: StoredState): void {
    const from = this.stateAt(now);
    if (!canTransition(from, newState)) {
      throw new InvalidStateTransition(
        `Cannot transition from ${from} to ${newState}`,
      );
    }
    this._state = newState;
  }
}
