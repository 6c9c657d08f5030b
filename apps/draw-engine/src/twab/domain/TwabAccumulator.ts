import { Decimal } from 'decimal.js';
import { InvalidStateTransition, NoOpenRound } from '@shared/kernel/DomainError';
import { ParticipantCheckpoint } from '@twab/domain/ParticipantCheckpoint';
import { TwabWindow, effectiveTime } from '@twab/domain/TwabWindow';

export interface BalanceSource {
  balanceOf(account: string): Decimal;
}

/**
 * Per-round checkpoint store turning balance-change notifications into
 * time-weighted draw weight.
 *
 * Checkpoints are created on first touch from the ledger balance at that
 * moment, so accounts that never transact during a round are credited for
 * holding it in full without an O(n) pass at round start. Callers must
 * notify *before* the ledger applies the change for that fallback to read
 * the pre-change balance.
 */
export class TwabAccumulator {
  private window: TwabWindow | null = null;
  private readonly checkpoints = new Map<string, ParticipantCheckpoint>();

  constructor(private readonly balances: BalanceSource) {}

  get currentWindow(): TwabWindow | null {
    return this.window;
  }

  beginRound(window: TwabWindow): void {
    if (window.cap !== null) {
      throw new InvalidStateTransition('A new TWAB window cannot start frozen');
    }
    this.window = window;
    this.checkpoints.clear();
  }

  /** Caps accrual for the current round at `cap` (the round's actualEndTime). */
  freeze(cap: number): void {
    const window = this.requireWindow();
    if (window.cap !== null) {
      throw new InvalidStateTransition(
        `TWAB window for round ${window.roundId} is already frozen at ${window.cap}`,
      );
    }
    this.window = { ...window, cap };
  }

  recordBalanceChange(account: string, newBalance: Decimal, at: number): void {
    const window = this.requireWindow();
    const checkpoint = this.checkpointFor(account, window);

    // From the cap on, the change only matters for later rounds; the checkpoint
    // above has already pinned this round's balance to the pre-change value.
    if (window.cap !== null && at >= window.cap) return;

    checkpoint.advance(Math.max(at, window.startTime), window.durationMs);
    checkpoint.rebalance(newBalance);
  }

  weightAsOf(account: string, at: number): Decimal {
    const window = this.requireWindow();
    return this.checkpointFor(account, window).weightAt(
      effectiveTime(at, window),
      window.durationMs,
    );
  }

  /** {@link weightAsOf} without storing a checkpoint for an untouched account. */
  previewWeight(account: string, at: number): Decimal {
    const window = this.requireWindow();
    return this.existingOrSynthesized(account, window).weightAt(
      effectiveTime(at, window),
      window.durationMs,
    );
  }

  /**
   * Balance held at the cap once the window is frozen, the current balance
   * before that. Later ledger changes never show through.
   */
  balanceHeld(account: string): Decimal {
    const window = this.requireWindow();
    return this.existingOrSynthesized(account, window).lastCheckpointBalance;
  }

  hasCheckpoint(account: string): boolean {
    return this.checkpoints.has(account);
  }

  private checkpointFor(account: string, window: TwabWindow): ParticipantCheckpoint {
    let checkpoint = this.checkpoints.get(account);
    if (!checkpoint) {
      checkpoint = this.synthesize(account, window);
      this.checkpoints.set(account, checkpoint);
    }
    return checkpoint;
  }

  // Without a checkpoint the ledger has not moved since the round opened.
  private existingOrSynthesized(account: string, window: TwabWindow): ParticipantCheckpoint {
    return this.checkpoints.get(account) ?? this.synthesize(account, window);
  }

  private synthesize(account: string, window: TwabWindow): ParticipantCheckpoint {
    return ParticipantCheckpoint.synthesize(window.startTime, this.balances.balanceOf(account));
  }

  private requireWindow(): TwabWindow {
    if (!this.window) {
      throw new NoOpenRound('No round is open for weight accounting');
    }
    return this.window;
  }
}
