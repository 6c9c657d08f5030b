import { InvalidBatchLimit, NoActiveBatch } from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { DrawWeightCalculator } from '@engine/application/DrawWeightCalculator';
import { RoundEvents } from '@engine/application/RoundEvents';
import { requireRound } from '@engine/application/requireRound';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';

export interface BatchProgress {
  roundId: number;
  position: number;
  remaining: number;
  complete: boolean;
  totalWeight: string;
}

export class ProcessBatchUseCase {
  constructor(
    private readonly rounds: CurrentRoundStore,
    private readonly participants: ParticipantRegistry,
    private readonly weights: DrawWeightCalculator,
    private readonly gate: EmergencyGate,
    private readonly events: RoundEvents,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  /**
   * Visits up to `limit` registry entries. A limit at or past the remainder
   * finishes the pass in this call.
   */
  execute(limit: number): BatchProgress {
    assertAllowed(this.gate, 'PROCESS_BATCH');
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidBatchLimit(`Batch limit must be a non-negative integer, got ${limit}`);
    }
    const round = requireRound(this.rounds);
    const batch = round.requireBatch();
    if (round.actualEndTime === null) {
      throw new NoActiveBatch(`Round ${round.id} has no recorded end time`);
    }

    const wasComplete = batch.complete;
    const startPosition = batch.position;
    const members = this.participants.orderedMembers();
    const now = this.clock.now();
    const remaining = batch.advance(
      limit,
      members.length,
      (index) => {
        const account = members[index];
        return { account, weight: this.weights.weightOf(account, now) };
      },
    );

    const progress: BatchProgress = {
      roundId: round.id,
      position: batch.position,
      remaining,
      complete: batch.complete,
      totalWeight: batch.totalWeight.toString(),
    };

    if (wasComplete || (batch.position === startPosition && !batch.complete)) {
      return progress;
    }

    this.logger.info('Draw batch processed', {
      roundId: round.id,
      processed: batch.position - startPosition,
      position: batch.position,
      remaining,
    });
    this.events.emit('batchProcessed', (p) =>
      p.batchProcessed(round.id, progress.position, remaining, progress.complete),
    );
    return progress;
  }
}
