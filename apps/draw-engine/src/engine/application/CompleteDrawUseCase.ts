import { BatchNotComplete, RandomnessNotReady } from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { RevealedEntropy, toHex } from '@rng/domain/Entropy';
import { SelectionResult, describeIssue } from '@selection/domain/SelectionResult';
import { WinnerSelectionStrategy } from '@selection/domain/WinnerSelectionStrategy';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { DrawCompletedEvent } from '@engine/application/ports/EventPublisher';
import { RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import { RoundEvents } from '@engine/application/RoundEvents';
import { requireRound } from '@engine/application/requireRound';
import { PrizeTreasury } from '@pool/application/ports/PrizeTreasury';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';

export class CompleteDrawUseCase {
  constructor(
    private readonly rounds: CurrentRoundStore,
    private readonly randomness: RandomnessGateway,
    private readonly strategy: WinnerSelectionStrategy,
    private readonly treasury: PrizeTreasury,
    private readonly gate: EmergencyGate,
    private readonly events: RoundEvents,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  execute(): DrawCompletedEvent {
    assertAllowed(this.gate, 'COMPLETE_DRAW');
    const round = requireRound(this.rounds);
    const batch = round.requireBatch();
    if (!batch.complete) {
      throw new BatchNotComplete(
        `Batch for round ${round.id} is at ${batch.position}, draw cannot complete yet`,
      );
    }
    const handle = round.randomnessHandle;
    if (!handle || !this.randomness.isAvailable(handle)) {
      throw new RandomnessNotReady(
        handle
          ? `Randomness ${handle.requestId} for round ${round.id} is not available yet`
          : `Randomness for round ${round.id} has not been requested`,
      );
    }

    const revealed = this.randomness.consume(handle);
    const result = this.strategy.select(
      batch.toSnapshot(),
      revealed.value,
      this.treasury.availablePrize(),
    );
    if (result.awarded) {
      for (const award of result.awards) {
        this.treasury.award(award.account, award.amount, award.tier);
      }
    }
    round.finishDraw(this.clock.now());

    const event = toCompletedEvent(round.id, revealed, result);
    this.logResult(event, result);
    this.events.emit('drawCompleted', (p) => p.drawCompleted(event));
    return event;
  }

  private logResult(event: DrawCompletedEvent, result: SelectionResult): void {
    this.logger.info('Draw completed', {
      roundId: event.roundId,
      strategy: this.strategy.kind,
      awarded: event.awarded,
      winners: event.awards.length,
    });
    if (result.issues.length > 0) {
      this.logger.warn('Draw completed with partial awards', {
        roundId: event.roundId,
        issues: event.issues.length,
      });
    }
    if (result.carryOver.gt(0)) {
      this.logger.warn('Prize carried over to next round', {
        roundId: event.roundId,
        carryOver: event.carryOver,
        reason: event.reason ?? 'UNALLOCATED_REMAINDER',
      });
    }
  }
}

function toCompletedEvent(
  roundId: number,
  revealed: RevealedEntropy,
  result: SelectionResult,
): DrawCompletedEvent {
  const base = {
    roundId,
    requestId: revealed.requestId,
    secret: revealed.secret,
    randomValue: toHex(revealed.value),
    carryOver: result.carryOver.toString(),
    issues: result.issues.map(describeIssue),
  };
  if (!result.awarded) {
    return { ...base, awarded: false, reason: result.reason, awards: [] };
  }
  return {
    ...base,
    awarded: true,
    awards: result.awards.map((a) => ({
      account: a.account,
      amount: a.amount.toString(),
      tier: a.tier,
    })),
  };
}
