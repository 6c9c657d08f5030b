import { Round } from '@engine/domain/Round';
import { RoundState } from '@engine/domain/RoundState';
import { PoolConfig } from '@shared/kernel/PoolConfig';
import { InvalidStateTransition } from '@shared/kernel/DomainError';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { RoundEvents } from '@engine/application/RoundEvents';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';

export interface RoundOpened {
  roundId: number;
  startTime: number;
  endTime: number;
}

export class StartNextRoundUseCase {
  constructor(
    private readonly config: PoolConfig,
    private readonly rounds: CurrentRoundStore,
    private readonly accumulator: TwabAccumulator,
    private readonly gate: EmergencyGate,
    private readonly events: RoundEvents,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  execute(): RoundOpened {
    assertAllowed(this.gate, 'START_NEXT_ROUND');
    const now = this.clock.now();
    const previous = this.rounds.get();
    if (previous && previous.stateAt(now) !== RoundState.INTERMISSION) {
      throw new InvalidStateTransition(
        `Round ${previous.id} is ${previous.stateAt(now)}, the next round opens from intermission`,
      );
    }

    const round = new Round(previous ? previous.id + 1 : 1, now, this.config.roundDurationMs);
    this.rounds.set(round);
    this.accumulator.beginRound({
      roundId: round.id,
      startTime: round.startTime,
      durationMs: round.durationMs,
      cap: null,
    });

    this.logger.info('Round started', {
      roundId: round.id,
      startTime: round.startTime,
      endTime: round.endTime,
    });
    this.events.emit('roundStarted', (p) =>
      p.roundStarted(round.id, round.startTime, round.endTime),
    );
    return { roundId: round.id, startTime: round.startTime, endTime: round.endTime };
  }
}
