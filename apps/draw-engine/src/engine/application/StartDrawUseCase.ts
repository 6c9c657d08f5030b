import { PoolConfig } from '@shared/kernel/PoolConfig';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import { RoundEvents } from '@engine/application/RoundEvents';
import { requireRound } from '@engine/application/requireRound';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';

export interface DrawStarted {
  roundId: number;
  actualEndTime: number;
  randomnessRequestId: string | null;
  commitment: string | null;
}

export class StartDrawUseCase {
  constructor(
    private readonly config: PoolConfig,
    private readonly rounds: CurrentRoundStore,
    private readonly accumulator: TwabAccumulator,
    private readonly randomness: RandomnessGateway,
    private readonly gate: EmergencyGate,
    private readonly events: RoundEvents,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  execute(): DrawStarted {
    assertAllowed(this.gate, 'START_DRAW');
    const round = requireRound(this.rounds);
    const now = this.clock.now();

    // Every check must pass before entropy is requested or state moves.
    round.assertCanBeginDraw(now);
    const handle = this.config.earlyEntropyRequest
      ? this.randomness.requestEntropy()
      : null;

    round.beginDraw(now, handle);
    this.accumulator.freeze(now);

    this.logger.info('Draw started', {
      roundId: round.id,
      actualEndTime: now,
      overrunMs: now - round.endTime,
      randomnessRequested: handle !== null,
    });
    const commitment = handle?.commitment ?? null;
    this.events.emit('drawStarted', (p) => p.drawStarted(round.id, now, commitment));

    return {
      roundId: round.id,
      actualEndTime: now,
      randomnessRequestId: handle?.requestId ?? null,
      commitment,
    };
  }
}
