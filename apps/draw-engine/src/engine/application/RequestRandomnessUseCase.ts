import { Logger } from '@shared/ports/Logger';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { EntropyHandle, RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import { requireRound } from '@engine/application/requireRound';
import { EmergencyGate, assertAllowed } from '@pool/application/ports/EmergencyGate';

/** Late entropy request for pools that do not request at draw start. */
export class RequestRandomnessUseCase {
  constructor(
    private readonly rounds: CurrentRoundStore,
    private readonly randomness: RandomnessGateway,
    private readonly gate: EmergencyGate,
    private readonly logger: Logger,
  ) {}

  execute(): EntropyHandle {
    assertAllowed(this.gate, 'REQUEST_RANDOMNESS');
    const round = requireRound(this.rounds);
    round.assertCanAttachRandomness();

    const handle = this.randomness.requestEntropy();
    round.attachRandomness(handle);

    this.logger.info('Randomness requested', {
      roundId: round.id,
      requestId: handle.requestId,
      commitment: handle.commitment,
    });
    return handle;
  }
}
