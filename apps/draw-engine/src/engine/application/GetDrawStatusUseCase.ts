import { RoundState, RoundStateFlags, toStateFlags } from '@engine/domain/RoundState';
import { Clock } from '@shared/ports/Clock';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';

export interface DrawStatus extends RoundStateFlags {
  roundId: number;
  state: RoundState;
  startTime: number;
  endTime: number;
  actualEndTime: number | null;
  canDrawNow: boolean;
  msUntilDrawAllowed: number;
  isDrawInProgress: boolean;
  isBatchComplete: boolean;
  batchPosition: number;
  registrySize: number;
  isRandomnessRequested: boolean;
  isRandomnessAvailable: boolean;
}

export class GetDrawStatusUseCase {
  constructor(
    private readonly rounds: CurrentRoundStore,
    private readonly participants: ParticipantRegistry,
    private readonly randomness: RandomnessGateway,
    private readonly clock: Clock,
  ) {}

  execute(): DrawStatus | null {
    const round = this.rounds.get();
    if (!round) return null;

    const now = this.clock.now();
    const state = round.stateAt(now);
    const batch = round.batch;
    const handle = round.randomnessHandle;

    return {
      roundId: round.id,
      state,
      startTime: round.startTime,
      endTime: round.endTime,
      actualEndTime: round.actualEndTime,
      canDrawNow: state === RoundState.AWAITING_DRAW,
      msUntilDrawAllowed:
        state === RoundState.ROUND_ACTIVE ? Math.max(0, round.endTime - now) : 0,
      isDrawInProgress: round.isDrawInProgress,
      isBatchComplete: batch?.complete ?? false,
      batchPosition: batch?.position ?? 0,
      registrySize: this.participants.orderedMembers().length,
      isRandomnessRequested: handle !== null,
      isRandomnessAvailable: handle !== null && this.randomness.isAvailable(handle),
      ...toStateFlags(state),
    };
  }
}
