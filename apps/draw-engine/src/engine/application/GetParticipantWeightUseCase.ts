import { Clock } from '@shared/ports/Clock';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { DrawWeightCalculator } from '@engine/application/DrawWeightCalculator';
import { requireRound } from '@engine/application/requireRound';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';

export interface ParticipantWeight {
  account: string;
  roundId: number;
  twabWeight: string;
  bonusWeight: string;
  drawWeight: string;
}

export class GetParticipantWeightUseCase {
  constructor(
    private readonly rounds: CurrentRoundStore,
    private readonly participants: ParticipantRegistry,
    private readonly weights: DrawWeightCalculator,
    private readonly clock: Clock,
  ) {}

  execute(account: string): ParticipantWeight {
    const round = requireRound(this.rounds);
    const now = this.clock.now();
    // Queries for unknown accounts must not leave checkpoints behind.
    const { twab, bonus, total } = this.participants.isRegistered(account)
      ? this.weights.breakdown(account, now)
      : this.weights.preview(account, now);
    return {
      account,
      roundId: round.id,
      twabWeight: twab.toString(),
      bonusWeight: bonus.toString(),
      drawWeight: total.toString(),
    };
  }
}
