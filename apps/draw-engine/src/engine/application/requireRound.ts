import { Round } from '@engine/domain/Round';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { NoOpenRound } from '@shared/kernel/DomainError';

export function requireRound(rounds: CurrentRoundStore): Round {
  const round = rounds.get();
  if (!round) throw new NoOpenRound('No round has been opened yet');
  return round;
}
