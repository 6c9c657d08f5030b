import { Round } from '@engine/domain/Round';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';

export class InMemoryCurrentRoundStore implements CurrentRoundStore {
  private currentRound: Round | null = null;

  get(): Round | null {
    return this.currentRound;
  }

  set(round: Round): void {
    if (this.currentRound && round.id <= this.currentRound.id) {
      throw new RangeError(
        `Round ids are never reused: ${round.id} does not follow ${this.currentRound.id}`,
      );
    }
    this.currentRound = round;
  }
}
