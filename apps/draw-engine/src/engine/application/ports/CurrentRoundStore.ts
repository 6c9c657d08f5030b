import { Round } from '@engine/domain/Round';

/** Holds the single current round; replaced, never cleared, at rollover. */
export interface CurrentRoundStore {
  get(): Round | null;
  set(round: Round): void;
}
