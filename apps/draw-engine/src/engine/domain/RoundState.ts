export enum RoundState {
  ROUND_ACTIVE = 'ROUND_ACTIVE',
  AWAITING_DRAW = 'AWAITING_DRAW',
  DRAW_PROCESSING = 'DRAW_PROCESSING',
  INTERMISSION = 'INTERMISSION',
}

// AWAITING_DRAW is never stored: ROUND_ACTIVE reads as AWAITING_DRAW once
// the round's end time has passed.
const validTransitions: Record<RoundState, RoundState[]> = {
  [RoundState.ROUND_ACTIVE]: [RoundState.AWAITING_DRAW],
  [RoundState.AWAITING_DRAW]: [RoundState.DRAW_PROCESSING],
  [RoundState.DRAW_PROCESSING]: [RoundState.INTERMISSION],
  [RoundState.INTERMISSION]: [RoundState.ROUND_ACTIVE],
};

export function canTransition(from: RoundState, to: RoundState): boolean {
  return validTransitions[from].includes(to);
}

export interface RoundStateFlags {
  isRoundActive: boolean;
  isAwaitingDraw: boolean;
  isDrawProcessing: boolean;
  isInIntermission: boolean;
}

export function toStateFlags(state: RoundState): RoundStateFlags {
  return {
    isRoundActive: state === RoundState.ROUND_ACTIVE,
    isAwaitingDraw: state === RoundState.AWAITING_DRAW,
    isDrawProcessing: state === RoundState.DRAW_PROCESSING,
    isInIntermission: state === RoundState.INTERMISSION,
  };
}
