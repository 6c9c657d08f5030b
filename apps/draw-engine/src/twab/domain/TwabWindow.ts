export interface TwabWindow {
  readonly roundId: number;
  readonly startTime: number;
  readonly durationMs: number;
  /** Round's actualEndTime once its draw has started. */
  readonly cap: number | null;
}

export function effectiveTime(at: number, window: TwabWindow): number {
  return window.cap === null ? at : Math.min(at, window.cap);
}
