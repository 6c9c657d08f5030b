export interface AwardView {
  account: string;
  amount: string;
  tier: string;
}

export interface DrawCompletedEvent {
  roundId: number;
  requestId: string;
  /** Seed-chain secret behind `randomValue`; hashes to the commitment published at draw start. */
  secret: string;
  randomValue: string;
  awarded: boolean;
  reason?: string;
  awards: AwardView[];
  carryOver: string;
  issues: Record<string, string | number>[];
}

export interface EventPublisher {
  roundStarted(roundId: number, startTime: number, endTime: number): Promise<void>;
  drawStarted(
    roundId: number,
    actualEndTime: number,
    commitment: string | null,
  ): Promise<void>;
  batchProcessed(
    roundId: number,
    position: number,
    remaining: number,
    complete: boolean,
  ): Promise<void>;
  drawCompleted(event: DrawCompletedEvent): Promise<void>;
}
