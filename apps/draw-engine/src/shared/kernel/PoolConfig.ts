import { Decimal } from 'decimal.js';

export interface PrizeTierConfig {
  name: string;
  amount: string;
  winnerCount: number;
}

export type PrizeDistribution =
  | { type: 'single' }
  | { type: 'split'; winnerCount: number; splits: string[] }
  | { type: 'tiers'; tiers: PrizeTierConfig[] };

export interface PoolConfig {
  roundDurationMs: number;
  maxBatchSize: number;
  earlyEntropyRequest: boolean;
  minimumDeposit: Decimal;
  bonusRequiresBalance: boolean;
  prizeDistribution: PrizeDistribution;
}
