import { PrizeDistribution } from '@shared/kernel/PoolConfig';
import { WinnerSelectionStrategy } from '@selection/domain/WinnerSelectionStrategy';
import { WeightedSingleWinner } from '@selection/domain/WeightedSingleWinner';
import { MultiWinnerSplit } from '@selection/domain/MultiWinnerSplit';
import { FixedPrizeTiers } from '@selection/domain/FixedPrizeTiers';

export function createSelectionStrategy(distribution: PrizeDistribution): WinnerSelectionStrategy {
  switch (distribution.type) {
    case 'single':
      return new WeightedSingleWinner();
    case 'split':
      return new MultiWinnerSplit(distribution.winnerCount, distribution.splits);
    case 'tiers':
      return new FixedPrizeTiers(distribution.tiers);
  }
}
