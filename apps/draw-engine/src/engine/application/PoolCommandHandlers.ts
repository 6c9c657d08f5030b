import { BonusWeight } from '@bonus/domain/BonusWeightRegistry';
import { ManageBonusWeightUseCase } from '@bonus/application/ManageBonusWeightUseCase';
import { DepositUseCase } from '@pool/application/DepositUseCase';
import { WithdrawUseCase } from '@pool/application/WithdrawUseCase';
import { FundPrizeUseCase } from '@pool/application/FundPrizeUseCase';
import { EmergencySwitch } from '@pool/application/ports/EmergencyGate';
import { PoolConfig } from '@shared/kernel/PoolConfig';
import { BonusWeightView, CommandSubscriber } from '@engine/application/ports/CommandSubscriber';
import { StartDrawUseCase } from '@engine/application/StartDrawUseCase';
import { RequestRandomnessUseCase } from '@engine/application/RequestRandomnessUseCase';
import { ProcessBatchUseCase } from '@engine/application/ProcessBatchUseCase';
import { CompleteDrawUseCase } from '@engine/application/CompleteDrawUseCase';
import { StartNextRoundUseCase } from '@engine/application/StartNextRoundUseCase';
import { GetDrawStatusUseCase } from '@engine/application/GetDrawStatusUseCase';
import { GetParticipantWeightUseCase } from '@engine/application/GetParticipantWeightUseCase';

export interface PoolUseCases {
  deposit: DepositUseCase;
  withdraw: WithdrawUseCase;
  fundPrize: FundPrizeUseCase;
  startDraw: StartDrawUseCase;
  requestRandomness: RequestRandomnessUseCase;
  processBatch: ProcessBatchUseCase;
  completeDraw: CompleteDrawUseCase;
  startNextRound: StartNextRoundUseCase;
  manageBonus: ManageBonusWeightUseCase;
  getDrawStatus: GetDrawStatusUseCase;
  getWeight: GetParticipantWeightUseCase;
}

/** Binds every public pool operation to its command subject. */
export function registerPoolCommands(
  subscriber: CommandSubscriber,
  useCases: PoolUseCases,
  gate: EmergencySwitch,
  config: PoolConfig,
): void {
  subscriber.handle('deposit', (cmd) => useCases.deposit.execute(cmd));
  subscriber.handle('withdraw', (cmd) => useCases.withdraw.execute(cmd));
  subscriber.handle('fundPrize', (cmd) => useCases.fundPrize.execute(cmd));
  subscriber.handle('startDraw', () => useCases.startDraw.execute());
  subscriber.handle('requestRandomness', () => useCases.requestRandomness.execute());
  subscriber.handle('processBatch', (cmd) =>
    useCases.processBatch.execute(cmd.limit ?? config.maxBatchSize),
  );
  subscriber.handle('completeDraw', () => useCases.completeDraw.execute());
  subscriber.handle('startNextRound', () => useCases.startNextRound.execute());
  subscriber.handle('setBonusWeight', (cmd) =>
    toBonusView(cmd.account, useCases.manageBonus.setBonusWeight(cmd)),
  );
  subscriber.handle('addBonusWeight', (cmd) =>
    toBonusView(cmd.account, useCases.manageBonus.addBonusWeight(cmd)),
  );
  subscriber.handle('removeBonusWeight', (cmd) => ({
    removed: useCases.manageBonus.removeBonusWeight(cmd),
  }));
  subscriber.handle('setGateMode', (cmd) => {
    gate.setMode(cmd.mode, cmd.reason);
    return { mode: gate.mode };
  });
  subscriber.handle('getDrawStatus', () => useCases.getDrawStatus.execute());
  subscriber.handle('getWeight', (cmd) => useCases.getWeight.execute(cmd.account));
}

function toBonusView(account: string, entry: BonusWeight): BonusWeightView {
  return {
    account,
    weight: entry.weight.toString(),
    reason: entry.reason,
    updatedAt: entry.updatedAt,
  };
}
