import { EntropyHandle } from '@rng/domain/Entropy';
import { GateMode } from '@pool/application/ports/EmergencyGate';
import { BalanceChangeResult, DepositCommand, WithdrawCommand } from '@pool/application/commands/BalanceCommands';
import { FundPrizeCommand } from '@pool/application/commands/FundPrizeCommand';
import {
  AddBonusWeightCommand,
  RemoveBonusWeightCommand,
  SetBonusWeightCommand,
} from '@bonus/application/commands/BonusWeightCommands';
import { DrawCompletedEvent } from '@engine/application/ports/EventPublisher';
import { DrawStarted } from '@engine/application/StartDrawUseCase';
import { BatchProgress } from '@engine/application/ProcessBatchUseCase';
import { RoundOpened } from '@engine/application/StartNextRoundUseCase';
import { DrawStatus } from '@engine/application/GetDrawStatusUseCase';
import { ParticipantWeight } from '@engine/application/GetParticipantWeightUseCase';

export interface BonusWeightView {
  account: string;
  weight: string;
  reason: string;
  updatedAt: number;
}

export interface GateModeCommand {
  mode: GateMode;
  reason: string;
}

type NoArgs = Record<string, unknown>;

/** Request and reply shape of every command the pool answers. */
export interface PoolCommands {
  deposit: { request: DepositCommand; reply: BalanceChangeResult };
  withdraw: { request: WithdrawCommand; reply: BalanceChangeResult };
  fundPrize: { request: FundPrizeCommand; reply: { available: string } };
  startDraw: { request: NoArgs; reply: DrawStarted };
  requestRandomness: { request: NoArgs; reply: EntropyHandle };
  processBatch: { request: { limit?: number }; reply: BatchProgress };
  completeDraw: { request: NoArgs; reply: DrawCompletedEvent };
  startNextRound: { request: NoArgs; reply: RoundOpened };
  setBonusWeight: { request: SetBonusWeightCommand; reply: BonusWeightView };
  addBonusWeight: { request: AddBonusWeightCommand; reply: BonusWeightView };
  removeBonusWeight: { request: RemoveBonusWeightCommand; reply: { removed: boolean } };
  setGateMode: { request: GateModeCommand; reply: { mode: GateMode } };
  getDrawStatus: { request: NoArgs; reply: DrawStatus | null };
  getWeight: { request: { account: string }; reply: ParticipantWeight };
}

export type PoolCommandName = keyof PoolCommands;

export type CommandHandler<K extends PoolCommandName> = (
  request: PoolCommands[K]['request'],
) => PoolCommands[K]['reply'];

export interface CommandSubscriber {
  handle<K extends PoolCommandName>(name: K, handler: CommandHandler<K>): void;
  close(): Promise<void>;
}
