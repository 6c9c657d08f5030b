import {
  Module,
  OnApplicationBootstrap,
  OnApplicationShutdown,
  Inject,
} from '@nestjs/common';
import { PoolConfigModule } from './config/config.module';
import { MessagingModule } from './messaging/messaging.module';
import { VALIDATED_ENV, POOL_CONFIG } from '@config/env-config.provider';
import { RawPoolConfig } from '@config/pool-config.schema';
import { COMMAND_SUBSCRIBER, LOGGER } from '@messaging/tokens';
import { ClockModule } from '@clock/clock.module';
import { RngModule } from '@rng/infrastructure/rng.module';
import {
  PoolModule,
  DEPOSIT_USE_CASE,
  WITHDRAW_USE_CASE,
  FUND_PRIZE_USE_CASE,
  EMERGENCY_GATE,
} from '@pool/infrastructure/pool.module';
import { BonusModule, MANAGE_BONUS_WEIGHT_USE_CASE } from '@bonus/infrastructure/bonus.module';
import {
  EngineModule,
  ROUND_EVENTS,
  START_DRAW_USE_CASE,
  REQUEST_RANDOMNESS_USE_CASE,
  PROCESS_BATCH_USE_CASE,
  COMPLETE_DRAW_USE_CASE,
  START_NEXT_ROUND_USE_CASE,
  GET_DRAW_STATUS_USE_CASE,
  GET_PARTICIPANT_WEIGHT_USE_CASE,
  RUN_DRAW_KEEPER_USE_CASE,
} from '@engine/infrastructure/engine.module';
import { PoolConfig } from '@shared/kernel/PoolConfig';
import { Logger } from '@shared/ports/Logger';
import { EmergencySwitch } from '@pool/application/ports/EmergencyGate';
import { DepositUseCase } from '@pool/application/DepositUseCase';
import { WithdrawUseCase } from '@pool/application/WithdrawUseCase';
import { FundPrizeUseCase } from '@pool/application/FundPrizeUseCase';
import { ManageBonusWeightUseCase } from '@bonus/application/ManageBonusWeightUseCase';
import { CommandSubscriber } from '@engine/application/ports/CommandSubscriber';
import { RoundEvents } from '@engine/application/RoundEvents';
import { StartDrawUseCase } from '@engine/application/StartDrawUseCase';
import { RequestRandomnessUseCase } from '@engine/application/RequestRandomnessUseCase';
import { ProcessBatchUseCase } from '@engine/application/ProcessBatchUseCase';
import { CompleteDrawUseCase } from '@engine/application/CompleteDrawUseCase';
import { StartNextRoundUseCase } from '@engine/application/StartNextRoundUseCase';
import { GetDrawStatusUseCase } from '@engine/application/GetDrawStatusUseCase';
import { GetParticipantWeightUseCase } from '@engine/application/GetParticipantWeightUseCase';
import { RunDrawKeeperUseCase } from '@engine/application/RunDrawKeeperUseCase';
import { registerPoolCommands } from '@engine/application/PoolCommandHandlers';

@Module({
  imports: [
    PoolConfigModule,
    MessagingModule,
    ClockModule,
    RngModule,
    PoolModule,
    BonusModule,
    EngineModule,
  ],
})
export class AppModule
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  constructor(
    @Inject(VALIDATED_ENV) private readonly env: RawPoolConfig,
    @Inject(POOL_CONFIG) private readonly config: PoolConfig,
    @Inject(LOGGER) private readonly logger: Logger,
    @Inject(COMMAND_SUBSCRIBER) private readonly commands: CommandSubscriber,
    @Inject(EMERGENCY_GATE) private readonly gate: EmergencySwitch,
    @Inject(ROUND_EVENTS) private readonly events: RoundEvents,
    @Inject(DEPOSIT_USE_CASE) private readonly deposit: DepositUseCase,
    @Inject(WITHDRAW_USE_CASE) private readonly withdraw: WithdrawUseCase,
    @Inject(FUND_PRIZE_USE_CASE) private readonly fundPrize: FundPrizeUseCase,
    @Inject(MANAGE_BONUS_WEIGHT_USE_CASE) private readonly manageBonus: ManageBonusWeightUseCase,
    @Inject(START_DRAW_USE_CASE) private readonly startDraw: StartDrawUseCase,
    @Inject(REQUEST_RANDOMNESS_USE_CASE) private readonly requestRandomness: RequestRandomnessUseCase,
    @Inject(PROCESS_BATCH_USE_CASE) private readonly processBatch: ProcessBatchUseCase,
    @Inject(COMPLETE_DRAW_USE_CASE) private readonly completeDraw: CompleteDrawUseCase,
    @Inject(START_NEXT_ROUND_USE_CASE) private readonly startNextRound: StartNextRoundUseCase,
    @Inject(GET_DRAW_STATUS_USE_CASE) private readonly getDrawStatus: GetDrawStatusUseCase,
    @Inject(GET_PARTICIPANT_WEIGHT_USE_CASE) private readonly getWeight: GetParticipantWeightUseCase,
    @Inject(RUN_DRAW_KEEPER_USE_CASE) private readonly keeper: RunDrawKeeperUseCase,
  ) {}

  onApplicationBootstrap(): void {
    registerPoolCommands(
      this.commands,
      {
        deposit: this.deposit,
        withdraw: this.withdraw,
        fundPrize: this.fundPrize,
        startDraw: this.startDraw,
        requestRandomness: this.requestRandomness,
        processBatch: this.processBatch,
        completeDraw: this.completeDraw,
        startNextRound: this.startNextRound,
        manageBonus: this.manageBonus,
        getDrawStatus: this.getDrawStatus,
        getWeight: this.getWeight,
      },
      this.gate,
      this.config,
    );
    this.startNextRound.execute();

    if (this.env.KEEPER_INTERVAL_MS !== undefined) {
      this.keeper.start(this.env.KEEPER_INTERVAL_MS);
    }
  }

  async onApplicationShutdown(): Promise<void> {
    this.keeper.stop();
    await this.commands.close();
    if (this.events.pending > 0) {
      this.logger.warn('Shutting down with pending event publications', {
        pendingEvents: this.events.pending,
      });
    }
    await this.events.drain();
  }
}
