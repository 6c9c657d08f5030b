import { Module } from '@nestjs/common';
import { ClockModule, CLOCK } from '@clock/clock.module';
import { MessagingModule } from '@messaging/messaging.module';
import { LOGGER } from '@messaging/tokens';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { BonusWeightRegistry } from '@bonus/domain/BonusWeightRegistry';
import { ManageBonusWeightUseCase } from '@bonus/application/ManageBonusWeightUseCase';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';
import { EmergencyGate } from '@pool/application/ports/EmergencyGate';
import {
  PoolModule,
  PARTICIPANT_REGISTRY,
  EMERGENCY_GATE,
} from '@pool/infrastructure/pool.module';

export const BONUS_WEIGHT_REGISTRY = 'BonusWeightRegistry';
export const MANAGE_BONUS_WEIGHT_USE_CASE = 'ManageBonusWeightUseCase';

@Module({
  imports: [PoolModule, MessagingModule, ClockModule],
  providers: [
    {
      provide: BONUS_WEIGHT_REGISTRY,
      useFactory: (): BonusWeightRegistry => new BonusWeightRegistry(),
    },
    {
      provide: MANAGE_BONUS_WEIGHT_USE_CASE,
      useFactory: (
        bonuses: BonusWeightRegistry,
        participants: ParticipantRegistry,
        gate: EmergencyGate,
        clock: Clock,
        logger: Logger,
      ): ManageBonusWeightUseCase =>
        new ManageBonusWeightUseCase(bonuses, participants, gate, clock, logger),
      inject: [BONUS_WEIGHT_REGISTRY, PARTICIPANT_REGISTRY, EMERGENCY_GATE, CLOCK, LOGGER],
    },
  ],
  exports: [BONUS_WEIGHT_REGISTRY, MANAGE_BONUS_WEIGHT_USE_CASE],
})
export class BonusModule {}
