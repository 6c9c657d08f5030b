import { Module } from '@nestjs/common';
import { PoolConfigModule } from '@config/config.module';
import { POOL_CONFIG } from '@config/env-config.provider';
import { ClockModule, CLOCK } from '@clock/clock.module';
import { MessagingModule } from '@messaging/messaging.module';
import { LOGGER } from '@messaging/tokens';
import { PoolConfig } from '@shared/kernel/PoolConfig';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { InMemoryCurrentRoundStore } from '@engine/infrastructure/InMemoryCurrentRoundStore';
import { BalanceLedger } from '@pool/application/ports/BalanceLedger';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';
import { PrizeTreasury } from '@pool/application/ports/PrizeTreasury';
import { EmergencyGate, EmergencySwitch } from '@pool/application/ports/EmergencyGate';
import { DepositUseCase } from '@pool/application/DepositUseCase';
import { WithdrawUseCase } from '@pool/application/WithdrawUseCase';
import { FundPrizeUseCase } from '@pool/application/FundPrizeUseCase';
import { InMemoryBalanceLedger } from '@pool/infrastructure/InMemoryBalanceLedger';
import { InMemoryParticipantRegistry } from '@pool/infrastructure/InMemoryParticipantRegistry';
import { InMemoryPrizeTreasury } from '@pool/infrastructure/InMemoryPrizeTreasury';
import { InMemoryEmergencyGate } from '@pool/infrastructure/InMemoryEmergencyGate';

export const BALANCE_LEDGER = 'BalanceLedger';
export const PARTICIPANT_REGISTRY = 'ParticipantRegistry';
export const PRIZE_TREASURY = 'PrizeTreasury';
export const EMERGENCY_GATE = 'EmergencyGate';
export const CURRENT_ROUND_STORE = 'CurrentRoundStore';
export const TWAB_ACCUMULATOR = 'TwabAccumulator';
export const DEPOSIT_USE_CASE = 'DepositUseCase';
export const WITHDRAW_USE_CASE = 'WithdrawUseCase';
export const FUND_PRIZE_USE_CASE = 'FundPrizeUseCase';

@Module({
  imports: [PoolConfigModule, MessagingModule, ClockModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: BALANCE_LEDGER,
      useFactory: (): BalanceLedger => new InMemoryBalanceLedger(),
    },
    {
      provide: PARTICIPANT_REGISTRY,
      useFactory: (): ParticipantRegistry => new InMemoryParticipantRegistry(),
    },
    {
      provide: PRIZE_TREASURY,
      useFactory: (): PrizeTreasury => new InMemoryPrizeTreasury(),
    },
    {
      provide: EMERGENCY_GATE,
      useFactory: (logger: Logger): EmergencySwitch => new InMemoryEmergencyGate(logger),
      inject: [LOGGER],
    },
    {
      provide: CURRENT_ROUND_STORE,
      useFactory: (): CurrentRoundStore => new InMemoryCurrentRoundStore(),
    },
    {
      provide: TWAB_ACCUMULATOR,
      useFactory: (ledger: BalanceLedger): TwabAccumulator => new TwabAccumulator(ledger),
      inject: [BALANCE_LEDGER],
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: DEPOSIT_USE_CASE,
      useFactory: (
        config: PoolConfig,
        rounds: CurrentRoundStore,
        ledger: BalanceLedger,
        participants: ParticipantRegistry,
        accumulator: TwabAccumulator,
        gate: EmergencySwitch,
        clock: Clock,
        logger: Logger,
      ): DepositUseCase =>
        new DepositUseCase(config, rounds, ledger, participants, accumulator, gate, clock, logger),
      inject: [
        POOL_CONFIG,
        CURRENT_ROUND_STORE,
        BALANCE_LEDGER,
        PARTICIPANT_REGISTRY,
        TWAB_ACCUMULATOR,
        EMERGENCY_GATE,
        CLOCK,
        LOGGER,
      ],
    },
    {
      provide: WITHDRAW_USE_CASE,
      useFactory: (
        rounds: CurrentRoundStore,
        ledger: BalanceLedger,
        accumulator: TwabAccumulator,
        gate: EmergencySwitch,
        clock: Clock,
        logger: Logger,
      ): WithdrawUseCase =>
        new WithdrawUseCase(rounds, ledger, accumulator, gate, clock, logger),
      inject: [
        CURRENT_ROUND_STORE,
        BALANCE_LEDGER,
        TWAB_ACCUMULATOR,
        EMERGENCY_GATE,
        CLOCK,
        LOGGER,
      ],
    },
    {
      provide: FUND_PRIZE_USE_CASE,
      useFactory: (
        treasury: PrizeTreasury,
        gate: EmergencyGate,
        logger: Logger,
      ): FundPrizeUseCase => new FundPrizeUseCase(treasury, gate, logger),
      inject: [PRIZE_TREASURY, EMERGENCY_GATE, LOGGER],
    },
  ],
  exports: [
    BALANCE_LEDGER,
    PARTICIPANT_REGISTRY,
    PRIZE_TREASURY,
    EMERGENCY_GATE,
    CURRENT_ROUND_STORE,
    TWAB_ACCUMULATOR,
    DEPOSIT_USE_CASE,
    WITHDRAW_USE_CASE,
    FUND_PRIZE_USE_CASE,
  ],
})
export class PoolModule {}
