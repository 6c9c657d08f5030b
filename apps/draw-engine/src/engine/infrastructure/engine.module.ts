import { Module } from '@nestjs/common';
import { PoolConfigModule } from '@config/config.module';
import { POOL_CONFIG } from '@config/env-config.provider';
import { ClockModule, CLOCK } from '@clock/clock.module';
import { MessagingModule } from '@messaging/messaging.module';
import { LOGGER, EVENT_PUBLISHER } from '@messaging/tokens';
import { RngModule, RANDOMNESS_GATEWAY } from '@rng/infrastructure/rng.module';
import {
  PoolModule,
  CURRENT_ROUND_STORE,
  EMERGENCY_GATE,
  PARTICIPANT_REGISTRY,
  PRIZE_TREASURY,
  TWAB_ACCUMULATOR,
} from '@pool/infrastructure/pool.module';
import { BonusModule, BONUS_WEIGHT_REGISTRY } from '@bonus/infrastructure/bonus.module';
import { PoolConfig } from '@shared/kernel/PoolConfig';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { TwabAccumulator } from '@twab/domain/TwabAccumulator';
import { BonusWeightRegistry } from '@bonus/domain/BonusWeightRegistry';
import { WinnerSelectionStrategy } from '@selection/domain/WinnerSelectionStrategy';
import { createSelectionStrategy } from '@selection/domain/createSelectionStrategy';
import { ParticipantRegistry } from '@pool/application/ports/ParticipantRegistry';
import { PrizeTreasury } from '@pool/application/ports/PrizeTreasury';
import { EmergencyGate } from '@pool/application/ports/EmergencyGate';
import { EventPublisher } from '@engine/application/ports/EventPublisher';
import { CurrentRoundStore } from '@engine/application/ports/CurrentRoundStore';
import { RandomnessGateway } from '@engine/application/ports/RandomnessGateway';
import { Timer } from '@engine/application/ports/Timer';
import { PromiseTracker } from '@engine/application/PromiseTracker';
import { RoundEvents } from '@engine/application/RoundEvents';
import { DrawWeightCalculator } from '@engine/application/DrawWeightCalculator';
import { StartDrawUseCase } from '@engine/application/StartDrawUseCase';
import { RequestRandomnessUseCase } from '@engine/application/RequestRandomnessUseCase';
import { ProcessBatchUseCase } from '@engine/application/ProcessBatchUseCase';
import { CompleteDrawUseCase } from '@engine/application/CompleteDrawUseCase';
import { StartNextRoundUseCase } from '@engine/application/StartNextRoundUseCase';
import { GetDrawStatusUseCase } from '@engine/application/GetDrawStatusUseCase';
import { GetParticipantWeightUseCase } from '@engine/application/GetParticipantWeightUseCase';
import { RunDrawKeeperUseCase } from '@engine/application/RunDrawKeeperUseCase';
import { SetTimeoutTimer } from '@engine/infrastructure/SetTimeoutTimer';

export const TIMER = 'Timer';
export const ROUND_EVENTS = 'RoundEvents';
export const SELECTION_STRATEGY = 'WinnerSelectionStrategy';
export const DRAW_WEIGHT_CALCULATOR = 'DrawWeightCalculator';
export const START_DRAW_USE_CASE = 'StartDrawUseCase';
export const REQUEST_RANDOMNESS_USE_CASE = 'RequestRandomnessUseCase';
export const PROCESS_BATCH_USE_CASE = 'ProcessBatchUseCase';
export const COMPLETE_DRAW_USE_CASE = 'CompleteDrawUseCase';
export const START_NEXT_ROUND_USE_CASE = 'StartNextRoundUseCase';
export const GET_DRAW_STATUS_USE_CASE = 'GetDrawStatusUseCase';
export const GET_PARTICIPANT_WEIGHT_USE_CASE = 'GetParticipantWeightUseCase';
export const RUN_DRAW_KEEPER_USE_CASE = 'RunDrawKeeperUseCase';

const EVENT_PROMISE_HIGH_WATER_MARK = 100;

@Module({
  imports: [PoolConfigModule, MessagingModule, ClockModule, RngModule, PoolModule, BonusModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: TIMER,
      useFactory: (): Timer => new SetTimeoutTimer(),
    },
    {
      provide: ROUND_EVENTS,
      useFactory: (publisher: EventPublisher, logger: Logger): RoundEvents =>
        new RoundEvents(
          publisher,
          new PromiseTracker('events', EVENT_PROMISE_HIGH_WATER_MARK, logger),
        ),
      inject: [EVENT_PUBLISHER, LOGGER],
    },
    {
      provide: SELECTION_STRATEGY,
      useFactory: (config: PoolConfig): WinnerSelectionStrategy =>
        createSelectionStrategy(config.prizeDistribution),
      inject: [POOL_CONFIG],
    },
    {
      provide: DRAW_WEIGHT_CALCULATOR,
      useFactory: (
        config: PoolConfig,
        accumulator: TwabAccumulator,
        bonuses: BonusWeightRegistry,
      ): DrawWeightCalculator =>
        new DrawWeightCalculator(accumulator, bonuses, config.bonusRequiresBalance),
      inject: [POOL_CONFIG, TWAB_ACCUMULATOR, BONUS_WEIGHT_REGISTRY],
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: START_DRAW_USE_CASE,
      useFactory: (
        config: PoolConfig,
        rounds: CurrentRoundStore,
        accumulator: TwabAccumulator,
        randomness: RandomnessGateway,
        gate: EmergencyGate,
        events: RoundEvents,
        clock: Clock,
        logger: Logger,
      ): StartDrawUseCase =>
        new StartDrawUseCase(config, rounds, accumulator, randomness, gate, events, clock, logger),
      inject: [
        POOL_CONFIG,
        CURRENT_ROUND_STORE,
        TWAB_ACCUMULATOR,
        RANDOMNESS_GATEWAY,
        EMERGENCY_GATE,
        ROUND_EVENTS,
        CLOCK,
        LOGGER,
      ],
    },
    {
      provide: REQUEST_RANDOMNESS_USE_CASE,
      useFactory: (
        rounds: CurrentRoundStore,
        randomness: RandomnessGateway,
        gate: EmergencyGate,
        logger: Logger,
      ): RequestRandomnessUseCase =>
        new RequestRandomnessUseCase(rounds, randomness, gate, logger),
      inject: [CURRENT_ROUND_STORE, RANDOMNESS_GATEWAY, EMERGENCY_GATE, LOGGER],
    },
    {
      provide: PROCESS_BATCH_USE_CASE,
      useFactory: (
        rounds: CurrentRoundStore,
        participants: ParticipantRegistry,
        weights: DrawWeightCalculator,
        gate: EmergencyGate,
        events: RoundEvents,
        clock: Clock,
        logger: Logger,
      ): ProcessBatchUseCase =>
        new ProcessBatchUseCase(rounds, participants, weights, gate, events, clock, logger),
      inject: [
        CURRENT_ROUND_STORE,
        PARTICIPANT_REGISTRY,
        DRAW_WEIGHT_CALCULATOR,
        EMERGENCY_GATE,
        ROUND_EVENTS,
        CLOCK,
        LOGGER,
      ],
    },
    {
      provide: COMPLETE_DRAW_USE_CASE,
      useFactory: (
        rounds: CurrentRoundStore,
        randomness: RandomnessGateway,
        strategy: WinnerSelectionStrategy,
        treasury: PrizeTreasury,
        gate: EmergencyGate,
        events: RoundEvents,
        clock: Clock,
        logger: Logger,
      ): CompleteDrawUseCase =>
        new CompleteDrawUseCase(rounds, randomness, strategy, treasury, gate, events, clock, logger),
      inject: [
        CURRENT_ROUND_STORE,
        RANDOMNESS_GATEWAY,
        SELECTION_STRATEGY,
        PRIZE_TREASURY,
        EMERGENCY_GATE,
        ROUND_EVENTS,
        CLOCK,
        LOGGER,
      ],
    },
    {
      provide: START_NEXT_ROUND_USE_CASE,
      useFactory: (
        config: PoolConfig,
        rounds: CurrentRoundStore,
        accumulator: TwabAccumulator,
        gate: EmergencyGate,
        events: RoundEvents,
        clock: Clock,
        logger: Logger,
      ): StartNextRoundUseCase =>
        new StartNextRoundUseCase(config, rounds, accumulator, gate, events, clock, logger),
      inject: [
        POOL_CONFIG,
        CURRENT_ROUND_STORE,
        TWAB_ACCUMULATOR,
        EMERGENCY_GATE,
        ROUND_EVENTS,
        CLOCK,
        LOGGER,
      ],
    },
    {
      provide: GET_DRAW_STATUS_USE_CASE,
      useFactory: (
        rounds: CurrentRoundStore,
        participants: ParticipantRegistry,
        randomness: RandomnessGateway,
        clock: Clock,
      ): GetDrawStatusUseCase =>
        new GetDrawStatusUseCase(rounds, participants, randomness, clock),
      inject: [CURRENT_ROUND_STORE, PARTICIPANT_REGISTRY, RANDOMNESS_GATEWAY, CLOCK],
    },
    {
      provide: GET_PARTICIPANT_WEIGHT_USE_CASE,
      useFactory: (
        rounds: CurrentRoundStore,
        participants: ParticipantRegistry,
        weights: DrawWeightCalculator,
        clock: Clock,
      ): GetParticipantWeightUseCase =>
        new GetParticipantWeightUseCase(rounds, participants, weights, clock),
      inject: [CURRENT_ROUND_STORE, PARTICIPANT_REGISTRY, DRAW_WEIGHT_CALCULATOR, CLOCK],
    },
    {
      provide: RUN_DRAW_KEEPER_USE_CASE,
      useFactory: (
        config: PoolConfig,
        status: GetDrawStatusUseCase,
        startDraw: StartDrawUseCase,
        requestRandomness: RequestRandomnessUseCase,
        processBatch: ProcessBatchUseCase,
        completeDraw: CompleteDrawUseCase,
        startNextRound: StartNextRoundUseCase,
        timer: Timer,
        logger: Logger,
      ): RunDrawKeeperUseCase =>
        new RunDrawKeeperUseCase(
          config,
          status,
          startDraw,
          requestRandomness,
          processBatch,
          completeDraw,
          startNextRound,
          timer,
          logger,
        ),
      inject: [
        POOL_CONFIG,
        GET_DRAW_STATUS_USE_CASE,
        START_DRAW_USE_CASE,
        REQUEST_RANDOMNESS_USE_CASE,
        PROCESS_BATCH_USE_CASE,
        COMPLETE_DRAW_USE_CASE,
        START_NEXT_ROUND_USE_CASE,
        TIMER,
        LOGGER,
      ],
    },
  ],
  exports: [
    ROUND_EVENTS,
    START_DRAW_USE_CASE,
    REQUEST_RANDOMNESS_USE_CASE,
    PROCESS_BATCH_USE_CASE,
    COMPLETE_DRAW_USE_CASE,
    START_NEXT_ROUND_USE_CASE,
    GET_DRAW_STATUS_USE_CASE,
    GET_PARTICIPANT_WEIGHT_USE_CASE,
    RUN_DRAW_KEEPER_USE_CASE,
  ],
})
export class EngineModule {}
