import { PoolConfig } from '@shared/kernel/PoolConfig';
import { DomainError } from '@shared/kernel/DomainError';
import { Logger } from '@shared/ports/Logger';
import { RoundState } from '@engine/domain/RoundState';
import { Timer } from '@engine/application/ports/Timer';
import { GetDrawStatusUseCase } from '@engine/application/GetDrawStatusUseCase';
import { StartDrawUseCase } from '@engine/application/StartDrawUseCase';
import { RequestRandomnessUseCase } from '@engine/application/RequestRandomnessUseCase';
import { ProcessBatchUseCase } from '@engine/application/ProcessBatchUseCase';
import { CompleteDrawUseCase } from '@engine/application/CompleteDrawUseCase';
import { StartNextRoundUseCase } from '@engine/application/StartNextRoundUseCase';

export type KeeperAction =
  | 'START_NEXT_ROUND'
  | 'START_DRAW'
  | 'PROCESS_BATCH'
  | 'REQUEST_RANDOMNESS'
  | 'COMPLETE_DRAW'
  | 'WAIT';

/**
 * Drives a pool through its lifecycle by calling the same operations an
 * external operator would, one step per tick.
 */
export class RunDrawKeeperUseCase {
  private running = false;

  constructor(
    private readonly config: PoolConfig,
    private readonly status: GetDrawStatusUseCase,
    private readonly startDraw: StartDrawUseCase,
    private readonly requestRandomness: RequestRandomnessUseCase,
    private readonly processBatch: ProcessBatchUseCase,
    private readonly completeDraw: CompleteDrawUseCase,
    private readonly startNextRound: StartNextRoundUseCase,
    private readonly timer: Timer,
    private readonly logger: Logger,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(intervalMs: number): void {
    if (this.running) throw new Error('Draw keeper is already running');
    this.running = true;
    this.logger.info('Draw keeper started', { intervalMs });
    this.scheduleTick(intervalMs);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.timer.clear();
    this.logger.info('Draw keeper stopped');
  }

  /** Performs the next due operation, if any. */
  step(): KeeperAction {
    const status = this.status.execute();
    if (!status) {
      this.startNextRound.execute();
      return 'START_NEXT_ROUND';
    }

    switch (status.state) {
      case RoundState.ROUND_ACTIVE:
        return 'WAIT';
      case RoundState.AWAITING_DRAW:
        this.startDraw.execute();
        return 'START_DRAW';
      case RoundState.DRAW_PROCESSING:
        if (!status.isBatchComplete) {
          this.processBatch.execute(this.config.maxBatchSize);
          return 'PROCESS_BATCH';
        }
        if (!status.isRandomnessRequested) {
          this.requestRandomness.execute();
          return 'REQUEST_RANDOMNESS';
        }
        if (!status.isRandomnessAvailable) return 'WAIT';
        this.completeDraw.execute();
        return 'COMPLETE_DRAW';
      case RoundState.INTERMISSION:
        this.startNextRound.execute();
        return 'START_NEXT_ROUND';
    }
  }

  private scheduleTick(intervalMs: number): void {
    this.timer.schedule(() => {
      if (!this.running) return;
      this.tick();
      this.scheduleTick(intervalMs);
    }, intervalMs);
  }

  private tick(): void {
    try {
      const action = this.step();
      if (action !== 'WAIT') {
        this.logger.info('Draw keeper advanced pool', { action });
      }
    } catch (err) {
      if (err instanceof DomainError) {
        this.logger.warn('Draw keeper step rejected', {
          error: err.name,
          message: err.message,
        });
        return;
      }
      this.logger.error('Draw keeper step failed', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
