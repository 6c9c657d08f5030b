import { PoolCommandName } from '@engine/application/ports/CommandSubscriber';

/**
 * NATS subjects for one prize pool.
 *
 * Every engine instance serves a single pool and publishes under
 * `pool.{poolId}.*`. The prefix is resolved once at boot via
 * {@link createTopics}.
 */
export interface PoolTopics {
  readonly ROUND_STARTED: string;
  readonly DRAW_STARTED: string;
  readonly DRAW_BATCH: string;
  readonly DRAW_COMPLETED: string;
  readonly CMD_PREFIX: string;
}

/**
 * @example
 * const TOPICS = createTopics('savings-usdc');
 * // TOPICS.DRAW_COMPLETED === 'pool.savings-usdc.draw.completed'
 */
export function createTopics(poolId: string): PoolTopics {
  if (!/^[\w-]+$/.test(poolId)) {
    throw new Error(`Invalid poolId for NATS topics: "${poolId}"`);
  }

  const prefix = `pool.${poolId}`;

  return Object.freeze({
    ROUND_STARTED: `${prefix}.round.started`,
    DRAW_STARTED: `${prefix}.draw.started`,
    DRAW_BATCH: `${prefix}.draw.batch`,
    DRAW_COMPLETED: `${prefix}.draw.completed`,
    CMD_PREFIX: `${prefix}.cmd`,
  });
}

/** `startNextRound` → `pool.{poolId}.cmd.start-next-round` */
export function commandSubject(topics: PoolTopics, name: PoolCommandName): string {
  const slug = name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
  return `${topics.CMD_PREFIX}.${slug}`;
}
