import { z } from 'zod';
import { PoolCommandName, PoolCommands } from '@engine/application/ports/CommandSubscriber';

/**
 * Zod schemas for inbound NATS command payloads. Malformed JSON is
 * rejected here and never reaches a use case; value rules (positive
 * amounts, minimum deposit, batch limits) stay with the domain.
 */

const account = z.string().trim().min(1, 'account is required');
const decimalString = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));
const reason = z.string().trim().min(1, 'reason is required');
const noArgs = z.record(z.string(), z.unknown());

export const depositSchema = z.object({ account, amount: decimalString });

export const withdrawSchema = z.object({ account, amount: decimalString });

export const fundPrizeSchema = z.object({ amount: decimalString });

export const processBatchSchema = z.object({ limit: z.number().optional() });

export const setBonusWeightSchema = z.object({ account, weight: decimalString, reason });

export const addBonusWeightSchema = z.object({ account, delta: decimalString, reason });

export const removeBonusWeightSchema = z.object({ account });

export const setGateModeSchema = z.object({
  mode: z.enum(['NORMAL', 'EMERGENCY', 'PAUSED']),
  reason,
});

export const getWeightSchema = z.object({ account });

export type CommandSchemas = {
  [K in PoolCommandName]: z.ZodType<PoolCommands[K]['request']>;
};

export const commandSchemas: CommandSchemas = {
  deposit: depositSchema,
  withdraw: withdrawSchema,
  fundPrize: fundPrizeSchema,
  startDraw: noArgs,
  requestRandomness: noArgs,
  processBatch: processBatchSchema,
  completeDraw: noArgs,
  startNextRound: noArgs,
  setBonusWeight: setBonusWeightSchema,
  addBonusWeight: addBonusWeightSchema,
  removeBonusWeight: removeBonusWeightSchema,
  setGateMode: setGateModeSchema,
  getDrawStatus: noArgs,
  getWeight: getWeightSchema,
};
