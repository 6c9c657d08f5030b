import { z } from 'zod';
import { Decimal } from 'decimal.js';

const booleanFlag = (name: string, fallback: boolean) =>
  z
    .enum(['true', 'false'], { error: `${name} must be "true" or "false"` })
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true'));

const decimalString = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal string');

const prizeDistributionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('single') }),
  z.object({
    type: z.literal('split'),
    winnerCount: z.number().int().positive(),
    splits: z.array(decimalString).min(1),
  }),
  z.object({
    type: z.literal('tiers'),
    tiers: z
      .array(
        z.object({
          name: z.string().min(1),
          amount: decimalString,
          winnerCount: z.number().int().positive(),
        }),
      )
      .min(1),
  }),
]);

export type RawPrizeDistribution = z.infer<typeof prizeDistributionSchema>;

/** Parses the PRIZE_DISTRIBUTION JSON text before shape validation. */
const prizeDistributionJson = z
  .string()
  .optional()
  .transform((text, ctx): unknown => {
    if (text === undefined || text.trim() === '') return { type: 'single' };
    try {
      return JSON.parse(text);
    } catch {
      ctx.addIssue({ code: 'custom', message: 'PRIZE_DISTRIBUTION must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(prizeDistributionSchema);

export const poolConfigSchema = z.object({
  POOL_ID: z
    .string({ error: 'POOL_ID is required' })
    .min(3, 'POOL_ID must be at least 3 characters')
    .max(64, 'POOL_ID must be at most 64 characters')
    .regex(
      /^[a-z][a-z0-9]+(-[a-z0-9]+)*$/,
      'POOL_ID must be a lowercase slug (e.g. "savings-usdc")',
    ),

  ROUND_DURATION_MS: z.coerce.number().int().positive('ROUND_DURATION_MS must be > 0'),

  MAX_BATCH_SIZE: z.coerce.number().int().positive('MAX_BATCH_SIZE must be > 0').default(500),

  ENTROPY_FINALITY_DELAY_MS: z.coerce
    .number()
    .int()
    .min(0, 'ENTROPY_FINALITY_DELAY_MS must be >= 0')
    .default(0),

  EARLY_ENTROPY_REQUEST: booleanFlag('EARLY_ENTROPY_REQUEST', true),

  SEED_CHAIN_LENGTH: z.coerce.number().int().positive().default(10_000),

  MINIMUM_DEPOSIT: decimalString.default('0'),

  BONUS_REQUIRES_BALANCE: booleanFlag('BONUS_REQUIRES_BALANCE', true),

  PRIZE_DISTRIBUTION: prizeDistributionJson,

  KEEPER_INTERVAL_MS: z.coerce.number().int().positive().optional(),
});

export type RawPoolConfig = z.infer<typeof poolConfigSchema>;

/** `MINIMUM_DEPOSIT` as a Decimal. */
export function minimumDepositOf(env: RawPoolConfig): Decimal {
  return new Decimal(env.MINIMUM_DEPOSIT);
}
