import { z } from 'zod';

export const AddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid EVM address');

export const BigIntStringSchema = z
  .string()
  .regex(/^[0-9]+$/, 'Expected an integer string');

/** Accepts a bigint or an integer string and yields a non-negative bigint. */
export const AmountSchema = z
  .union([z.bigint(), BigIntStringSchema])
  .transform((v) => (typeof v === 'bigint' ? v : BigInt(v)))
  .refine((v) => v >= 0n, 'Amount must be non-negative');

/** Rates are parts-per-thousand numerators. */
export const FeeRateSchema = z.number().int().min(0);

export const FeeRatesSchema = z.object({
  sellRoyaltyBp: FeeRateSchema,
  sellLiquidityBp: FeeRateSchema,
  buyLiquidityBp: FeeRateSchema,
});

export type FeeRates = z.infer<typeof FeeRatesSchema>;

export const SwapThresholdsSchema = z.object({
  minRoyaltyToSwap: AmountSchema,
  minLiquidityToSwap: AmountSchema,
});

export type SwapThresholds = z.infer<typeof SwapThresholdsSchema>;

export const SlippageBpsSchema = z.number().int().min(0).max(10_000);

export const SlippageSchema = z.object({
  swapSlippageBps: SlippageBpsSchema,
  depositSlippageBps: SlippageBpsSchema,
});

export type Slippage = z.infer<typeof SlippageSchema>;

export const ConversionSettingsSchema = z.object({
  feeRecipient: AddressSchema,
  liquidityReceiver: AddressSchema.optional(),
  swapEnabled: z.boolean().default(true),
  swapSlippageBps: SlippageBpsSchema.default(300),
  depositSlippageBps: SlippageBpsSchema.default(10_000),
  deadlineSeconds: z.number().int().positive().default(300),
});

export type ConversionSettingsInput = z.input<typeof ConversionSettingsSchema>;
export type ConversionSettings = z.infer<typeof ConversionSettingsSchema>;
