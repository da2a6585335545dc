import { getAddress, isAddress, type Address } from 'viem';
import { z } from 'zod';

import { checkFeeRates, describeViolation } from '@tollgate/fees';

const booleanFlag = (fallback: boolean) =>
  z
    .preprocess((v) => {
      if (typeof v === 'string') {
        const s = v.trim().toLowerCase();
        return s === '1' || s === 'true' || s === 'yes' || s === 'on';
      }
      return v;
    }, z.boolean())
    .default(fallback);

const address = z
  .string()
  .trim()
  .refine((v) => isAddress(v, { strict: false }), 'Invalid EVM address')
  .transform((v): Address => getAddress(v));

const optionalAddress = z
  .string()
  .trim()
  .default('')
  .refine((v) => v.length === 0 || isAddress(v, { strict: false }), 'Invalid EVM address')
  .transform((v): Address | null => (v.length === 0 ? null : getAddress(v)));

const integerString = z
  .string()
  .trim()
  .regex(/^[0-9]+$/, 'Expected a non-negative integer')
  .transform((v) => BigInt(v));

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // RPC
  RPC_URL: z.string().url(),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5_000),
  RPC_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  // Token and exchange
  TOKEN_ADDRESS: address,
  ROUTER_ADDRESS: address,
  FACTORY_ADDRESS: address,
  // Wrapped native token: the reference asset's side of the pair.
  REFERENCE_ASSET: address,

  // Recipients
  FEE_RECIPIENT: address,
  // Empty: deposited liquidity stays with the token's own account.
  LIQUIDITY_RECEIVER: optionalAddress,
  // Comma-separated accounts exempt from fees.
  FEE_EXEMPT: z.string().default(''),

  // Fee rates, parts per thousand
  SELL_ROYALTY_BP: z.coerce.number().int().min(0).default(0),
  SELL_LIQUIDITY_BP: z.coerce.number().int().min(0).default(0),
  BUY_LIQUIDITY_BP: z.coerce.number().int().min(0).default(0),

  // Conversion
  MIN_ROYALTY_TO_SWAP: integerString.default('0'),
  MIN_LIQUIDITY_TO_SWAP: integerString.default('0'),
  SWAP_ENABLED: booleanFlag(true),
  SWAP_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).default(300),
  DEPOSIT_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).default(10_000),
  SWAP_DEADLINE_SECONDS: z.coerce.number().int().min(1).max(86_400).default(300),
});

export type Env = z.infer<typeof EnvSchema>;

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  logLevel: Env['LOG_LEVEL'];
  rpc: {
    url: string;
    timeoutMs: number;
    retries: number;
  };
  token: {
    address: Address;
    feeExempt: Address[];
  };
  exchange: {
    router: Address;
    factory: Address;
    referenceAsset: Address;
  };
  fees: {
    sellRoyaltyBp: number;
    sellLiquidityBp: number;
    buyLiquidityBp: number;
  };
  conversion: {
    swapEnabled: boolean;
    minRoyaltyToSwap: bigint;
    minLiquidityToSwap: bigint;
    feeRecipient: Address;
    liquidityReceiver: Address | null;
    swapSlippageBps: number;
    depositSlippageBps: number;
    deadlineSeconds: number;
  };
};

function splitCsv(input: string): string[] {
  return input
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}

export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = loadEnv(input);

  const fees = {
    sellRoyaltyBp: env.SELL_ROYALTY_BP,
    sellLiquidityBp: env.SELL_LIQUIDITY_BP,
    buyLiquidityBp: env.BUY_LIQUIDITY_BP,
  };
  const violation = checkFeeRates(fees);
  if (violation) {
    throw new Error(`Invalid fee configuration: ${describeViolation(violation)}`);
  }

  const feeExempt = splitCsv(env.FEE_EXEMPT).map((entry) => {
    if (!isAddress(entry, { strict: false })) {
      throw new Error(`Invalid FEE_EXEMPT entry: ${entry}`);
    }
    return getAddress(entry);
  });

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    rpc: {
      url: env.RPC_URL,
      timeoutMs: env.RPC_TIMEOUT_MS,
      retries: env.RPC_RETRIES,
    },
    token: {
      address: env.TOKEN_ADDRESS,
      feeExempt,
    },
    exchange: {
      router: env.ROUTER_ADDRESS,
      factory: env.FACTORY_ADDRESS,
      referenceAsset: env.REFERENCE_ASSET,
    },
    fees,
    conversion: {
      swapEnabled: env.SWAP_ENABLED,
      minRoyaltyToSwap: env.MIN_ROYALTY_TO_SWAP,
      minLiquidityToSwap: env.MIN_LIQUIDITY_TO_SWAP,
      feeRecipient: env.FEE_RECIPIENT,
      liquidityReceiver: env.LIQUIDITY_RECEIVER,
      swapSlippageBps: env.SWAP_SLIPPAGE_BPS,
      depositSlippageBps: env.DEPOSIT_SLIPPAGE_BPS,
      deadlineSeconds: env.SWAP_DEADLINE_SECONDS,
    },
  };
}
