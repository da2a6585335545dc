/**
 * Fee arithmetic for taxed transfers.
 *
 * Everything here is integer math with floor division, so for any amount:
 *   royaltyFee + liquidityFee + netAmount === amount
 */

import type { FeeRates } from '@tollgate/shared';
import { formatDecimalFromRatio } from '@tollgate/shared';

import { FEE_CONFIG } from './config';

export type TransferSide = 'buy' | 'sell' | 'transfer';

export type TransferFees = {
  royaltyFee: bigint;
  liquidityFee: bigint;
  totalFee: bigint;
  /** Amount settled between sender and receiver after fees */
  netAmount: bigint;
};

export type FeeRateViolation =
  | { code: 'INVALID_RATE'; field: keyof FeeRates; value: number }
  | { code: 'SELL_CEILING'; total: number; ceiling: number }
  | { code: 'BUY_CEILING'; value: number; ceiling: number };

/** floor(amount * rate / DENOMINATOR) */
export function portionOf(amount: bigint, rate: number): bigint {
  return (amount * BigInt(rate)) / FEE_CONFIG.DENOMINATOR;
}

/**
 * Returns the first violation in `rates`, or null when they can be applied.
 */
export function checkFeeRates(rates: FeeRates): FeeRateViolation | null {
  for (const field of ['sellRoyaltyBp', 'sellLiquidityBp', 'buyLiquidityBp'] as const) {
    const value = rates[field];
    if (!Number.isInteger(value) || value < 0) {
      return { code: 'INVALID_RATE', field, value };
    }
  }

  const sellTotal = rates.sellRoyaltyBp + rates.sellLiquidityBp;
  if (sellTotal > FEE_CONFIG.MAX_SELL_FEE) {
    return { code: 'SELL_CEILING', total: sellTotal, ceiling: FEE_CONFIG.MAX_SELL_FEE };
  }

  if (rates.buyLiquidityBp > FEE_CONFIG.MAX_BUY_FEE) {
    return { code: 'BUY_CEILING', value: rates.buyLiquidityBp, ceiling: FEE_CONFIG.MAX_BUY_FEE };
  }

  return null;
}

export function describeViolation(violation: FeeRateViolation): string {
  switch (violation.code) {
    case 'INVALID_RATE':
      return `${violation.field} must be a non-negative integer, got ${violation.value}`;
    case 'SELL_CEILING':
      return `sell fees total ${violation.total} exceeds ceiling ${violation.ceiling}`;
    case 'BUY_CEILING':
      return `buy fee ${violation.value} exceeds ceiling ${violation.ceiling}`;
  }
}

/**
 * Fees for one transfer. Buys pay only the liquidity fee; wallet-to-wallet
 * transfers pay nothing. A zero rate contributes nothing.
 */
export function calculateTransferFees(amount: bigint, side: TransferSide, rates: FeeRates): TransferFees {
  let royaltyFee = 0n;
  let liquidityFee = 0n;

  if (side === 'sell') {
    if (rates.sellRoyaltyBp > 0) royaltyFee = portionOf(amount, rates.sellRoyaltyBp);
    if (rates.sellLiquidityBp > 0) liquidityFee = portionOf(amount, rates.sellLiquidityBp);
  } else if (side === 'buy') {
    if (rates.buyLiquidityBp > 0) liquidityFee = portionOf(amount, rates.buyLiquidityBp);
  }

  const totalFee = royaltyFee + liquidityFee;
  return { royaltyFee, liquidityFee, totalFee, netAmount: amount - totalFee };
}

export function noFees(amount: bigint): TransferFees {
  return { royaltyFee: 0n, liquidityFee: 0n, totalFee: 0n, netAmount: amount };
}

/**
 * Splits the liquidity pool: the floor half is swapped, the remainder is
 * deposited. The two always sum to `pool`.
 */
export function splitLiquidity(pool: bigint): { swapAmount: bigint; depositAmount: bigint } {
  const swapAmount = pool / 2n;
  return { swapAmount, depositAmount: pool - swapAmount };
}

/** amount * (10000 - bps) / 10000 */
export function applySlippage(amount: bigint, slippageBps: number): bigint {
  if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > 10_000) {
    throw new RangeError(`slippageBps out of range: ${slippageBps}`);
  }
  return (amount * (FEE_CONFIG.BPS_SCALE - BigInt(slippageBps))) / FEE_CONFIG.BPS_SCALE;
}

/**
 * Format a rate for display, e.g. 50 -> "5%", 25 -> "2.5%".
 */
export function formatFeeRate(rate: number): string {
  if (rate === 0) return 'Free';
  return `${formatDecimalFromRatio({ numerator: BigInt(rate), denominator: 10n, decimals: 1 })}%`;
}
