/**
 * Fee constants.
 *
 * Rates are parts-per-thousand numerators over DENOMINATOR:
 * - 50 = 5%
 * - 100 = 10% (the ceiling for everything charged on a single sell)
 */
export const FEE_CONFIG = {
  /** Denominator for every fee rate */
  DENOMINATOR: 1_000n,

  /** Ceiling on sellRoyaltyBp + sellLiquidityBp */
  MAX_SELL_FEE: 100,

  /** Ceiling on buyLiquidityBp */
  MAX_BUY_FEE: 100,

  /** Basis-point scale used for slippage tolerances */
  BPS_SCALE: 10_000n,
} as const;

export type FeeConfig = typeof FEE_CONFIG;
