/**
 * Constant-product pair math (x * y = k with an input fee).
 */

/** Standard V2 pair fee: 0.3% */
export const DEFAULT_PAIR_FEE_BPS = 30;

export function getAmountOut(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: number = DEFAULT_PAIR_FEE_BPS,
): bigint {
  if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) return 0n;
  const amountInWithFee = amountIn * BigInt(10_000 - feeBps);
  const numerator = amountInWithFee * reserveOut;
  const denominator = reserveIn * 10_000n + amountInWithFee;
  return numerator / denominator;
}

/** Amount of B worth `amountA` at the current reserve ratio. */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
  if (reserveA <= 0n) return 0n;
  return (amountA * reserveB) / reserveA;
}

export function sqrt(value: bigint): bigint {
  if (value < 0n) throw new RangeError('square root of negative value');
  if (value < 2n) return value;
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}
