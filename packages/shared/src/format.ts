export function formatDecimalFromRatio(input: {
  numerator: bigint;
  denominator: bigint;
  decimals: number;
}): string {
  if (input.denominator === 0n) throw new RangeError('denominator must be non-zero');
  const scale = 10n ** BigInt(input.decimals);
  const value = (input.numerator * scale) / input.denominator;
  const intPart = value / scale;
  const fracPart = value % scale;
  const frac = fracPart
    .toString()
    .padStart(input.decimals, '0')
    .replace(/0+$/, '');
  return frac.length === 0 ? intPart.toString() : `${intPart.toString()}.${frac}`;
}

/** Short form for log lines, e.g. `0x1234…abcd`. */
export function shortAddress(address: string): string {
  if (address.length <= 12) return address;
  return `${address.slice(0, 6)}…${address.slice(-4)}`;
}
