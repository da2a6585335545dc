import { getAddress, isAddress, zeroAddress, type Address } from 'viem';

export type EngineErrorCode =
  // precondition
  | 'ZERO_ADDRESS'
  | 'INVALID_ADDRESS'
  | 'INVALID_AMOUNT'
  | 'DENIED'
  | 'UNAUTHORIZED'
  | 'INSUFFICIENT_BALANCE'
  | 'PROTECTED_ACCOUNT'
  | 'INVALID_SETTING'
  // invariant
  | 'FEE_CEILING_EXCEEDED'
  | 'INSUFFICIENT_POOL'
  | 'CUSTODY_SHORTFALL'
  | 'CONVERSION_IN_PROGRESS'
  // external
  | 'NO_LIQUIDITY'
  | 'SLIPPAGE';

export type EngineErrorKind = 'precondition' | 'invariant' | 'external';

const KIND_BY_CODE: Record<EngineErrorCode, EngineErrorKind> = {
  ZERO_ADDRESS: 'precondition',
  INVALID_ADDRESS: 'precondition',
  INVALID_AMOUNT: 'precondition',
  DENIED: 'precondition',
  UNAUTHORIZED: 'precondition',
  INSUFFICIENT_BALANCE: 'precondition',
  PROTECTED_ACCOUNT: 'precondition',
  INVALID_SETTING: 'precondition',
  FEE_CEILING_EXCEEDED: 'invariant',
  INSUFFICIENT_POOL: 'invariant',
  CUSTODY_SHORTFALL: 'invariant',
  CONVERSION_IN_PROGRESS: 'invariant',
  NO_LIQUIDITY: 'external',
  SLIPPAGE: 'external',
};

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly kind: EngineErrorKind;
  public readonly details?: Record<string, unknown>;

  constructor(input: { code: EngineErrorCode; message: string; details?: Record<string, unknown>; cause?: unknown }) {
    super(input.message, { cause: input.cause });
    this.name = 'EngineError';
    this.code = input.code;
    this.kind = KIND_BY_CODE[input.code];
    this.details = input.details;
  }
}

/**
 * Validates a caller-supplied address and returns its checksummed form.
 * The zero address is rejected unless `allowZero` is set.
 */
export function requireAccount(value: string, label: string, allowZero = false): Address {
  if (!isAddress(value, { strict: false })) {
    throw new EngineError({ code: 'INVALID_ADDRESS', message: `${label} is not an address: ${value}` });
  }
  const account = getAddress(value);
  if (!allowZero && account === zeroAddress) {
    throw new EngineError({ code: 'ZERO_ADDRESS', message: `${label} must not be the zero address` });
  }
  return account;
}

export function requirePositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new EngineError({ code: 'INVALID_AMOUNT', message: `${label} must be positive, got ${amount}` });
  }
}
