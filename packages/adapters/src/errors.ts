export type ExchangeErrorCode =
  | 'TIMEOUT'
  | 'NETWORK'
  | 'RPC'
  | 'INSUFFICIENT_OUTPUT'
  | 'INSUFFICIENT_LIQUIDITY'
  | 'INSUFFICIENT_BALANCE'
  | 'EXPIRED'
  | 'UNKNOWN_PAIR'
  | 'REJECTED'
  | 'UNKNOWN';

export class ExchangeError extends Error {
  public readonly code: ExchangeErrorCode;
  public readonly venue: string;

  constructor(input: { code: ExchangeErrorCode; venue: string; message: string; cause?: unknown }) {
    super(input.message, { cause: input.cause });
    this.name = 'ExchangeError';
    this.code = input.code;
    this.venue = input.venue;
  }
}

export function mapUnknownError(venue: string, err: unknown): ExchangeError {
  if (err instanceof ExchangeError) return err;

  if (err instanceof Error) {
    const message = err.message || 'unknown_error';
    const lower = message.toLowerCase();

    const code: ExchangeErrorCode =
      lower.includes('timeout') || lower.includes('abort')
        ? 'TIMEOUT'
        : lower.includes('fetch failed') || lower.includes('network')
          ? 'NETWORK'
          : 'UNKNOWN';

    return new ExchangeError({ code, venue, message, cause: err });
  }

  return new ExchangeError({ code: 'UNKNOWN', venue, message: 'unknown_error', cause: err });
}
