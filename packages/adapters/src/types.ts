import type { Address, Hex } from 'viem';

/** Reserves of a token/reference pair, oriented from the token's side. */
export type PairReserves = {
  reserveToken: bigint;
  reserveReference: bigint;
};

export type SwapParams = {
  /** Account whose tokens are sold */
  account: Address;
  amountIn: bigint;
  /** The swap fails when it would pay out less than this */
  minAmountOut: bigint;
  /** [token, reference asset] */
  path: readonly [Address, Address];
  /** Receiver of the reference asset */
  to: Address;
  /** Unix seconds */
  deadline: bigint;
};

export type DepositParams = {
  /** Account supplying both sides of the deposit */
  account: Address;
  token: Address;
  tokenAmount: bigint;
  referenceAmount: bigint;
  minToken: bigint;
  minReference: bigint;
  /** Receiver of the liquidity shares */
  to: Address;
  deadline: bigint;
};

/**
 * The decentralized exchange, as seen by the conversion engine.
 * Untrusted for value extraction: every swap carries a minimum output.
 */
export interface Exchange {
  /** Creates the pair if it does not exist yet and returns its address. */
  createPair(token: Address, reference: Address): Promise<Address>;
  getPair(token: Address, reference: Address): Promise<Address | null>;
  getReserves(pair: Address, token: Address): Promise<PairReserves>;
  swapExactTokensForReference(params: SwapParams): Promise<void>;
  addLiquidity(params: DepositParams): Promise<void>;
}

/** The asset conversions pay out in (the chain's native coin on a live network). */
export interface ReferenceAsset {
  readonly address: Address;
  balanceOf(account: Address): Promise<bigint>;
  transfer(from: Address, to: Address, amount: bigint): Promise<void>;
}

/** The taxed token as the in-memory exchange sees it. */
export interface TokenPort {
  readonly address: Address;
  balanceOf(account: Address): Promise<bigint>;
  transfer(from: Address, to: Address, amount: bigint): Promise<unknown>;
}

export type BuiltTx = {
  from: Address;
  to: Address;
  data: Hex;
  value: bigint;
};

/**
 * Signs and submits transactions for the engine's account. Resolves with the
 * transaction hash once the transaction is mined, rejects if it reverts.
 */
export interface TxSender {
  readonly account: Address;
  sendTransaction(tx: BuiltTx): Promise<Hex>;
}
