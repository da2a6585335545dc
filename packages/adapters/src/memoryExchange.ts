import { encodePacked, getAddress, isAddressEqual, keccak256, slice, type Address } from 'viem';

import { BalanceBook, type Checkpointable } from '@tollgate/shared';

import { DEFAULT_PAIR_FEE_BPS, getAmountOut, quote, sqrt } from './amm';
import { ExchangeError } from './errors';
import type { MemoryNativeAsset } from './nativeAsset';
import type { DepositParams, Exchange, PairReserves, SwapParams, TokenPort } from './types';

const VENUE = 'memory';

type MemoryPair = {
  address: Address;
  token: Address;
  reserveToken: bigint;
  reserveReference: bigint;
  totalShares: bigint;
  shares: BalanceBook;
};

/**
 * Callbacks run at the start of a swap or deposit, before any value moves.
 * They stand in for a counterparty that acts mid-conversion (front-running,
 * re-entrant calls back into the token).
 */
export type ExchangeHooks = {
  beforeSwap?: (params: SwapParams) => Promise<void> | void;
  beforeDeposit?: (params: DepositParams) => Promise<void> | void;
};

export type MemoryExchangeConfig = {
  referenceAsset: MemoryNativeAsset;
  feeBps?: number;
  /** Unix seconds, used for deadline checks */
  now?: () => number;
  hooks?: ExchangeHooks;
};

/**
 * Deterministic constant-product exchange. Tokens move through their own
 * `transfer` (so fee-on-transfer logic runs), and input is measured as the
 * pair's balance above its last synced reserve.
 */
export class MemoryExchange implements Exchange, Checkpointable {
  hooks: ExchangeHooks;

  private readonly referenceAsset: MemoryNativeAsset;
  private readonly feeBps: number;
  private readonly now: () => number;
  private readonly pairs = new Map<string, MemoryPair>();
  private readonly tokens = new Map<string, TokenPort>();

  constructor(config: MemoryExchangeConfig) {
    this.referenceAsset = config.referenceAsset;
    this.feeBps = config.feeBps ?? DEFAULT_PAIR_FEE_BPS;
    this.now = config.now ?? (() => Math.floor(Date.now() / 1000));
    this.hooks = config.hooks ?? {};
  }

  static pairAddressFor(token: Address, reference: Address): Address {
    const hash = keccak256(encodePacked(['address', 'address'], [token, reference]));
    return getAddress(slice(hash, 12));
  }

  /** Registers the token contract the exchange moves on swaps and deposits. */
  listToken(port: TokenPort): void {
    this.tokens.set(port.address.toLowerCase(), port);
  }

  async createPair(token: Address, reference: Address): Promise<Address> {
    this.requireReference(reference);
    const address = MemoryExchange.pairAddressFor(token, reference);
    if (!this.pairs.has(address.toLowerCase())) {
      this.pairs.set(address.toLowerCase(), {
        address,
        token,
        reserveToken: 0n,
        reserveReference: 0n,
        totalShares: 0n,
        shares: new BalanceBook(),
      });
    }
    return address;
  }

  async getPair(token: Address, reference: Address): Promise<Address | null> {
    const address = MemoryExchange.pairAddressFor(token, reference);
    return this.pairs.has(address.toLowerCase()) ? address : null;
  }

  async getReserves(pair: Address, token: Address): Promise<PairReserves> {
    const state = this.pairs.get(pair.toLowerCase());
    if (!state || !isAddressEqual(state.token, token)) {
      throw new ExchangeError({ code: 'UNKNOWN_PAIR', venue: VENUE, message: `no pair ${pair} for ${token}` });
    }
    return { reserveToken: state.reserveToken, reserveReference: state.reserveReference };
  }

  async swapExactTokensForReference(params: SwapParams): Promise<void> {
    await this.hooks.beforeSwap?.(params);
    this.requireDeadline(params.deadline);

    const [token, reference] = params.path;
    this.requireReference(reference);
    const pair = this.requirePairFor(token);
    const port = this.requireToken(token);

    await port.transfer(params.account, pair.address, params.amountIn);

    // Nested activity during the transfer may have moved the reserves; read them now.
    const amountIn = (await port.balanceOf(pair.address)) - pair.reserveToken;
    const amountOut = getAmountOut(amountIn, pair.reserveToken, pair.reserveReference, this.feeBps);
    if (amountOut === 0n) {
      throw new ExchangeError({ code: 'INSUFFICIENT_LIQUIDITY', venue: VENUE, message: 'swap output is zero' });
    }
    if (amountOut < params.minAmountOut) {
      throw new ExchangeError({
        code: 'INSUFFICIENT_OUTPUT',
        venue: VENUE,
        message: `output ${amountOut} below minimum ${params.minAmountOut}`,
      });
    }

    await this.referenceAsset.transfer(pair.address, params.to, amountOut);
    await this.sync(pair, port);
  }

  async addLiquidity(params: DepositParams): Promise<void> {
    await this.hooks.beforeDeposit?.(params);
    this.requireDeadline(params.deadline);

    const pair = this.requirePairFor(params.token);
    const port = this.requireToken(params.token);
    const { tokenAmount, referenceAmount } = this.depositAmounts(pair, params);

    await port.transfer(params.account, pair.address, tokenAmount);
    await this.referenceAsset.transfer(params.account, pair.address, referenceAmount);

    const tokenIn = (await port.balanceOf(pair.address)) - pair.reserveToken;
    const referenceIn = (await this.referenceAsset.balanceOf(pair.address)) - pair.reserveReference;

    let liquidity: bigint;
    if (pair.totalShares === 0n) {
      liquidity = sqrt(tokenIn * referenceIn);
    } else {
      const byToken = (tokenIn * pair.totalShares) / pair.reserveToken;
      const byReference = (referenceIn * pair.totalShares) / pair.reserveReference;
      liquidity = byToken < byReference ? byToken : byReference;
    }
    if (liquidity <= 0n) {
      throw new ExchangeError({ code: 'INSUFFICIENT_LIQUIDITY', venue: VENUE, message: 'deposit mints no shares' });
    }

    pair.shares.credit(params.to, liquidity);
    pair.totalShares += liquidity;
    await this.sync(pair, port);
  }

  sharesOf(pair: Address, account: Address): bigint {
    return this.pairs.get(pair.toLowerCase())?.shares.balanceOf(account) ?? 0n;
  }

  checkpoint(): () => void {
    const known = new Set(this.pairs.keys());
    // Pair objects are restored in place: an in-flight swap may still hold a reference.
    const saved = [...this.pairs.values()].map((pair) => ({
      pair,
      reserveToken: pair.reserveToken,
      reserveReference: pair.reserveReference,
      totalShares: pair.totalShares,
      restoreShares: pair.shares.checkpoint(),
    }));

    return () => {
      for (const key of [...this.pairs.keys()]) {
        if (!known.has(key)) this.pairs.delete(key);
      }
      for (const entry of saved) {
        entry.pair.reserveToken = entry.reserveToken;
        entry.pair.reserveReference = entry.reserveReference;
        entry.pair.totalShares = entry.totalShares;
        entry.restoreShares();
      }
    };
  }

  /** Uniswap-style optimal amounts: keep the pool ratio, never exceed what was offered. */
  private depositAmounts(pair: MemoryPair, params: DepositParams): { tokenAmount: bigint; referenceAmount: bigint } {
    if (pair.reserveToken === 0n && pair.reserveReference === 0n) {
      return { tokenAmount: params.tokenAmount, referenceAmount: params.referenceAmount };
    }

    const referenceOptimal = quote(params.tokenAmount, pair.reserveToken, pair.reserveReference);
    if (referenceOptimal <= params.referenceAmount) {
      if (referenceOptimal < params.minReference) {
        throw new ExchangeError({ code: 'INSUFFICIENT_OUTPUT', venue: VENUE, message: 'insufficient reference amount' });
      }
      return { tokenAmount: params.tokenAmount, referenceAmount: referenceOptimal };
    }

    const tokenOptimal = quote(params.referenceAmount, pair.reserveReference, pair.reserveToken);
    if (tokenOptimal < params.minToken) {
      throw new ExchangeError({ code: 'INSUFFICIENT_OUTPUT', venue: VENUE, message: 'insufficient token amount' });
    }
    return { tokenAmount: tokenOptimal, referenceAmount: params.referenceAmount };
  }

  private async sync(pair: MemoryPair, port: TokenPort): Promise<void> {
    pair.reserveToken = await port.balanceOf(pair.address);
    pair.reserveReference = await this.referenceAsset.balanceOf(pair.address);
  }

  private requireDeadline(deadline: bigint): void {
    if (BigInt(this.now()) > deadline) {
      throw new ExchangeError({ code: 'EXPIRED', venue: VENUE, message: `deadline ${deadline} has passed` });
    }
  }

  private requireReference(reference: Address): void {
    if (!isAddressEqual(reference, this.referenceAsset.address)) {
      throw new ExchangeError({ code: 'UNKNOWN_PAIR', venue: VENUE, message: `unsupported reference asset ${reference}` });
    }
  }

  private requirePairFor(token: Address): MemoryPair {
    const pair = this.pairs.get(MemoryExchange.pairAddressFor(token, this.referenceAsset.address).toLowerCase());
    if (!pair) {
      throw new ExchangeError({ code: 'UNKNOWN_PAIR', venue: VENUE, message: `no pair for ${token}` });
    }
    return pair;
  }

  private requireToken(token: Address): TokenPort {
    const port = this.tokens.get(token.toLowerCase());
    if (!port) {
      throw new ExchangeError({ code: 'UNKNOWN_PAIR', venue: VENUE, message: `token ${token} is not listed` });
    }
    return port;
  }
}
