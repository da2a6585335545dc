import type { Address } from 'viem';

import { MemoryExchange, MemoryNativeAsset } from '@tollgate/adapters';
import type { FeeRates } from '@tollgate/shared';

import { createLogger } from '../src/obs/logger';
import { MemoryLedger } from '../src/memoryLedger';
import { MemoryRoleRegistry } from '../src/roles';
import { TaxedToken, type TaxedTokenOptions } from '../src/token';
import type { EngineEvent } from '../src/types';

export const TOKEN: Address = '0x1000000000000000000000000000000000000001';
export const REFERENCE: Address = '0x2000000000000000000000000000000000000002';
export const ADMIN: Address = '0x3000000000000000000000000000000000000003';
export const FEE_RECIPIENT: Address = '0x4000000000000000000000000000000000000004';
export const SELLER: Address = '0x5000000000000000000000000000000000000005';
export const BUYER: Address = '0x6000000000000000000000000000000000000006';
export const LP_PROVIDER: Address = '0x7000000000000000000000000000000000000007';
export const ATTACKER: Address = '0x8000000000000000000000000000000000000008';
export const OTHER: Address = '0x9000000000000000000000000000000000000009';

export const NOW = 1_700_000_000;
export const DEADLINE = BigInt(NOW + 60);
export const NEVER = 1_000_000_000n;

export type SetupOptions = {
  rates?: FeeRates;
  thresholds?: TaxedTokenOptions['thresholds'];
  conversion?: Partial<TaxedTokenOptions['conversion']>;
  /** Seed the pair with 100k/100k; default true */
  seedPair?: boolean;
  /** Tokens handed to SELLER from the provider's supply */
  sellerBalance?: bigint;
};

/**
 * A token on an in-memory exchange. LP_PROVIDER is fee-exempt, holds the
 * initial supply and seeds the pair; ADMIN holds both roles.
 */
export async function setupToken(options: SetupOptions = {}) {
  const referenceAsset = new MemoryNativeAsset(REFERENCE);
  const exchange = new MemoryExchange({ referenceAsset, now: () => NOW });
  const ledger = new MemoryLedger();
  const roles = new MemoryRoleRegistry({ ADMIN_ROLE: [ADMIN], MINTER_ROLE: [ADMIN] });

  const token = await TaxedToken.create({
    address: TOKEN,
    ledger,
    authorizer: roles,
    exchange,
    referenceAsset,
    rates: options.rates ?? { sellRoyaltyBp: 50, sellLiquidityBp: 30, buyLiquidityBp: 20 },
    thresholds: options.thresholds ?? { minRoyaltyToSwap: NEVER, minLiquidityToSwap: NEVER },
    conversion: { feeRecipient: FEE_RECIPIENT, ...options.conversion },
    feeExempt: [LP_PROVIDER],
    initialSupply: { to: LP_PROVIDER, amount: 1_000_000n },
    logger: createLogger({ environment: 'test' }),
    now: () => NOW,
  });
  exchange.listToken(token);
  const pair = token.canonicalPair;

  if (options.seedPair ?? true) {
    referenceAsset.deposit(LP_PROVIDER, 100_000n);
    await exchange.addLiquidity({
      account: LP_PROVIDER,
      token: TOKEN,
      tokenAmount: 100_000n,
      referenceAmount: 100_000n,
      minToken: 0n,
      minReference: 0n,
      to: LP_PROVIDER,
      deadline: DEADLINE,
    });
  }

  const sellerBalance = options.sellerBalance ?? 10_000n;
  if (sellerBalance > 0n) {
    await token.transfer(LP_PROVIDER, SELLER, sellerBalance);
  }

  const events: EngineEvent[] = [];
  token.onEvent((event) => events.push(event));

  /** Sells through the exchange, the way a trader would. */
  const sell = (account: Address, amountIn: bigint) =>
    exchange.swapExactTokensForReference({
      account,
      amountIn,
      minAmountOut: 0n,
      path: [TOKEN, REFERENCE],
      to: account,
      deadline: DEADLINE,
    });

  return { token, ledger, roles, exchange, referenceAsset, pair, events, sell };
}

export type TokenEnv = Awaited<ReturnType<typeof setupToken>>;
