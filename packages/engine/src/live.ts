import { isAddressEqual } from 'viem';

import { JsonRpcClient, JsonRpcNativeAsset, UniswapV2Exchange, type TxSender } from '@tollgate/adapters';
import type { AppConfig } from '@tollgate/config';

import { EngineError } from './errors';
import { initLogger, type AppLogger } from './obs/logger';
import { TaxedToken } from './token';
import type { Authorizer, BaseLedger } from './types';

export type LiveTokenDeps = {
  ledger: BaseLedger;
  authorizer: Authorizer;
  /** Signs for the token's own account */
  sender: TxSender;
  logger?: AppLogger;
};

/**
 * Wires a token against a live chain: JSON-RPC reads, a V2 router and factory
 * for conversions, and the native coin as the reference asset.
 */
export async function createLiveToken(config: AppConfig, deps: LiveTokenDeps): Promise<TaxedToken> {
  if (!isAddressEqual(deps.sender.account, config.token.address)) {
    throw new EngineError({
      code: 'INVALID_SETTING',
      message: `sender ${deps.sender.account} does not sign for token ${config.token.address}`,
    });
  }

  const logger = deps.logger ?? initLogger({ environment: config.nodeEnv, level: config.logLevel });
  const rpc = new JsonRpcClient({
    rpcUrl: config.rpc.url,
    timeoutMs: config.rpc.timeoutMs,
    retries: config.rpc.retries,
  });
  const exchange = new UniswapV2Exchange({
    rpc,
    sender: deps.sender,
    routerAddress: config.exchange.router,
    factoryAddress: config.exchange.factory,
  });
  const referenceAsset = new JsonRpcNativeAsset({
    wrappedAddress: config.exchange.referenceAsset,
    rpc,
    sender: deps.sender,
  });

  return TaxedToken.create({
    address: config.token.address,
    ledger: deps.ledger,
    authorizer: deps.authorizer,
    exchange,
    referenceAsset,
    rates: config.fees,
    thresholds: {
      minRoyaltyToSwap: config.conversion.minRoyaltyToSwap,
      minLiquidityToSwap: config.conversion.minLiquidityToSwap,
    },
    conversion: {
      feeRecipient: config.conversion.feeRecipient,
      liquidityReceiver: config.conversion.liquidityReceiver ?? undefined,
      swapEnabled: config.conversion.swapEnabled,
      swapSlippageBps: config.conversion.swapSlippageBps,
      depositSlippageBps: config.conversion.depositSlippageBps,
      deadlineSeconds: config.conversion.deadlineSeconds,
    },
    feeExempt: config.token.feeExempt,
    logger,
  });
}
