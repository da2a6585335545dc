import {
  decodeFunctionResult,
  encodeFunctionData,
  erc20Abi,
  isAddressEqual,
  zeroAddress,
  type Address,
  type Hex,
} from 'viem';

import { UNISWAP_V2_FACTORY_ABI, UNISWAP_V2_PAIR_ABI, UNISWAP_V2_ROUTER_ABI } from './abi';
import { ExchangeError, mapUnknownError } from './errors';
import type { JsonRpcClient } from './rpc';
import type { BuiltTx, DepositParams, Exchange, PairReserves, SwapParams, TxSender } from './types';

const VENUE = 'uniswap-v2';

export type UniswapV2ExchangeConfig = {
  rpc: JsonRpcClient;
  sender: TxSender;
  routerAddress: Address;
  factoryAddress: Address;
};

/**
 * Live exchange over a Uniswap V2 style router. Reads go through eth_call;
 * writes (approve, swap, deposit) are submitted by the injected TxSender.
 */
export class UniswapV2Exchange implements Exchange {
  private readonly rpc: JsonRpcClient;
  private readonly sender: TxSender;
  private readonly routerAddress: Address;
  private readonly factoryAddress: Address;

  constructor(config: UniswapV2ExchangeConfig) {
    this.rpc = config.rpc;
    this.sender = config.sender;
    this.routerAddress = config.routerAddress;
    this.factoryAddress = config.factoryAddress;
  }

  async getPair(token: Address, reference: Address): Promise<Address | null> {
    const result = await this.rpc.ethCall({
      to: this.factoryAddress,
      data: encodeFunctionData({ abi: UNISWAP_V2_FACTORY_ABI, functionName: 'getPair', args: [token, reference] }),
    });
    const pair = decodeFunctionResult({ abi: UNISWAP_V2_FACTORY_ABI, functionName: 'getPair', data: result });
    return isAddressEqual(pair, zeroAddress) ? null : pair;
  }

  async createPair(token: Address, reference: Address): Promise<Address> {
    const existing = await this.getPair(token, reference);
    if (existing) return existing;

    await this.send({
      from: this.sender.account,
      to: this.factoryAddress,
      data: encodeFunctionData({ abi: UNISWAP_V2_FACTORY_ABI, functionName: 'createPair', args: [token, reference] }),
      value: 0n,
    });

    const created = await this.getPair(token, reference);
    if (!created) {
      throw new ExchangeError({ code: 'UNKNOWN_PAIR', venue: VENUE, message: 'pair not found after createPair' });
    }
    return created;
  }

  async getReserves(pair: Address, token: Address): Promise<PairReserves> {
    const [reservesData, token0Data] = await Promise.all([
      this.rpc.ethCall({
        to: pair,
        data: encodeFunctionData({ abi: UNISWAP_V2_PAIR_ABI, functionName: 'getReserves' }),
      }),
      this.rpc.ethCall({
        to: pair,
        data: encodeFunctionData({ abi: UNISWAP_V2_PAIR_ABI, functionName: 'token0' }),
      }),
    ]);

    const [reserve0, reserve1] = decodeFunctionResult({
      abi: UNISWAP_V2_PAIR_ABI,
      functionName: 'getReserves',
      data: reservesData,
    });
    const token0 = decodeFunctionResult({ abi: UNISWAP_V2_PAIR_ABI, functionName: 'token0', data: token0Data });

    return isAddressEqual(token0, token)
      ? { reserveToken: reserve0, reserveReference: reserve1 }
      : { reserveToken: reserve1, reserveReference: reserve0 };
  }

  async swapExactTokensForReference(params: SwapParams): Promise<void> {
    const [token] = params.path;
    await this.approve(params.account, token, params.amountIn);
    await this.send({
      from: params.account,
      to: this.routerAddress,
      data: encodeFunctionData({
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: 'swapExactTokensForETHSupportingFeeOnTransferTokens',
        args: [params.amountIn, params.minAmountOut, params.path, params.to, params.deadline],
      }),
      value: 0n,
    });
  }

  async addLiquidity(params: DepositParams): Promise<void> {
    await this.approve(params.account, params.token, params.tokenAmount);
    await this.send({
      from: params.account,
      to: this.routerAddress,
      data: encodeFunctionData({
        abi: UNISWAP_V2_ROUTER_ABI,
        functionName: 'addLiquidityETH',
        args: [params.token, params.tokenAmount, params.minToken, params.minReference, params.to, params.deadline],
      }),
      value: params.referenceAmount,
    });
  }

  private async approve(owner: Address, token: Address, amount: bigint): Promise<void> {
    await this.send({
      from: owner,
      to: token,
      data: encodeFunctionData({ abi: erc20Abi, functionName: 'approve', args: [this.routerAddress, amount] }),
      value: 0n,
    });
  }

  private async send(tx: BuiltTx): Promise<Hex> {
    if (!isAddressEqual(tx.from, this.sender.account)) {
      throw new ExchangeError({
        code: 'REJECTED',
        venue: VENUE,
        message: `sender ${this.sender.account} cannot act for ${tx.from}`,
      });
    }

    try {
      return await this.sender.sendTransaction(tx);
    } catch (err) {
      throw mapUnknownError(VENUE, err);
    }
  }
}
