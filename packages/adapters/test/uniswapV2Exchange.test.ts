import { afterEach, describe, expect, it, vi } from 'vitest';

import { decodeFunctionData, encodeFunctionResult, erc20Abi, type Address, type Hex } from 'viem';

import { UNISWAP_V2_FACTORY_ABI, UNISWAP_V2_PAIR_ABI, UNISWAP_V2_ROUTER_ABI } from '../src/abi';
import { JsonRpcNativeAsset } from '../src/nativeAsset';
import { JsonRpcClient } from '../src/rpc';
import type { BuiltTx, TxSender } from '../src/types';
import { UniswapV2Exchange } from '../src/uniswapV2Exchange';

const ROUTER: Address = '0x1111111111111111111111111111111111111111';
const FACTORY: Address = '0x2222222222222222222222222222222222222222';
const TOKEN: Address = '0x3333333333333333333333333333333333333333';
const WRAPPED: Address = '0x4444444444444444444444444444444444444444';
const PAIR: Address = '0x5555555555555555555555555555555555555555';
const ENGINE: Address = '0x6666666666666666666666666666666666666666';
const TREASURY: Address = '0x7777777777777777777777777777777777777777';

type RpcBody = { method: string; params: [{ to: string; data: Hex }, string] };

function stubRpc(handler: (body: RpcBody) => unknown) {
  const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
    const body = JSON.parse(String(init?.body ?? '{}')) as RpcBody;
    const payload = handler(body);
    return {
      async json() {
        return payload;
      },
    } as unknown as Response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function recordingSender(): TxSender & { sent: BuiltTx[] } {
  const sent: BuiltTx[] = [];
  return {
    account: ENGINE,
    sent,
    sendTransaction: vi.fn(async (tx: BuiltTx): Promise<Hex> => {
      sent.push(tx);
      return '0xabc';
    }),
  };
}

function exchangeWith(sender: TxSender) {
  const rpc = new JsonRpcClient({ rpcUrl: 'https://rpc.example.invalid', timeoutMs: 1_000, retries: 0 });
  return new UniswapV2Exchange({ rpc, sender, routerAddress: ROUTER, factoryAddress: FACTORY });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('UniswapV2Exchange', () => {
  it('returns an existing pair without sending a transaction', async () => {
    stubRpc((body) => {
      expect(body.method).toBe('eth_call');
      expect(body.params[0].to).toBe(FACTORY);
      return {
        jsonrpc: '2.0',
        id: 1,
        result: encodeFunctionResult({ abi: UNISWAP_V2_FACTORY_ABI, functionName: 'getPair', result: PAIR }),
      };
    });
    const sender = recordingSender();

    await expect(exchangeWith(sender).createPair(TOKEN, WRAPPED)).resolves.toBe(PAIR);
    expect(sender.sent).toHaveLength(0);
  });

  it('reports a missing pair as null', async () => {
    stubRpc(() => ({
      jsonrpc: '2.0',
      id: 1,
      result: encodeFunctionResult({
        abi: UNISWAP_V2_FACTORY_ABI,
        functionName: 'getPair',
        result: '0x0000000000000000000000000000000000000000',
      }),
    }));

    await expect(exchangeWith(recordingSender()).getPair(TOKEN, WRAPPED)).resolves.toBeNull();
  });

  it('orients reserves from the token side', async () => {
    stubRpc((body) => {
      const { functionName } = decodeFunctionData({ abi: UNISWAP_V2_PAIR_ABI, data: body.params[0].data });
      const result =
        functionName === 'token0'
          ? encodeFunctionResult({ abi: UNISWAP_V2_PAIR_ABI, functionName: 'token0', result: WRAPPED })
          : encodeFunctionResult({ abi: UNISWAP_V2_PAIR_ABI, functionName: 'getReserves', result: [7_000n, 3_000n, 0] });
      return { jsonrpc: '2.0', id: 1, result };
    });

    await expect(exchangeWith(recordingSender()).getReserves(PAIR, TOKEN)).resolves.toEqual({
      reserveToken: 3_000n,
      reserveReference: 7_000n,
    });
  });

  it('approves the router and swaps with the minimum output guard', async () => {
    const sender = recordingSender();

    await exchangeWith(sender).swapExactTokensForReference({
      account: ENGINE,
      amountIn: 500n,
      minAmountOut: 404n,
      path: [TOKEN, WRAPPED],
      to: ENGINE,
      deadline: 1_700_000_300n,
    });

    expect(sender.sent).toHaveLength(2);
    const [approval, swap] = sender.sent;

    expect(approval?.to).toBe(TOKEN);
    expect(decodeFunctionData({ abi: erc20Abi, data: approval?.data ?? '0x' }).args).toEqual([ROUTER, 500n]);

    expect(swap?.to).toBe(ROUTER);
    const decoded = decodeFunctionData({ abi: UNISWAP_V2_ROUTER_ABI, data: swap?.data ?? '0x' });
    expect(decoded.functionName).toBe('swapExactTokensForETHSupportingFeeOnTransferTokens');
    expect(decoded.args).toEqual([500n, 404n, [TOKEN, WRAPPED], ENGINE, 1_700_000_300n]);
  });

  it('deposits liquidity with the reference amount as value', async () => {
    const sender = recordingSender();

    await exchangeWith(sender).addLiquidity({
      account: ENGINE,
      token: TOKEN,
      tokenAmount: 500n,
      referenceAmount: 417n,
      minToken: 0n,
      minReference: 0n,
      to: ENGINE,
      deadline: 1_700_000_300n,
    });

    const deposit = sender.sent[1];
    expect(deposit?.value).toBe(417n);
    const decoded = decodeFunctionData({ abi: UNISWAP_V2_ROUTER_ABI, data: deposit?.data ?? '0x' });
    expect(decoded.functionName).toBe('addLiquidityETH');
    expect(decoded.args).toEqual([TOKEN, 500n, 0n, 0n, ENGINE, 1_700_000_300n]);
  });

  it('refuses to act for an account the sender does not control', async () => {
    const swap = exchangeWith(recordingSender()).swapExactTokensForReference({
      account: TREASURY,
      amountIn: 1n,
      minAmountOut: 0n,
      path: [TOKEN, WRAPPED],
      to: TREASURY,
      deadline: 1n,
    });

    await expect(swap).rejects.toMatchObject({ name: 'ExchangeError', code: 'REJECTED' });
  });

  it('surfaces JSON-RPC errors as ExchangeError', async () => {
    stubRpc(() => ({ jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'execution reverted' } }));

    await expect(exchangeWith(recordingSender()).getPair(TOKEN, WRAPPED)).rejects.toMatchObject({
      code: 'RPC',
      message: 'eth_call: execution reverted',
    });
  });
});

describe('JsonRpcNativeAsset', () => {
  it('reads balances with eth_getBalance', async () => {
    const fetchMock = stubRpc((body) => {
      expect(body.method).toBe('eth_getBalance');
      return { jsonrpc: '2.0', id: 1, result: '0x3e8' };
    });
    const sender = recordingSender();
    const rpc = new JsonRpcClient({ rpcUrl: 'https://rpc.example.invalid', retries: 0 });
    const asset = new JsonRpcNativeAsset({ wrappedAddress: WRAPPED, rpc, sender });

    await expect(asset.balanceOf(ENGINE)).resolves.toBe(1000n);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('sends value transfers from the engine account', async () => {
    const sender = recordingSender();
    const rpc = new JsonRpcClient({ rpcUrl: 'https://rpc.example.invalid', retries: 0 });
    const asset = new JsonRpcNativeAsset({ wrappedAddress: WRAPPED, rpc, sender });

    await asset.transfer(ENGINE, TREASURY, 49n);

    expect(sender.sent).toEqual([{ from: ENGINE, to: TREASURY, data: '0x', value: 49n }]);
  });
});
