import { isHex, type Address, type Hex } from 'viem';
import { z } from 'zod';

import { withRetries } from '@tollgate/shared';

import { ExchangeError, mapUnknownError } from './errors';

const JsonRpcResponseSchema = z.union([
  z.object({ result: z.string() }),
  z.object({ error: z.object({ code: z.number(), message: z.string() }) }),
]);

export type JsonRpcClientConfig = {
  rpcUrl: string;
  timeoutMs?: number;
  /** Retries for read calls on timeouts and network errors */
  retries?: number;
};

function isTransientRpcError(err: unknown): boolean {
  return err instanceof ExchangeError && (err.code === 'TIMEOUT' || err.code === 'NETWORK');
}

/**
 * Minimal JSON-RPC reader: eth_call and eth_getBalance, with a per-call
 * timeout and retries for transient failures.
 */
export class JsonRpcClient {
  private readonly rpcUrl: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private nextId = 1;

  constructor(config: JsonRpcClientConfig) {
    this.rpcUrl = config.rpcUrl;
    this.timeoutMs = config.timeoutMs ?? 5_000;
    this.retries = config.retries ?? 2;
  }

  async ethCall(params: { to: Address; data: Hex }): Promise<Hex> {
    return this.request('eth_call', [{ to: params.to, data: params.data }, 'latest']);
  }

  async getBalance(account: Address): Promise<bigint> {
    return BigInt(await this.request('eth_getBalance', [account, 'latest']));
  }

  private request(method: string, params: unknown[]): Promise<Hex> {
    return withRetries(() => this.once(method, params), {
      maxRetries: this.retries,
      isRetryable: isTransientRpcError,
    });
  }

  private async once(method: string, params: unknown[]): Promise<Hex> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await fetch(this.rpcUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ jsonrpc: '2.0', id: this.nextId++, method, params }),
        signal: controller.signal,
      });

      const parsed = JsonRpcResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new ExchangeError({ code: 'RPC', venue: 'json-rpc', message: `${method}: malformed response` });
      }
      if ('error' in parsed.data) {
        throw new ExchangeError({ code: 'RPC', venue: 'json-rpc', message: `${method}: ${parsed.data.error.message}` });
      }

      const { result } = parsed.data;
      if (!isHex(result)) {
        throw new ExchangeError({ code: 'RPC', venue: 'json-rpc', message: `${method}: non-hex result` });
      }
      return result;
    } catch (err) {
      throw mapUnknownError('json-rpc', err);
    } finally {
      clearTimeout(timeout);
    }
  }
}
