import { isAddressEqual, type Address } from 'viem';

import { BalanceBook, type Checkpointable } from '@tollgate/shared';

import { ExchangeError, mapUnknownError } from './errors';
import type { JsonRpcClient } from './rpc';
import type { ReferenceAsset, TxSender } from './types';

export type JsonRpcNativeAssetConfig = {
  /** Wrapped-native token address, used as the swap path's last hop */
  wrappedAddress: Address;
  rpc: JsonRpcClient;
  sender: TxSender;
};

/** The chain's native coin, read with eth_getBalance and moved by plain value transfers. */
export class JsonRpcNativeAsset implements ReferenceAsset {
  readonly address: Address;
  private readonly rpc: JsonRpcClient;
  private readonly sender: TxSender;

  constructor(config: JsonRpcNativeAssetConfig) {
    this.address = config.wrappedAddress;
    this.rpc = config.rpc;
    this.sender = config.sender;
  }

  balanceOf(account: Address): Promise<bigint> {
    return this.rpc.getBalance(account);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    if (!isAddressEqual(from, this.sender.account)) {
      throw new ExchangeError({ code: 'REJECTED', venue: 'native', message: `cannot send from ${from}` });
    }
    try {
      await this.sender.sendTransaction({ from, to, data: '0x', value: amount });
    } catch (err) {
      throw mapUnknownError('native', err);
    }
  }
}

/** In-process native coin for tests and simulations. */
export class MemoryNativeAsset implements ReferenceAsset, Checkpointable {
  readonly address: Address;
  private readonly book = new BalanceBook();

  constructor(wrappedAddress: Address) {
    this.address = wrappedAddress;
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.book.balanceOf(account);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    const balance = this.book.balanceOf(from);
    if (amount < 0n || balance < amount) {
      throw new ExchangeError({
        code: 'INSUFFICIENT_BALANCE',
        venue: 'memory',
        message: `native transfer of ${amount} exceeds balance ${balance} of ${from}`,
      });
    }
    this.book.move(from, to, amount);
  }

  /** Credits native coin out of thin air (a faucet). */
  deposit(account: Address, amount: bigint): void {
    this.book.credit(account, amount);
  }

  checkpoint(): () => void {
    return this.book.checkpoint();
  }
}
