import type { Address } from 'viem';

import { BalanceBook, type Checkpointable } from '@tollgate/shared';

import { EngineError } from './errors';
import type { BaseLedger } from './types';

/** In-process balances and supply. */
export class MemoryLedger implements BaseLedger, Checkpointable {
  private readonly book = new BalanceBook();

  async balanceOf(account: Address): Promise<bigint> {
    return this.book.balanceOf(account);
  }

  async totalSupply(): Promise<bigint> {
    return this.book.total();
  }

  async settle(from: Address, to: Address, amount: bigint): Promise<void> {
    this.requireFunds(from, amount);
    this.book.move(from, to, amount);
  }

  async mint(to: Address, amount: bigint): Promise<void> {
    this.book.credit(to, amount);
  }

  async burn(from: Address, amount: bigint): Promise<void> {
    this.requireFunds(from, amount);
    this.book.debit(from, amount);
  }

  checkpoint(): () => void {
    return this.book.checkpoint();
  }

  private requireFunds(account: Address, amount: bigint): void {
    const balance = this.book.balanceOf(account);
    if (balance < amount) {
      throw new EngineError({
        code: 'INSUFFICIENT_BALANCE',
        message: `${account} holds ${balance}, needs ${amount}`,
      });
    }
  }
}
