import type { Checkpointable } from './checkpoint';

/**
 * Case-insensitive map of account balances. Backs the in-memory ledgers.
 */
export class BalanceBook implements Checkpointable {
  private balances = new Map<string, bigint>();

  private key(account: string): string {
    return account.toLowerCase();
  }

  balanceOf(account: string): bigint {
    return this.balances.get(this.key(account)) ?? 0n;
  }

  total(): bigint {
    let sum = 0n;
    for (const value of this.balances.values()) sum += value;
    return sum;
  }

  credit(account: string, amount: bigint): void {
    if (amount < 0n) throw new RangeError('credit amount must be non-negative');
    this.balances.set(this.key(account), this.balanceOf(account) + amount);
  }

  debit(account: string, amount: bigint): void {
    if (amount < 0n) throw new RangeError('debit amount must be non-negative');
    const current = this.balanceOf(account);
    if (current < amount) {
      throw new RangeError(`insufficient balance: ${account} has ${current}, needs ${amount}`);
    }
    this.balances.set(this.key(account), current - amount);
  }

  move(from: string, to: string, amount: bigint): void {
    this.debit(from, amount);
    this.credit(to, amount);
  }

  checkpoint(): () => void {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }
}
