import type { Checkpointable } from '@tollgate/shared';

import type { PoolKind, Pools } from './types';

/**
 * Fees collected but not yet converted. The engine's token balance always
 * covers the sum of both pools.
 */
export class AccrualLedger implements Checkpointable {
  private royalty = 0n;
  private liquidity = 0n;

  get royaltyPool(): bigint {
    return this.royalty;
  }

  get liquidityPool(): bigint {
    return this.liquidity;
  }

  get total(): bigint {
    return this.royalty + this.liquidity;
  }

  snapshot(): Pools {
    return { royaltyPool: this.royalty, liquidityPool: this.liquidity };
  }

  credit(royaltyFee: bigint, liquidityFee: bigint): void {
    if (royaltyFee < 0n || liquidityFee < 0n) {
      throw new RangeError('accrued fees must be non-negative');
    }
    this.royalty += royaltyFee;
    this.liquidity += liquidityFee;
  }

  /** Zeroes a pool and returns what it held. */
  clear(pool: PoolKind): bigint {
    if (pool === 'royalty') {
      const amount = this.royalty;
      this.royalty = 0n;
      return amount;
    }
    const amount = this.liquidity;
    this.liquidity = 0n;
    return amount;
  }

  checkpoint(): () => void {
    const { royalty, liquidity } = this;
    return () => {
      this.royalty = royalty;
      this.liquidity = liquidity;
    };
  }
}
