import { isAddressEqual, type Address } from 'viem';

import type { Checkpointable } from '@tollgate/shared';

import { EngineError } from './errors';
import type { AccountFlags } from './types';

const NO_FLAGS: AccountFlags = { isFeeExempt: false, isMarketPair: false, isDenied: false };

/**
 * Per-account classification: fee exemption, market-pair membership and the
 * deny list. The canonical pair is always a market pair.
 */
export class AccountRegistry implements Checkpointable {
  private flags = new Map<string, AccountFlags>();
  private canonical: Address;

  constructor(canonicalPair: Address) {
    this.canonical = canonicalPair;
    this.patch(canonicalPair, { isMarketPair: true });
  }

  get canonicalPair(): Address {
    return this.canonical;
  }

  flagsOf(account: Address): AccountFlags {
    return { ...(this.flags.get(account.toLowerCase()) ?? NO_FLAGS) };
  }

  isFeeExempt(account: Address): boolean {
    return this.flagsOf(account).isFeeExempt;
  }

  isMarketPair(account: Address): boolean {
    return this.flagsOf(account).isMarketPair;
  }

  isDenied(account: Address): boolean {
    return this.flagsOf(account).isDenied;
  }

  setFeeExempt(account: Address, exempt: boolean): void {
    this.patch(account, { isFeeExempt: exempt });
  }

  setMarketPair(account: Address, isMarketPair: boolean): void {
    if (!isMarketPair && isAddressEqual(account, this.canonical)) {
      throw new EngineError({
        code: 'PROTECTED_ACCOUNT',
        message: `canonical pair ${account} cannot be unmarked; migrate it first`,
      });
    }
    this.patch(account, { isMarketPair });
  }

  setDenied(account: Address, denied: boolean): void {
    this.patch(account, { isDenied: denied });
  }

  /** Points the engine at a new pair. The old one stays a market pair. */
  migrateCanonicalPair(next: Address): Address {
    const previous = this.canonical;
    this.canonical = next;
    this.patch(next, { isMarketPair: true });
    return previous;
  }

  checkpoint(): () => void {
    const saved = new Map(this.flags);
    const canonical = this.canonical;
    return () => {
      this.flags = saved;
      this.canonical = canonical;
    };
  }

  private patch(account: Address, change: Partial<AccountFlags>): void {
    const key = account.toLowerCase();
    const current = this.flags.get(key) ?? NO_FLAGS;
    this.flags.set(key, {
      isFeeExempt: change.isFeeExempt ?? current.isFeeExempt,
      isMarketPair: change.isMarketPair ?? current.isMarketPair,
      isDenied: change.isDenied ?? current.isDenied,
    });
  }
}
