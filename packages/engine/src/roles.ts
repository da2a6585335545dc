import type { Address } from 'viem';

import type { Authorizer, Role } from './types';

/** Role assignments kept in memory. */
export class MemoryRoleRegistry implements Authorizer {
  private readonly members = new Map<Role, Set<string>>();

  constructor(initial: Partial<Record<Role, readonly Address[]>> = {}) {
    for (const [role, accounts] of Object.entries(initial)) {
      if (!isRole(role)) continue;
      for (const account of accounts ?? []) this.grantRole(role, account);
    }
  }

  hasRole(role: Role, account: Address): boolean {
    return this.members.get(role)?.has(account.toLowerCase()) ?? false;
  }

  grantRole(role: Role, account: Address): void {
    const set = this.members.get(role) ?? new Set<string>();
    set.add(account.toLowerCase());
    this.members.set(role, set);
  }

  revokeRole(role: Role, account: Address): void {
    this.members.get(role)?.delete(account.toLowerCase());
  }
}

function isRole(value: string): value is Role {
  return value === 'ADMIN_ROLE' || value === 'MINTER_ROLE';
}
