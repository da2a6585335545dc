import type { Address } from 'viem';

import type { TransferSide } from '@tollgate/fees';
import type { FeeRates } from '@tollgate/shared';

export type Role = 'ADMIN_ROLE' | 'MINTER_ROLE';

export const ROLES = {
  /** Every tunable and both manual conversions */
  ADMIN: 'ADMIN_ROLE',
  /** Supply changes */
  MINTER: 'MINTER_ROLE',
} as const satisfies Record<string, Role>;

/**
 * Balance bookkeeping of the token. Standard fungible-token semantics; the
 * engine only ever calls it with amounts it has already validated.
 */
export interface BaseLedger {
  balanceOf(account: Address): Promise<bigint>;
  totalSupply(): Promise<bigint>;
  settle(from: Address, to: Address, amount: bigint): Promise<void>;
  mint(to: Address, amount: bigint): Promise<void>;
  burn(from: Address, amount: bigint): Promise<void>;
}

export interface Authorizer {
  hasRole(role: Role, account: Address): boolean | Promise<boolean>;
}

export type AccountFlags = {
  isFeeExempt: boolean;
  isMarketPair: boolean;
  isDenied: boolean;
};

export type PoolKind = 'royalty' | 'liquidity';

/** At most one conversion runs at a time; `idle` when none does. */
export type ConversionState = 'idle' | PoolKind;

export type ConversionTrigger = 'auto' | 'manual';

export type Pools = {
  royaltyPool: bigint;
  liquidityPool: bigint;
};

export type EngineSettingsState = {
  swapEnabled: boolean;
  minRoyaltyToSwap: bigint;
  minLiquidityToSwap: bigint;
  feeRecipient: Address;
  liquidityReceiver: Address;
  swapSlippageBps: number;
  depositSlippageBps: number;
  deadlineSeconds: number;
};

export type ConversionResult = {
  pool: PoolKind;
  trigger: ConversionTrigger;
  tokensSwapped: bigint;
  referenceReceived: bigint;
  /** Liquidity conversions only; zero for royalty */
  tokensDeposited: bigint;
  referenceDeposited: bigint;
  /** Fee recipient (royalty) or liquidity receiver */
  beneficiary: Address;
};

export type TransferReceipt = {
  side: TransferSide;
  taxed: boolean;
  royaltyFee: bigint;
  liquidityFee: bigint;
  totalFee: bigint;
  netAmount: bigint;
  conversion: ConversionResult | null;
};

export type EngineEvent =
  | { type: 'Transfer'; from: Address; to: Address; amount: bigint }
  | { type: 'FeesAccrued'; from: Address; to: Address; side: TransferSide; royaltyFee: bigint; liquidityFee: bigint }
  | { type: 'ConversionStarted'; pool: PoolKind; trigger: ConversionTrigger; amount: bigint }
  | ({ type: 'ConversionFinished' } & ConversionResult)
  | { type: 'ManualConversion'; pool: PoolKind; caller: Address }
  | { type: 'FeeExemptionChanged'; account: Address; exempt: boolean }
  | { type: 'DenyListChanged'; account: Address; denied: boolean }
  | { type: 'FeeRatesChanged'; previous: FeeRates; next: FeeRates }
  | {
      type: 'SwapThresholdsChanged';
      previous: { minRoyaltyToSwap: bigint; minLiquidityToSwap: bigint };
      next: { minRoyaltyToSwap: bigint; minLiquidityToSwap: bigint };
    }
  | { type: 'FeeRecipientChanged'; previous: Address; next: Address }
  | { type: 'LiquidityReceiverChanged'; previous: Address; next: Address }
  | { type: 'MarketPairChanged'; account: Address; isMarketPair: boolean }
  | { type: 'CanonicalPairMigrated'; previous: Address; next: Address; caller: Address }
  | { type: 'SwapEnabledChanged'; enabled: boolean }
  | {
      type: 'SlippageChanged';
      previous: { swapSlippageBps: number; depositSlippageBps: number };
      next: { swapSlippageBps: number; depositSlippageBps: number };
    };

export type EngineEventType = EngineEvent['type'];
