import { isAddressEqual, zeroAddress, type Address } from 'viem';
import type { z } from 'zod';

import {
  FeeRatesSchema,
  SlippageSchema,
  SwapThresholdsSchema,
  shortAddress,
  type FeeRates,
} from '@tollgate/shared';

import type { AccrualLedger } from './accrual';
import type { ConversionEngine } from './conversion';
import { EngineError, requireAccount, requirePositive } from './errors';
import type { ConversionGuard } from './guard';
import type { RequestJournal } from './journal';
import type { AppLogger } from './obs/logger';
import type { AccountRegistry } from './registry';
import type { FeeSchedule } from './schedule';
import type { EngineSettings } from './settings';
import { ROLES, type Authorizer, type BaseLedger, type ConversionResult, type Role } from './types';

const FeeRatesPatchSchema = FeeRatesSchema.partial().strict();
const ThresholdsPatchSchema = SwapThresholdsSchema.partial().strict();
const SlippagePatchSchema = SlippageSchema.partial().strict();

export type ThresholdsPatch = z.input<typeof ThresholdsPatchSchema>;
export type SlippagePatch = z.input<typeof SlippagePatchSchema>;

function parsePatch<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new EngineError({
      code: 'INVALID_SETTING',
      message: `invalid ${label}: ${where}${issue?.message ?? 'rejected'}`,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export type AdminSurfaceDeps = {
  address: Address;
  ledger: BaseLedger;
  authorizer: Authorizer;
  registry: AccountRegistry;
  schedule: FeeSchedule;
  accrual: AccrualLedger;
  settings: EngineSettings;
  guard: ConversionGuard;
  conversion: ConversionEngine;
  journal: RequestJournal;
  logger: AppLogger;
};

/**
 * Role-gated mutators. Each call is one atomic request that emits exactly
 * one event of its own (manual conversions add the conversion's events).
 */
export class AdminSurface {
  private readonly deps: AdminSurfaceDeps;
  private readonly logger: AppLogger;

  constructor(deps: AdminSurfaceDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'admin' });
  }

  setFeeRates(caller: Address, patch: Partial<FeeRates>): Promise<FeeRates> {
    return this.request('setFeeRates', caller, ROLES.ADMIN, async () => {
      const parsed = parsePatch(FeeRatesPatchSchema, patch, 'fee rates');
      const { previous, next } = this.deps.schedule.update(parsed);
      this.deps.journal.emit({ type: 'FeeRatesChanged', previous, next });
      return next;
    });
  }

  setSwapThresholds(caller: Address, patch: ThresholdsPatch): Promise<void> {
    return this.request('setSwapThresholds', caller, ROLES.ADMIN, async () => {
      const parsed = parsePatch(ThresholdsPatchSchema, patch, 'swap thresholds');
      const current = this.deps.settings.current;
      const next = {
        minRoyaltyToSwap: parsed.minRoyaltyToSwap ?? current.minRoyaltyToSwap,
        minLiquidityToSwap: parsed.minLiquidityToSwap ?? current.minLiquidityToSwap,
      };
      this.deps.settings.replace({ ...current, ...next });
      this.deps.journal.emit({
        type: 'SwapThresholdsChanged',
        previous: { minRoyaltyToSwap: current.minRoyaltyToSwap, minLiquidityToSwap: current.minLiquidityToSwap },
        next,
      });
    });
  }

  setFeeExempt(caller: Address, accountInput: string, exempt: boolean): Promise<void> {
    return this.request('setFeeExempt', caller, ROLES.ADMIN, async () => {
      const account = requireAccount(accountInput, 'account');
      // Conversion swaps and deposits are sized on untaxed transfers out of the engine.
      if (!exempt && isAddressEqual(account, this.deps.address)) {
        throw new EngineError({ code: 'PROTECTED_ACCOUNT', message: `${account} must stay fee-exempt` });
      }
      this.deps.registry.setFeeExempt(account, exempt);
      this.deps.journal.emit({ type: 'FeeExemptionChanged', account, exempt });
    });
  }

  setMarketPair(caller: Address, accountInput: string, isMarketPair: boolean): Promise<void> {
    return this.request('setMarketPair', caller, ROLES.ADMIN, async () => {
      const account = requireAccount(accountInput, 'account');
      this.deps.registry.setMarketPair(account, isMarketPair);
      this.deps.journal.emit({ type: 'MarketPairChanged', account, isMarketPair });
    });
  }

  migrateCanonicalPair(caller: Address, pairInput: string): Promise<void> {
    return this.request('migrateCanonicalPair', caller, ROLES.ADMIN, async () => {
      const next = requireAccount(pairInput, 'pair');
      if (isAddressEqual(next, this.deps.address)) {
        throw new EngineError({ code: 'PROTECTED_ACCOUNT', message: 'the engine cannot be its own pair' });
      }
      if (this.deps.registry.isDenied(next)) {
        throw new EngineError({ code: 'DENIED', message: `${next} is on the deny list` });
      }
      const previous = this.deps.registry.migrateCanonicalPair(next);
      this.deps.journal.emit({ type: 'CanonicalPairMigrated', previous, next, caller });
      this.logger.warn({ previous: shortAddress(previous), next: shortAddress(next) }, 'canonical pair migrated');
    });
  }

  setDenied(caller: Address, accountInput: string, denied: boolean): Promise<void> {
    return this.request('setDenied', caller, ROLES.ADMIN, async () => {
      const account = requireAccount(accountInput, 'account');
      const { address, registry } = this.deps;
      if (denied && (isAddressEqual(account, address) || isAddressEqual(account, registry.canonicalPair))) {
        throw new EngineError({ code: 'PROTECTED_ACCOUNT', message: `${account} cannot be denied` });
      }
      registry.setDenied(account, denied);
      this.deps.journal.emit({ type: 'DenyListChanged', account, denied });
    });
  }

  setFeeRecipient(caller: Address, recipientInput: string): Promise<void> {
    return this.request('setFeeRecipient', caller, ROLES.ADMIN, async () => {
      const next = requireAccount(recipientInput, 'feeRecipient');
      const previous = this.deps.settings.replace({ ...this.deps.settings.current, feeRecipient: next }).feeRecipient;
      this.deps.journal.emit({ type: 'FeeRecipientChanged', previous, next });
    });
  }

  setLiquidityReceiver(caller: Address, receiverInput: string): Promise<void> {
    return this.request('setLiquidityReceiver', caller, ROLES.ADMIN, async () => {
      const next = requireAccount(receiverInput, 'liquidityReceiver');
      const previous = this.deps.settings.replace({
        ...this.deps.settings.current,
        liquidityReceiver: next,
      }).liquidityReceiver;
      this.deps.journal.emit({ type: 'LiquidityReceiverChanged', previous, next });
    });
  }

  setSwapEnabled(caller: Address, enabled: boolean): Promise<void> {
    return this.request('setSwapEnabled', caller, ROLES.ADMIN, async () => {
      this.deps.settings.replace({ ...this.deps.settings.current, swapEnabled: enabled });
      this.deps.journal.emit({ type: 'SwapEnabledChanged', enabled });
    });
  }

  setSlippage(caller: Address, patch: SlippagePatch): Promise<void> {
    return this.request('setSlippage', caller, ROLES.ADMIN, async () => {
      const parsed = parsePatch(SlippagePatchSchema, patch, 'slippage');
      const current = this.deps.settings.current;
      const next = {
        swapSlippageBps: parsed.swapSlippageBps ?? current.swapSlippageBps,
        depositSlippageBps: parsed.depositSlippageBps ?? current.depositSlippageBps,
      };
      this.deps.settings.replace({ ...current, ...next });
      this.deps.journal.emit({
        type: 'SlippageChanged',
        previous: { swapSlippageBps: current.swapSlippageBps, depositSlippageBps: current.depositSlippageBps },
        next,
      });
    });
  }

  manualConvertRoyalty(caller: Address): Promise<ConversionResult> {
    return this.request('manualConvertRoyalty', caller, ROLES.ADMIN, async () => {
      const result = await this.deps.conversion.convertRoyalty('manual');
      this.deps.journal.emit({ type: 'ManualConversion', pool: 'royalty', caller });
      return result;
    });
  }

  manualConvertLiquidity(caller: Address): Promise<ConversionResult> {
    return this.request('manualConvertLiquidity', caller, ROLES.ADMIN, async () => {
      const result = await this.deps.conversion.convertLiquidity('manual');
      this.deps.journal.emit({ type: 'ManualConversion', pool: 'liquidity', caller });
      return result;
    });
  }

  mint(caller: Address, toInput: string, amount: bigint): Promise<void> {
    return this.request('mint', caller, ROLES.MINTER, async () => {
      const to = requireAccount(toInput, 'to');
      requirePositive(amount, 'amount');
      if (this.deps.registry.isDenied(to)) {
        throw new EngineError({ code: 'DENIED', message: `${to} is on the deny list` });
      }
      await this.deps.ledger.mint(to, amount);
      this.deps.journal.emit({ type: 'Transfer', from: zeroAddress, to, amount });
    });
  }

  burn(caller: Address, fromInput: string, amount: bigint): Promise<void> {
    return this.request('burn', caller, ROLES.MINTER, async () => {
      const from = requireAccount(fromInput, 'from');
      requirePositive(amount, 'amount');
      const { address, accrual, ledger } = this.deps;
      const balance = await ledger.balanceOf(from);
      if (balance < amount) {
        throw new EngineError({ code: 'INSUFFICIENT_BALANCE', message: `${from} holds ${balance}, cannot burn ${amount}` });
      }
      if (isAddressEqual(from, address) && balance - amount < accrual.total) {
        throw new EngineError({
          code: 'CUSTODY_SHORTFALL',
          message: `burning ${amount} would leave ${balance - amount} against pools of ${accrual.total}`,
        });
      }
      await ledger.burn(from, amount);
      this.deps.journal.emit({ type: 'Transfer', from, to: zeroAddress, amount });
    });
  }

  private request<T>(operation: string, callerInput: Address, role: Role, fn: () => Promise<T>): Promise<T> {
    return this.deps.journal.run(operation, async () => {
      const caller = requireAccount(callerInput, 'caller');
      if (!(await this.deps.authorizer.hasRole(role, caller))) {
        throw new EngineError({
          code: 'UNAUTHORIZED',
          message: `${caller} lacks ${role} for ${operation}`,
          details: { caller, role, operation },
        });
      }
      const result = await fn();
      this.logger.info({ operation, caller: shortAddress(caller) }, 'admin call applied');
      return result;
    });
  }
}
