import { zeroAddress, type Address } from 'viem';
import type { z } from 'zod';

import type { Exchange, ReferenceAsset, TokenPort } from '@tollgate/adapters';
import { formatFeeRate } from '@tollgate/fees';
import {
  ConversionSettingsSchema,
  FeeRatesSchema,
  SwapThresholdsSchema,
  isCheckpointable,
  shortAddress,
  type Checkpointable,
  type ConversionSettingsInput,
  type FeeRates,
  type SwapThresholds,
} from '@tollgate/shared';

import { AccrualLedger } from './accrual';
import { AdminSurface } from './admin';
import { ConversionEngine } from './conversion';
import { EngineError, requireAccount, requirePositive } from './errors';
import { EventBus, type EngineEventListener } from './events';
import { ConversionGuard } from './guard';
import { TransferInterceptor } from './interceptor';
import { RequestJournal } from './journal';
import { getLogger, type AppLogger } from './obs/logger';
import { AccountRegistry } from './registry';
import { FeeSchedule } from './schedule';
import { EngineSettings } from './settings';
import type {
  AccountFlags,
  Authorizer,
  BaseLedger,
  ConversionState,
  EngineSettingsState,
  Pools,
  TransferReceipt,
} from './types';

export type TaxedTokenOptions = {
  /** The token's own account: holds accrued fees and trades on the exchange */
  address: Address;
  ledger: BaseLedger;
  authorizer: Authorizer;
  exchange: Exchange;
  referenceAsset: ReferenceAsset;
  rates: FeeRates;
  thresholds: z.input<typeof SwapThresholdsSchema>;
  conversion: ConversionSettingsInput;
  feeExempt?: readonly Address[];
  initialSupply?: { to: Address; amount: bigint };
  logger?: AppLogger;
  /** Unix seconds, used for swap deadlines */
  now?: () => number;
};

export type EngineSettingsView = EngineSettingsState & { canonicalPair: Address };

function parseOption<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
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

type Components = {
  address: Address;
  ledger: BaseLedger;
  registry: AccountRegistry;
  schedule: FeeSchedule;
  accrual: AccrualLedger;
  settings: EngineSettings;
  guard: ConversionGuard;
  journal: RequestJournal;
  events: EventBus;
  interceptor: TransferInterceptor;
  admin: AdminSurface;
};

/**
 * A fee-on-transfer token. Transfers, admin calls and views all go through
 * here; each transfer or admin call is one atomic request.
 */
export class TaxedToken implements TokenPort {
  readonly address: Address;
  readonly admin: AdminSurface;

  private readonly parts: Components;

  private constructor(parts: Components) {
    this.parts = parts;
    this.address = parts.address;
    this.admin = parts.admin;
  }

  static async create(options: TaxedTokenOptions): Promise<TaxedToken> {
    const address = requireAccount(options.address, 'address');
    const rates = parseOption(FeeRatesSchema, options.rates, 'fee rates');
    const thresholds: SwapThresholds = parseOption(SwapThresholdsSchema, options.thresholds, 'swap thresholds');
    const conversion = parseOption(ConversionSettingsSchema, options.conversion, 'conversion settings');
    const logger = (options.logger ?? getLogger()).child({ token: shortAddress(address) });
    const now = options.now ?? (() => Math.floor(Date.now() / 1000));

    const { ledger, exchange, referenceAsset, authorizer } = options;
    const pair = await exchange.createPair(address, referenceAsset.address);

    const registry = new AccountRegistry(requireAccount(pair, 'pair'));
    const schedule = new FeeSchedule(rates);
    const accrual = new AccrualLedger();
    const settings = new EngineSettings({
      swapEnabled: conversion.swapEnabled,
      minRoyaltyToSwap: thresholds.minRoyaltyToSwap,
      minLiquidityToSwap: thresholds.minLiquidityToSwap,
      feeRecipient: requireAccount(conversion.feeRecipient, 'feeRecipient'),
      liquidityReceiver: requireAccount(conversion.liquidityReceiver ?? address, 'liquidityReceiver'),
      swapSlippageBps: conversion.swapSlippageBps,
      depositSlippageBps: conversion.depositSlippageBps,
      deadlineSeconds: conversion.deadlineSeconds,
    });
    const guard = new ConversionGuard();
    const events = new EventBus(logger.child({ component: 'events' }));

    const participants: Checkpointable[] = [registry, schedule, accrual, settings];
    for (const collaborator of [ledger, referenceAsset, exchange]) {
      if (isCheckpointable(collaborator)) participants.push(collaborator);
    }
    const journal = new RequestJournal({
      participants,
      deliver: (batch) => events.deliver(batch),
      logger: logger.child({ component: 'journal' }),
    });

    const engine = new ConversionEngine({
      address,
      ledger,
      exchange,
      referenceAsset,
      registry,
      accrual,
      settings,
      guard,
      journal,
      logger,
      now,
    });
    const interceptor = new TransferInterceptor({
      address,
      ledger,
      registry,
      schedule,
      accrual,
      settings,
      conversion: engine,
      journal,
      logger,
    });
    const admin = new AdminSurface({
      address,
      ledger,
      authorizer,
      registry,
      schedule,
      accrual,
      settings,
      guard,
      conversion: engine,
      journal,
      logger,
    });

    registry.setFeeExempt(address, true);
    for (const account of options.feeExempt ?? []) {
      registry.setFeeExempt(requireAccount(account, 'feeExempt'), true);
    }

    const token = new TaxedToken({
      address,
      ledger,
      registry,
      schedule,
      accrual,
      settings,
      guard,
      journal,
      events,
      interceptor,
      admin,
    });

    const { initialSupply } = options;
    if (initialSupply) {
      const to = requireAccount(initialSupply.to, 'initialSupply.to');
      requirePositive(initialSupply.amount, 'initialSupply.amount');
      await journal.run('initialSupply', async () => {
        await ledger.mint(to, initialSupply.amount);
        journal.emit({ type: 'Transfer', from: zeroAddress, to, amount: initialSupply.amount });
      });
    }

    logger.info(
      {
        pair: shortAddress(pair),
        sellFee: formatFeeRate(rates.sellRoyaltyBp + rates.sellLiquidityBp),
        buyFee: formatFeeRate(rates.buyLiquidityBp),
      },
      'token ready',
    );
    return token;
  }

  get canonicalPair(): Address {
    return this.parts.registry.canonicalPair;
  }

  transfer(from: string, to: string, amount: bigint): Promise<TransferReceipt> {
    return this.parts.journal.run('transfer', () => this.parts.interceptor.transfer(from, to, amount));
  }

  /** Subscribes to committed events; returns an unsubscribe function. */
  onEvent(listener: EngineEventListener): () => void {
    return this.parts.events.on(listener);
  }

  balanceOf(account: Address): Promise<bigint> {
    return this.parts.ledger.balanceOf(account);
  }

  totalSupply(): Promise<bigint> {
    return this.parts.ledger.totalSupply();
  }

  feeRates(): FeeRates {
    return this.parts.schedule.rates;
  }

  pools(): Pools {
    return this.parts.accrual.snapshot();
  }

  conversionState(): ConversionState {
    return this.parts.guard.state;
  }

  accountFlags(account: Address): AccountFlags {
    return this.parts.registry.flagsOf(account);
  }

  settings(): EngineSettingsView {
    return { ...this.parts.settings.current, canonicalPair: this.canonicalPair };
  }
}
