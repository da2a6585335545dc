import { isAddressEqual, type Address } from 'viem';

import { calculateTransferFees, noFees, type TransferSide } from '@tollgate/fees';
import { shortAddress } from '@tollgate/shared';

import type { AccrualLedger } from './accrual';
import type { ConversionEngine } from './conversion';
import { EngineError, requireAccount, requirePositive } from './errors';
import type { RequestJournal } from './journal';
import type { AppLogger } from './obs/logger';
import type { AccountRegistry } from './registry';
import type { FeeSchedule } from './schedule';
import type { EngineSettings } from './settings';
import type { BaseLedger, ConversionResult, TransferReceipt } from './types';

export type TransferInterceptorDeps = {
  address: Address;
  ledger: BaseLedger;
  registry: AccountRegistry;
  schedule: FeeSchedule;
  accrual: AccrualLedger;
  settings: EngineSettings;
  conversion: ConversionEngine;
  journal: RequestJournal;
  logger: AppLogger;
};

/**
 * Every transfer passes through here: classify, take fees into the engine's
 * custody, maybe convert (sells only), then settle the net amount.
 */
export class TransferInterceptor {
  private readonly deps: TransferInterceptorDeps;
  private readonly logger: AppLogger;

  constructor(deps: TransferInterceptorDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'interceptor' });
  }

  classify(from: Address, to: Address): TransferSide {
    const { registry } = this.deps;
    if (registry.isMarketPair(to)) return 'sell';
    if (registry.isMarketPair(from)) return 'buy';
    return 'transfer';
  }

  async transfer(fromInput: string, toInput: string, amount: bigint): Promise<TransferReceipt> {
    const { address, ledger, registry, schedule, accrual, settings, conversion, journal } = this.deps;

    const from = requireAccount(fromInput, 'from');
    const to = requireAccount(toInput, 'to');
    requirePositive(amount, 'amount');
    for (const account of [from, to]) {
      if (registry.isDenied(account)) {
        throw new EngineError({ code: 'DENIED', message: `${account} is on the deny list`, details: { account } });
      }
    }

    const balance = await ledger.balanceOf(from);
    if (balance < amount) {
      throw new EngineError({
        code: 'INSUFFICIENT_BALANCE',
        message: `${from} holds ${balance}, cannot send ${amount}`,
      });
    }
    // Pools are cleared before a conversion moves tokens, so its own transfers pass.
    if (isAddressEqual(from, address) && balance - amount < accrual.total) {
      throw new EngineError({
        code: 'CUSTODY_SHORTFALL',
        message: `sending ${amount} would leave ${balance - amount} against pools of ${accrual.total}`,
        details: { amount: amount.toString(), pools: accrual.total.toString() },
      });
    }

    const side = this.classify(from, to);
    const taxed = !registry.isFeeExempt(from) && !registry.isFeeExempt(to);
    const fees = taxed ? calculateTransferFees(amount, side, schedule.rates) : noFees(amount);

    if (fees.totalFee > 0n) {
      await ledger.settle(from, address, fees.totalFee);
      accrual.credit(fees.royaltyFee, fees.liquidityFee);
      journal.emit({ type: 'Transfer', from, to: address, amount: fees.totalFee });
      journal.emit({
        type: 'FeesAccrued',
        from,
        to,
        side,
        royaltyFee: fees.royaltyFee,
        liquidityFee: fees.liquidityFee,
      });
    }

    let converted: ConversionResult | null = null;
    if (side === 'sell' && settings.current.swapEnabled) {
      converted = await conversion.checkAndFire();
    }

    await ledger.settle(from, to, fees.netAmount);
    journal.emit({ type: 'Transfer', from, to, amount: fees.netAmount });

    if (fees.totalFee > 0n) {
      this.logger.debug(
        { side, from: shortAddress(from), to: shortAddress(to), fee: fees.totalFee.toString() },
        'transfer taxed',
      );
    }

    return { side, taxed, ...fees, conversion: converted };
  }
}
