import type { Address } from 'viem';

import { ExchangeError, getAmountOut, type Exchange, type ReferenceAsset } from '@tollgate/adapters';
import { applySlippage, splitLiquidity } from '@tollgate/fees';
import { shortAddress } from '@tollgate/shared';

import type { AccrualLedger } from './accrual';
import { EngineError } from './errors';
import type { ConversionGuard } from './guard';
import type { RequestJournal } from './journal';
import type { AppLogger } from './obs/logger';
import type { AccountRegistry } from './registry';
import type { EngineSettings } from './settings';
import type { BaseLedger, ConversionResult, ConversionTrigger, PoolKind } from './types';

export type ConversionEngineDeps = {
  /** The token's own account; it holds the pools and trades on the exchange */
  address: Address;
  ledger: BaseLedger;
  exchange: Exchange;
  referenceAsset: ReferenceAsset;
  registry: AccountRegistry;
  accrual: AccrualLedger;
  settings: EngineSettings;
  guard: ConversionGuard;
  journal: RequestJournal;
  logger: AppLogger;
  /** Unix seconds */
  now: () => number;
};

function outflow(before: bigint, after: bigint): bigint {
  return before > after ? before - after : 0n;
}

/**
 * Turns accrued fees into the reference asset. The royalty pool is sold and
 * the proceeds forwarded to the fee recipient; the liquidity pool is half sold
 * and re-deposited with the proceeds.
 *
 * Pools are zeroed before the exchange is called, and every swap carries a
 * minimum output derived from the pair's current reserves.
 */
export class ConversionEngine {
  private readonly deps: ConversionEngineDeps;
  private readonly logger: AppLogger;

  constructor(deps: ConversionEngineDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'conversion' });
  }

  /**
   * Fires at most one conversion if a pool has reached its threshold, royalty
   * first. Skipped while another conversion is running.
   */
  async checkAndFire(): Promise<ConversionResult | null> {
    const { accrual, guard, settings } = this.deps;
    if (guard.busy) {
      this.logger.debug({ active: guard.state }, 'conversion skipped, another is running');
      return null;
    }

    const { minRoyaltyToSwap, minLiquidityToSwap } = settings.current;
    const royalty = accrual.royaltyPool;
    if (royalty > 0n && royalty >= minRoyaltyToSwap) {
      return this.convertRoyalty('auto');
    }

    const liquidity = accrual.liquidityPool;
    if (liquidity >= 2n && liquidity >= minLiquidityToSwap) {
      return this.convertLiquidity('auto');
    }

    return null;
  }

  convertRoyalty(trigger: ConversionTrigger): Promise<ConversionResult> {
    return this.deps.guard.run('royalty', () =>
      this.reported('royalty', trigger, async () => {
        const { accrual, journal, referenceAsset, settings, address } = this.deps;
        const amount = accrual.royaltyPool;
        if (amount === 0n) {
          throw new EngineError({ code: 'INSUFFICIENT_POOL', message: 'royalty pool is empty' });
        }
        await this.assertCustody();

        const { feeRecipient } = settings.current;
        journal.emit({ type: 'ConversionStarted', pool: 'royalty', trigger, amount });
        accrual.clear('royalty');

        const received = await this.swapForReference(amount);
        if (received > 0n) {
          await referenceAsset.transfer(address, feeRecipient, received);
        }

        const result: ConversionResult = {
          pool: 'royalty',
          trigger,
          tokensSwapped: amount,
          referenceReceived: received,
          tokensDeposited: 0n,
          referenceDeposited: 0n,
          beneficiary: feeRecipient,
        };
        journal.emit({ type: 'ConversionFinished', ...result });
        this.logger.info(
          { trigger, swapped: amount.toString(), received: received.toString(), recipient: shortAddress(feeRecipient) },
          'royalty converted',
        );
        return result;
      }),
    );
  }

  convertLiquidity(trigger: ConversionTrigger): Promise<ConversionResult> {
    return this.deps.guard.run('liquidity', () =>
      this.reported('liquidity', trigger, async () => {
        const { accrual, journal, ledger, exchange, referenceAsset, settings, address } = this.deps;
        const amount = accrual.liquidityPool;
        const { swapAmount, depositAmount } = splitLiquidity(amount);
        if (swapAmount === 0n) {
          throw new EngineError({
            code: 'INSUFFICIENT_POOL',
            message: `liquidity pool of ${amount} is too small to split`,
          });
        }
        await this.assertCustody();

        const { liquidityReceiver, depositSlippageBps } = settings.current;
        journal.emit({ type: 'ConversionStarted', pool: 'liquidity', trigger, amount });
        accrual.clear('liquidity');

        const received = await this.swapForReference(swapAmount);

        const tokenBefore = await ledger.balanceOf(address);
        const referenceBefore = await referenceAsset.balanceOf(address);
        const accruedBefore = accrual.total;
        await this.callExchange(() =>
          exchange.addLiquidity({
            account: address,
            token: address,
            tokenAmount: depositAmount,
            referenceAmount: received,
            minToken: applySlippage(depositAmount, depositSlippageBps),
            minReference: applySlippage(received, depositSlippageBps),
            to: liquidityReceiver,
            deadline: this.deadline(),
          }),
        );
        // Sells nested in the deposit credit fees to the engine; those are not part of the outflow.
        const accruedDuring = accrual.total - accruedBefore;
        const tokensDeposited = outflow(tokenBefore + accruedDuring, await ledger.balanceOf(address));
        const referenceDeposited = outflow(referenceBefore, await referenceAsset.balanceOf(address));

        const result: ConversionResult = {
          pool: 'liquidity',
          trigger,
          tokensSwapped: swapAmount,
          referenceReceived: received,
          tokensDeposited,
          referenceDeposited,
          beneficiary: liquidityReceiver,
        };
        journal.emit({ type: 'ConversionFinished', ...result });
        this.logger.info(
          {
            trigger,
            swapped: swapAmount.toString(),
            received: received.toString(),
            deposited: tokensDeposited.toString(),
            receiver: shortAddress(liquidityReceiver),
          },
          'liquidity converted',
        );
        return result;
      }),
    );
  }

  private async reported<T>(pool: PoolKind, trigger: ConversionTrigger, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      this.logger.warn({ err: error, pool, trigger }, 'conversion failed');
      throw error;
    }
  }

  /** Sells `amountIn` of the engine's tokens and returns the reference asset actually received. */
  private async swapForReference(amountIn: bigint): Promise<bigint> {
    const { exchange, referenceAsset, registry, settings, address } = this.deps;
    const pair = registry.canonicalPair;

    const { reserveToken, reserveReference } = await exchange.getReserves(pair, address);
    const expected = getAmountOut(amountIn, reserveToken, reserveReference);
    if (expected === 0n) {
      throw new EngineError({
        code: 'NO_LIQUIDITY',
        message: `pair ${shortAddress(pair)} quotes nothing for ${amountIn}`,
        details: { pair, reserveToken: reserveToken.toString(), reserveReference: reserveReference.toString() },
      });
    }
    const minAmountOut = applySlippage(expected, settings.current.swapSlippageBps);

    const before = await referenceAsset.balanceOf(address);
    await this.callExchange(() =>
      exchange.swapExactTokensForReference({
        account: address,
        amountIn,
        minAmountOut,
        path: [address, referenceAsset.address],
        to: address,
        deadline: this.deadline(),
      }),
    );
    const received = (await referenceAsset.balanceOf(address)) - before;

    if (received < minAmountOut) {
      throw new EngineError({
        code: 'SLIPPAGE',
        message: `swap returned ${received}, below minimum ${minAmountOut}`,
        details: { expected: expected.toString(), minAmountOut: minAmountOut.toString() },
      });
    }
    this.logger.debug(
      { amountIn: amountIn.toString(), expected: expected.toString(), received: received.toString() },
      'swap settled',
    );
    return received;
  }

  private async callExchange(call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      if (error instanceof ExchangeError && error.code === 'INSUFFICIENT_OUTPUT') {
        throw new EngineError({ code: 'SLIPPAGE', message: error.message, cause: error });
      }
      if (error instanceof ExchangeError && error.code === 'INSUFFICIENT_LIQUIDITY') {
        throw new EngineError({ code: 'NO_LIQUIDITY', message: error.message, cause: error });
      }
      throw error;
    }
  }

  private async assertCustody(): Promise<void> {
    const { accrual, ledger, address } = this.deps;
    const held = await ledger.balanceOf(address);
    if (held < accrual.total) {
      throw new EngineError({
        code: 'CUSTODY_SHORTFALL',
        message: `engine holds ${held}, pools total ${accrual.total}`,
      });
    }
  }

  private deadline(): bigint {
    return BigInt(this.deps.now() + this.deps.settings.current.deadlineSeconds);
  }
}
