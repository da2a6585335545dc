import { checkFeeRates, describeViolation } from '@tollgate/fees';
import type { Checkpointable, FeeRates } from '@tollgate/shared';

import { EngineError } from './errors';

/**
 * Current fee rates. Every write is checked against the ceilings, so the
 * schedule can never hold rates that fail `checkFeeRates`.
 */
export class FeeSchedule implements Checkpointable {
  private current: FeeRates;

  constructor(initial: FeeRates) {
    FeeSchedule.assertValid(initial);
    this.current = { ...initial };
  }

  get rates(): FeeRates {
    return { ...this.current };
  }

  /** Applies `patch` over the current rates; unset fields keep their value. */
  update(patch: Partial<FeeRates>): { previous: FeeRates; next: FeeRates } {
    const previous = this.rates;
    const next: FeeRates = {
      sellRoyaltyBp: patch.sellRoyaltyBp ?? previous.sellRoyaltyBp,
      sellLiquidityBp: patch.sellLiquidityBp ?? previous.sellLiquidityBp,
      buyLiquidityBp: patch.buyLiquidityBp ?? previous.buyLiquidityBp,
    };
    FeeSchedule.assertValid(next);
    this.current = next;
    return { previous, next: { ...next } };
  }

  checkpoint(): () => void {
    const saved = this.current;
    return () => {
      this.current = saved;
    };
  }

  private static assertValid(rates: FeeRates): void {
    const violation = checkFeeRates(rates);
    if (!violation) return;
    throw new EngineError({
      code: violation.code === 'INVALID_RATE' ? 'INVALID_SETTING' : 'FEE_CEILING_EXCEEDED',
      message: describeViolation(violation),
      details: { ...violation },
    });
  }
}
