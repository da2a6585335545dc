/**
 * @tollgate/fees
 *
 * Fee constants and pure fee arithmetic
 */

export { FEE_CONFIG } from './config';
export type { FeeConfig } from './config';

export {
  applySlippage,
  calculateTransferFees,
  checkFeeRates,
  describeViolation,
  formatFeeRate,
  noFees,
  portionOf,
  splitLiquidity,
} from './calculator';
export type { FeeRateViolation, TransferFees, TransferSide } from './calculator';
