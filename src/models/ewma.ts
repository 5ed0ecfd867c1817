import { InvalidInputError } from '../errors';
import { NumericSeries, parseReturnSeries } from '../utils/series';
import { BaseVolatilityModel } from './base';

/** RiskMetrics daily decay */
export const DEFAULT_EWMA_LAMBDA = 0.94;

/**
 * Exponentially weighted moving average volatility model.
 *
 * Conditional variance follows the recursion
 *
 *   σ²ₜ = λ·σ²ₜ₋₁ + (1 − λ)·r²ₜ,   σ²₀ = r²₀
 *
 * Larger λ gives longer memory; smaller λ reacts faster to recent shocks.
 * The recursion has no mean-reversion term, so forecasts are flat at the
 * last fitted volatility.
 *
 * @example
 * ```typescript
 * const model = new EWMAVolatilityModel(0.9);
 * model.fit([1, 2, 3]).predict(2); // [1.4387..., 1.4387...]
 * ```
 */
export class EWMAVolatilityModel extends BaseVolatilityModel {
  readonly lambda: number;

  /**
   * @param lambda - Decay parameter, strictly between 0 and 1
   * @throws {InvalidInputError} If lambda is outside (0, 1)
   */
  constructor(lambda: number = DEFAULT_EWMA_LAMBDA) {
    if (!(lambda > 0 && lambda < 1)) {
      throw new InvalidInputError(`lambda must be in the open interval (0, 1), got ${String(lambda)}`);
    }
    super('EWMA', { lambda });
    this.lambda = lambda;
  }

  protected estimateVolatility(returns: NumericSeries): number[] {
    const r = parseReturnSeries(returns);
    const lam = this.lambda;
    const oneMinusLam = 1 - lam;

    const variance = new Array<number>(r.length);
    variance[0] = r[0] * r[0];
    for (let t = 1; t < r.length; t++) {
      variance[t] = lam * variance[t - 1] + oneMinusLam * r[t] * r[t];
    }

    return variance.map(Math.sqrt);
  }
}
