import { InvalidInputError } from '../errors';
import { NumericSeries, parseReturnSeries } from '../utils/series';
import { BaseVolatilityModel } from './base';

/** About one trading month of daily returns */
export const DEFAULT_ROLLING_WINDOW = 20;

/**
 * Trailing-window volatility model.
 *
 * Variance at t is the mean squared return over the last `window`
 * observations (zero-mean convention, like EWMA):
 *
 *   σ²ₜ = (1/n) Σ r²ᵢ,  i ∈ [max(0, t − window + 1), t]
 *
 * Until `window` observations are available the expanding window is used.
 * Forecasts are flat at the last windowed volatility.
 */
export class RollingVarianceModel extends BaseVolatilityModel {
  readonly window: number;

  /**
   * @param window - Number of trailing returns per estimate
   * @throws {InvalidInputError} If window is not a positive integer
   */
  constructor(window: number = DEFAULT_ROLLING_WINDOW) {
    if (!Number.isInteger(window) || window <= 0) {
      throw new InvalidInputError(`window must be a positive integer, got ${String(window)}`);
    }
    super('RollingVariance', { window });
    this.window = window;
  }

  protected estimateVolatility(returns: NumericSeries): number[] {
    const r = parseReturnSeries(returns);
    const volatility = new Array<number>(r.length);

    for (let t = 0; t < r.length; t++) {
      const start = Math.max(0, t - this.window + 1);
      let sumSquares = 0;
      for (let i = start; i <= t; i++) {
        sumSquares += r[i] * r[i];
      }
      volatility[t] = Math.sqrt(sumSquares / (t - start + 1));
    }

    return volatility;
  }
}
