import { NotFittedError } from '../errors';
import { NumericSeries, parseHorizon } from '../utils/series';
import { ModelParams, VolatilityModel } from './types';

/**
 * Shared state and forecasting for estimators that produce a fitted
 * volatility series and hold its last value flat over the horizon.
 *
 * The constructor stores `name` and `params` verbatim; range checks on
 * hyperparameters belong to the concrete model.
 */
export abstract class BaseVolatilityModel implements VolatilityModel {
  readonly name: string;
  readonly params: ModelParams;

  private fittedVolatility: readonly number[] | null = null;

  constructor(name: string, params: Record<string, number> = {}) {
    this.name = name;
    this.params = Object.freeze({ ...params });
  }

  get isFitted(): boolean {
    return this.fittedVolatility !== null && this.fittedVolatility.length > 0;
  }

  get volatility(): number[] | null {
    return this.fittedVolatility === null ? null : [...this.fittedVolatility];
  }

  fit(returns: NumericSeries): this {
    // Prior state is replaced only once the whole series has been estimated
    const volatility = this.estimateVolatility(returns);
    this.fittedVolatility = Object.freeze(volatility);
    return this;
  }

  /**
   * Flat term structure: every period gets the last fitted volatility.
   *
   * @throws {NotFittedError} If called before `fit`
   * @throws {InvalidInputError} If `h` is not a positive integer
   */
  predict(h: number = 1): number[] {
    const fitted = this.fittedVolatility;
    if (fitted === null || fitted.length === 0) {
      throw new NotFittedError(this.name);
    }
    const horizon = parseHorizon(h);
    return new Array<number>(horizon).fill(fitted[fitted.length - 1]);
  }

  /**
   * Parse `returns` and compute the volatility (standard deviation) at every index
   */
  protected abstract estimateVolatility(returns: NumericSeries): number[];
}
