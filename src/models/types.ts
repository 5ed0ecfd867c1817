import { NumericSeries } from '../utils/series';

/**
 * Hyperparameters of a volatility model, keyed by name (e.g. `lambda`, `window`)
 */
export type ModelParams = Readonly<Record<string, number>>;

/**
 * Common lifecycle of every volatility estimator.
 *
 * ```typescript
 * const forecast = model.fit(returns).predict(10);
 * ```
 */
export interface VolatilityModel {
  /** Human-readable model identifier (e.g. "EWMA") */
  readonly name: string;
  /** Hyperparameters the model was constructed with */
  readonly params: ModelParams;
  /** Whether `fit` has completed successfully */
  readonly isFitted: boolean;
  /** Copy of the fitted volatility series (standard deviations), or null before `fit` */
  readonly volatility: number[] | null;

  /**
   * Estimate the model on a historical return series.
   * Returns the same instance so calls can be chained.
   */
  fit(returns: NumericSeries): this;

  /**
   * Volatility forecasts for each of the next `h` periods.
   */
  predict(h?: number): number[];
}

/**
 * Supported estimators
 */
export type VolatilityModelType = 'ewma' | 'rolling';

/**
 * Declarative description of a model, consumed by `createVolatilityModel`
 */
export type VolatilityModelSpec =
  | { type: 'ewma'; lambda?: number }
  | { type: 'rolling'; window?: number };
