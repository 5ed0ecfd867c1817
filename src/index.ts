/**
 * volforecast - Volatility Forecasting Library
 *
 * Estimators for the conditional volatility of a return series behind a
 * common fit/predict interface, and the QLIKE loss for scoring variance
 * forecasts.
 */

// Errors
export {
  VolatilityError,
  InvalidInputError,
  NotFittedError,
  ShapeMismatchError,
  formatShape,
} from './errors';
export type { VolatilityErrorCode } from './errors';

// Models
export {
  BaseVolatilityModel,
  EWMAVolatilityModel,
  RollingVarianceModel,
  createVolatilityModel,
  DEFAULT_EWMA_LAMBDA,
  DEFAULT_ROLLING_WINDOW,
} from './models';
export type {
  ModelParams,
  VolatilityModel,
  VolatilityModelSpec,
  VolatilityModelType,
} from './models';

// Forecast evaluation
export { qlike, meanQlike } from './qlike';

// Series parsing
export { parseReturnSeries, parseHorizon, MAX_HORIZON } from './utils/series';
export type { NumericSeries } from './utils/series';

