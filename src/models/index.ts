import { EWMAVolatilityModel } from './ewma';
import { RollingVarianceModel } from './rolling';
import { VolatilityModel, VolatilityModelSpec } from './types';

export { BaseVolatilityModel } from './base';
export { EWMAVolatilityModel, DEFAULT_EWMA_LAMBDA } from './ewma';
export { RollingVarianceModel, DEFAULT_ROLLING_WINDOW } from './rolling';
export type { ModelParams, VolatilityModel, VolatilityModelSpec, VolatilityModelType } from './types';

/**
 * Build an unfitted model from a declarative spec.
 *
 * Omitted hyperparameters take the model's defaults; out-of-range values
 * throw from the model constructor.
 *
 * @example
 * ```typescript
 * const model = createVolatilityModel({ type: 'rolling', window: 60 });
 * ```
 */
export function createVolatilityModel(spec: VolatilityModelSpec): VolatilityModel {
  switch (spec.type) {
    case 'ewma':
      return new EWMAVolatilityModel(spec.lambda);
    case 'rolling':
      return new RollingVarianceModel(spec.window);
  }
}
