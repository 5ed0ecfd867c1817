import { InvalidInputError, ShapeMismatchError } from '../errors';

/**
 * QLIKE (quasi-likelihood) loss between realized and forecast variances.
 *
 * For each pair of realized variance r and forecast variance f:
 *
 *   QLIKE(r, f) = r/f − ln(r/f) − 1
 *
 * The loss is zero when r = f and penalizes under-prediction of variance
 * more heavily than over-prediction. Values are not checked for
 * positivity: f = 0 or a non-positive ratio produces Infinity or NaN in
 * the corresponding output slot.
 *
 * @param realizedVariance - Realized variances (e.g. squared returns)
 * @param forecastVariance - Forecast variances, same length as realized
 * @returns Elementwise losses in a new array
 * @throws {ShapeMismatchError} If the inputs differ in length
 *
 * @example
 * ```typescript
 * qlike([1.0], [1.0]); // [0]
 * ```
 */
export function qlike(
  realizedVariance: ArrayLike<number>,
  forecastVariance: ArrayLike<number>,
): number[] {
  const r = Array.from(realizedVariance, Number);
  const f = Array.from(forecastVariance, Number);

  if (r.length !== f.length) {
    throw new ShapeMismatchError('realizedVariance', [r.length], 'forecastVariance', [f.length]);
  }

  return r.map((realized, i) => {
    const ratio = realized / f[i];
    return ratio - Math.log(ratio) - 1;
  });
}

/**
 * Average QLIKE loss over a forecast evaluation sample.
 *
 * @throws {ShapeMismatchError} If the inputs differ in length
 * @throws {InvalidInputError} If the inputs are empty
 */
export function meanQlike(
  realizedVariance: ArrayLike<number>,
  forecastVariance: ArrayLike<number>,
): number {
  const losses = qlike(realizedVariance, forecastVariance);
  if (losses.length === 0) {
    throw new InvalidInputError('meanQlike requires at least one observation');
  }
  let sum = 0;
  for (const loss of losses) {
    sum += loss;
  }
  return sum / losses.length;
}
