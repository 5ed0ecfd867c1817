/**
 * Error kinds raised by volatility models and scorers
 */

export type VolatilityErrorCode = 'INVALID_INPUT' | 'NOT_FITTED' | 'SHAPE_MISMATCH';

/**
 * Base class for every error thrown by this library.
 * Use `code` to branch on the kind without instanceof checks.
 */
export class VolatilityError extends Error {
  readonly code: VolatilityErrorCode;

  constructor(code: VolatilityErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A hyperparameter, return series or forecast horizon is outside its valid domain
 */
export class InvalidInputError extends VolatilityError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

/**
 * `predict` was called before a successful `fit`
 */
export class NotFittedError extends VolatilityError {
  constructor(modelName: string) {
    super('NOT_FITTED', `${modelName} model must be fitted before calling predict()`);
  }
}

/**
 * Two arrays that must line up elementwise have different shapes
 */
export class ShapeMismatchError extends VolatilityError {
  readonly leftShape: readonly number[];
  readonly rightShape: readonly number[];

  constructor(leftName: string, leftShape: readonly number[], rightName: string, rightShape: readonly number[]) {
    super(
      'SHAPE_MISMATCH',
      `${leftName} and ${rightName} must have the same shape; got ${formatShape(leftShape)} and ${formatShape(rightShape)}`,
    );
    this.leftShape = [...leftShape];
    this.rightShape = [...rightShape];
  }
}

/** Renders a shape as a tuple, e.g. `(3,)` or `(2, 4)` */
export function formatShape(shape: readonly number[]): string {
  if (shape.length === 1) {
    return `(${shape[0]},)`;
  }
  return `(${shape.join(', ')})`;
}
