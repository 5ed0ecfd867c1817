import { InvalidInputError } from '../errors';

/**
 * Anything a return series can be read from: plain arrays, typed arrays,
 * sets or generators.
 */
export type NumericSeries = Iterable<number>;

/**
 * Parse a return series into a fresh array of finite numbers.
 *
 * The input is read once and not retained. Empty series and series with
 * non-finite entries (NaN, ±Infinity, or non-numbers from untyped callers)
 * are rejected.
 *
 * @param input - Time-ordered returns, oldest first
 * @param label - Name used in error messages
 * @returns Copy of the series as a number array
 * @throws {InvalidInputError} If the series is empty or malformed
 */
export function parseReturnSeries(input: NumericSeries, label: string = 'returns'): number[] {
  if (input === null || input === undefined || typeof input[Symbol.iterator] !== 'function') {
    throw new InvalidInputError(`${label} must be an iterable of numbers`);
  }

  const values = Array.from(input);

  if (values.length === 0) {
    throw new InvalidInputError(`${label} must contain at least one observation`);
  }

  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) {
      throw new InvalidInputError(`${label}[${i}] must be a finite number, got ${String(values[i])}`);
    }
  }

  return values;
}

/** Largest horizon a forecast array can hold (maximum JS array length) */
export const MAX_HORIZON = 2 ** 32 - 1;

/**
 * Validate a forecast horizon.
 *
 * @throws {InvalidInputError} If `h` is not a positive integer up to MAX_HORIZON
 */
export function parseHorizon(h: number): number {
  if (!Number.isInteger(h) || h <= 0) {
    throw new InvalidInputError(`h must be a positive integer, got ${String(h)}`);
  }
  if (h > MAX_HORIZON) {
    throw new InvalidInputError(`h must be at most ${MAX_HORIZON}, got ${h}`);
  }
  return h;
}
