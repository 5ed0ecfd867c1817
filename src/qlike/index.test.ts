import { qlike, meanQlike } from '../qlike';
import { InvalidInputError, ShapeMismatchError } from '../errors';

describe('qlike', () => {
  it('should be zero when realized equals forecast', () => {
    expect(qlike([1.0], [1.0])).toEqual([0]);
    expect(qlike([0.04, 2.5], [0.04, 2.5])).toEqual([0, 0]);
  });

  it('should compute r/f - ln(r/f) - 1 elementwise', () => {
    const losses = qlike([2.0, 1.0], [1.0, 2.0]);

    expect(losses).toHaveLength(2);
    expect(losses[0]).toBeCloseTo(1 - Math.log(2), 12);
    expect(losses[1]).toBeCloseTo(Math.log(2) - 0.5, 12);
  });

  it('should penalize under-prediction more than over-prediction', () => {
    const [under, over] = qlike([2.0, 0.5], [1.0, 1.0]);

    expect(under).toBeGreaterThan(over);
  });

  it('should raise a shape mismatch naming both shapes', () => {
    expect(() => qlike([1, 2, 3], [1, 2, 3, 4])).toThrow(ShapeMismatchError);
    expect(() => qlike([1, 2, 3], [1, 2, 3, 4])).toThrow(
      'realizedVariance and forecastVariance must have the same shape; got (3,) and (4,)',
    );
  });

  it('should expose the mismatched shapes on the error', () => {
    let caught: unknown;
    try {
      qlike([1], [1, 2]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ShapeMismatchError);
    if (caught instanceof ShapeMismatchError) {
      expect(caught.code).toBe('SHAPE_MISMATCH');
      expect(caught.leftShape).toEqual([1]);
      expect(caught.rightShape).toEqual([2]);
    }
  });

  it('should propagate degenerate forecasts as non-finite values', () => {
    const [zeroForecast, zeroRealized, negativeRatio] = qlike([1.0, 0.0, -1.0], [0.0, 1.0, 1.0]);

    // Infinity - ln(Infinity) - 1
    expect(zeroForecast).toBeNaN();
    // 0 - ln(0) - 1
    expect(zeroRealized).toBe(Infinity);
    // ln of a negative ratio
    expect(negativeRatio).toBeNaN();
  });

  it('should accept typed arrays and leave inputs untouched', () => {
    const realized = new Float64Array([1.0, 4.0]);
    const forecast = [1.0, 4.0];

    const losses = qlike(realized, forecast);

    expect(losses).toEqual([0, 0]);
    expect(Array.from(realized)).toEqual([1.0, 4.0]);
    expect(forecast).toEqual([1.0, 4.0]);
  });

  it('should return an empty array for empty inputs', () => {
    expect(qlike([], [])).toEqual([]);
  });
});

describe('meanQlike', () => {
  it('should average the elementwise losses', () => {
    const mean = meanQlike([2.0, 1.0, 3.0], [1.0, 1.0, 3.0]);

    expect(mean).toBeCloseTo((1 - Math.log(2)) / 3, 12);
  });

  it('should reject empty samples', () => {
    expect(() => meanQlike([], [])).toThrow(InvalidInputError);
  });

  it('should raise a shape mismatch for unequal lengths', () => {
    expect(() => meanQlike([1, 2], [1])).toThrow(ShapeMismatchError);
  });
});
