import { VolatilityError, InvalidInputError, NotFittedError, ShapeMismatchError, formatShape } from '../errors';

describe('formatShape', () => {
  it('should render one-dimensional shapes with a trailing comma', () => {
    expect(formatShape([3])).toBe('(3,)');
  });

  it('should render multi-dimensional shapes as tuples', () => {
    expect(formatShape([2, 4])).toBe('(2, 4)');
  });
});

describe('error hierarchy', () => {
  it('should tag each kind with a code and class name', () => {
    const invalid = new InvalidInputError('bad lambda');
    const notFitted = new NotFittedError('EWMA');
    const mismatch = new ShapeMismatchError('a', [1], 'b', [2]);

    expect(invalid).toBeInstanceOf(VolatilityError);
    expect(invalid).toBeInstanceOf(Error);
    expect(invalid.code).toBe('INVALID_INPUT');
    expect(invalid.name).toBe('InvalidInputError');

    expect(notFitted.code).toBe('NOT_FITTED');
    expect(notFitted.name).toBe('NotFittedError');

    expect(mismatch.code).toBe('SHAPE_MISMATCH');
    expect(mismatch.message).toBe('a and b must have the same shape; got (1,) and (2,)');
  });
});
