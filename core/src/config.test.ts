import { DEFAULT_ARC_TOLERANCE_MM, resolveConversionOptions, resolveDiameterRange } from './config';
import { InvalidOptionsError } from './utils/error-handler';

describe('resolveDiameterRange', () => {
  test('should default to min 3.0 mm and no maximum', () => {
    expect(resolveDiameterRange()).toEqual({ min: 3 });
  });

  test('should accept numeric strings from the command line', () => {
    expect(resolveDiameterRange({ min: '2.5', max: '7' })).toEqual({ min: 2.5, max: 7 });
    expect(resolveDiameterRange({ min: 0, max: 0 })).toEqual({ min: 0, max: 0 });
  });

  test('should reject negative bounds', () => {
    expect(() => resolveDiameterRange({ min: -1 })).toThrow('--min must be >= 0.');
    expect(() => resolveDiameterRange({ max: '-2' })).toThrow('--max must be >= 0.');
  });

  test('should reject a maximum below the minimum', () => {
    expect(() => resolveDiameterRange({ min: 4, max: 3 })).toThrow(InvalidOptionsError);
    expect(() => resolveDiameterRange({ min: 4, max: 3 })).toThrow('--max must be >= --min.');
  });

  test('should reject values that are not numbers', () => {
    expect(() => resolveDiameterRange({ min: 'abc' })).toThrow('--min must be a number, got "abc".');
    expect(() => resolveDiameterRange({ max: ' ' })).toThrow(InvalidOptionsError);
  });
});

describe('resolveConversionOptions', () => {
  test('should fill in the arc tolerance', () => {
    expect(resolveConversionOptions({ max: '6' })).toEqual({
      range: { min: 3, max: 6 },
      arcTolerance: DEFAULT_ARC_TOLERANCE_MM,
    });
    expect(resolveConversionOptions({ arcTolerance: 0.01 }).arcTolerance).toBe(0.01);
  });
});
