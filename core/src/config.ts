import { DiameterRange } from './types';
import { InvalidOptionsError } from './utils/error-handler';

export const DEFAULT_MIN_DIAMETER_MM = 3.0;

// Allowed disagreement between |start - center| and |end - center| of an arc
export const DEFAULT_ARC_TOLERANCE_MM = 0.005;

// Diameters are compared after rounding to this many decimals
export const DIAMETER_PRECISION = 3;

export const OUTPUT_SUFFIX = '-outline-mounting-holes.dxf';

export const MM_PER_INCH = 25.4;

export interface ConversionOptions {
  range: DiameterRange;
  arcTolerance: number;
}

export interface RawDiameterOptions {
  min?: number | string;
  max?: number | string;
}

function toNumber(value: number | string, flag: string): number {
  const parsed = typeof value === 'number' ? value : Number(value.trim() || NaN);
  if (!Number.isFinite(parsed)) {
    throw new InvalidOptionsError(`${flag} must be a number, got "${value}".`);
  }
  return parsed;
}

export function resolveDiameterRange(options: RawDiameterOptions = {}): DiameterRange {
  const min = options.min === undefined ? DEFAULT_MIN_DIAMETER_MM : toNumber(options.min, '--min');
  const max = options.max === undefined ? undefined : toNumber(options.max, '--max');

  if (min < 0) {
    throw new InvalidOptionsError('--min must be >= 0.');
  }
  if (max !== undefined && max < 0) {
    throw new InvalidOptionsError('--max must be >= 0.');
  }
  if (max !== undefined && max < min) {
    throw new InvalidOptionsError('--max must be >= --min.');
  }

  return max === undefined ? { min } : { min, max };
}

export function resolveConversionOptions(
  options: RawDiameterOptions & { arcTolerance?: number } = {}
): ConversionOptions {
  return {
    range: resolveDiameterRange(options),
    arcTolerance: options.arcTolerance ?? DEFAULT_ARC_TOLERANCE_MM,
  };
}
