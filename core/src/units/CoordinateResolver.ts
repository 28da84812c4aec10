import { MM_PER_INCH } from '../config';
import { CoordinateMode, ErrorDetails, Units } from '../types';
import { FormatError, ParseError } from '../utils/error-handler';

export type Axis = 'x' | 'y';

// Which zeros a fixed-point token may omit
export type ZeroSuppression = 'leading' | 'trailing' | 'none';

export interface CoordinateFormat {
  integerDigits: number;
  decimalDigits: number;
}

export interface CoordinateResolverOptions {
  units?: Units;
  mode?: CoordinateMode;
  zeroSuppression?: ZeroSuppression;
  format?: CoordinateFormat | { x: CoordinateFormat; y: CoordinateFormat };
  source?: string;
}

const NUMBER_TOKEN = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Converts raw coordinate tokens of a Gerber or Excellon program into
 * millimetres, following the unit, format and absolute/incremental
 * declarations seen so far.
 */
export class CoordinateResolver {
  private units: Units;
  private mode: CoordinateMode;
  private zeroSuppression: ZeroSuppression;
  private formats: Partial<Record<Axis, CoordinateFormat>> = {};
  private readonly source?: string;

  constructor(options: CoordinateResolverOptions = {}) {
    this.units = options.units ?? 'mm';
    this.mode = options.mode ?? 'absolute';
    this.zeroSuppression = options.zeroSuppression ?? 'leading';
    this.source = options.source;
    if (options.format) {
      this.setFormat(options.format);
    }
  }

  getUnits(): Units {
    return this.units;
  }

  setUnits(units: Units): void {
    this.units = units;
  }

  setMode(mode: CoordinateMode): void {
    this.mode = mode;
  }

  setZeroSuppression(zeroSuppression: ZeroSuppression): void {
    this.zeroSuppression = zeroSuppression;
  }

  setFormat(format: CoordinateFormat | { x: CoordinateFormat; y: CoordinateFormat }): void {
    if ('x' in format) {
      this.formats = { x: { ...format.x }, y: { ...format.y } };
    } else {
      this.formats = { x: { ...format }, y: { ...format } };
    }
  }

  toMillimeters(value: number): number {
    return this.units === 'inch' ? value * MM_PER_INCH : value;
  }

  /**
   * Decodes a token into millimetres without applying the coordinate mode.
   * Used directly for arc offsets, which are always relative.
   */
  decode(token: string, axis: Axis, line?: number): number {
    const match = NUMBER_TOKEN.exec(token);
    if (!match) {
      throw new ParseError(`Invalid ${axis.toUpperCase()} coordinate "${token}"`, this.details(line));
    }

    const sign = match[1] === '-' ? -1 : 1;
    const digits = match[2];

    if (digits.includes('.')) {
      return this.toMillimeters(sign * parseFloat(digits));
    }

    const format = this.formats[axis];
    if (!format) {
      throw new FormatError(
        `Coordinate format for ${axis.toUpperCase()} was not declared before "${token}"`,
        this.details(line)
      );
    }

    return this.toMillimeters(sign * this.decodeFixedPoint(digits, format));
  }

  /**
   * Decodes a token and applies the coordinate mode: absolute values are
   * returned as is, incremental ones are added to `previous`.
   */
  resolve(token: string, axis: Axis, previous: number | null, line?: number): number {
    const value = this.decode(token, axis, line);
    if (this.mode === 'incremental') {
      return (previous ?? 0) + value;
    }
    return value;
  }

  private decodeFixedPoint(digits: string, format: CoordinateFormat): number {
    const total = format.integerDigits + format.decimalDigits;
    let padded = digits;

    if (padded.length < total) {
      padded = this.zeroSuppression === 'trailing'
        ? padded.padEnd(total, '0')
        : padded.padStart(total, '0');
    } else if (padded.length > total) {
      padded = padded.slice(-total);
    }

    return parseInt(padded, 10) / 10 ** format.decimalDigits;
  }

  private details(line?: number): ErrorDetails {
    return { source: this.source, line };
  }
}
