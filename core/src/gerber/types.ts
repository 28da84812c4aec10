import { CoordinateMode, InterpolationMode, OutlineSegment, Units } from '../types';
import { CoordinateFormat, ZeroSuppression } from '../units/CoordinateResolver';

// One `*`-terminated command; `extended` when it came from a %...% block
export interface RawGerberCommand {
  text: string;
  line: number;
  extended: boolean;
}

export type OperationCode = 1 | 2 | 3;

export type GerberCommand =
  | { kind: 'comment' }
  | {
      kind: 'format';
      zeroSuppression: ZeroSuppression;
      mode: CoordinateMode;
      x: CoordinateFormat;
      y: CoordinateFormat;
    }
  | { kind: 'units'; units: Units }
  | { kind: 'aperture-definition'; code: number }
  | { kind: 'coordinate-mode'; mode: CoordinateMode }
  | { kind: 'interpolation'; mode: InterpolationMode }
  | { kind: 'select-aperture'; code: number }
  | {
      kind: 'operation';
      interpolation?: InterpolationMode;
      code?: OperationCode;
      x?: string;
      y?: string;
      i?: string;
      j?: string;
    }
  | { kind: 'end-of-program' }
  | { kind: 'unknown'; text: string };

export interface PlotterState {
  current: { x: number | null; y: number | null };
  interpolation: InterpolationMode;
  apertureId: number | null;
  lastOperation: OperationCode | null;
}

export interface GerberParseResult {
  segments: OutlineSegment[];
  commandCount: number;
  skippedCount: number;
  units: Units;
  apertureCount: number;
  // D-code selected when the program ended; outline geometry ignores aperture width
  aperture: number | null;
  // False when the program ended without M02
  terminated: boolean;
}

export interface GerberParserOptions {
  // File name used in error details
  source?: string;
}
