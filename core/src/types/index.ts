// Geometry shared by the parsers and the DXF writer. All values are millimetres.
export interface Point {
  x: number;
  y: number;
}

export type Units = 'mm' | 'inch';

export type CoordinateMode = 'absolute' | 'incremental';

export type ArcDirection = 'clockwise' | 'counterclockwise';

export type InterpolationMode = 'linear' | ArcDirection;

export interface LineSegment {
  kind: 'line';
  start: Point;
  end: Point;
}

export interface ArcSegment {
  kind: 'arc';
  start: Point;
  end: Point;
  center: Point;
  direction: ArcDirection;
}

export type OutlineSegment = LineSegment | ArcSegment;

export interface DrillHit {
  position: Point;
  diameter: number;
  plated: boolean;
}

// Tool number -> diameter in mm
export type ToolTable = Map<number, number>;

export interface DiameterRange {
  min: number;
  max?: number;
}

export interface Circle {
  center: Point;
  radius: number;
}

// Error types
export enum ErrorCode {
  FormatError = 'FORMAT_ERROR',
  ParseError = 'PARSE_ERROR',
  UnknownTool = 'UNKNOWN_TOOL',
  GeometryError = 'GEOMETRY_ERROR',
  InvalidOptions = 'INVALID_OPTIONS',
  InputNotFound = 'INPUT_NOT_FOUND'
}

export interface ErrorDetails {
  source?: string;
  line?: number;
  [key: string]: unknown;
}

export interface IBoardOutlineError extends Error {
  code: ErrorCode;
  details?: ErrorDetails;
}
