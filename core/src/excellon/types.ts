import { CoordinateMode, DrillHit, ToolTable, Units } from '../types';
import { CoordinateFormat, ZeroSuppression } from '../units/CoordinateResolver';

export type ExcellonCommand =
  | { kind: 'comment' }
  | { kind: 'header-start' }
  | { kind: 'header-end' }
  | {
      kind: 'units';
      units: Units;
      zeroSuppression?: ZeroSuppression;
      format?: CoordinateFormat;
    }
  | { kind: 'tool-definition'; tool: number; diameter: number }
  | { kind: 'tool-select'; tool: number }
  | { kind: 'coordinate-mode'; mode: CoordinateMode }
  | { kind: 'hit'; x?: string; y?: string }
  | { kind: 'end-of-program' }
  | { kind: 'unknown'; text: string };

export type DrillPhase = 'header' | 'body';

export interface DrillParserOptions {
  // Whether the file holds plated (PTH) or non-plated (NPTH) holes
  plated: boolean;
  source?: string;
}

export interface DrillParseResult {
  hits: DrillHit[];
  tools: ToolTable;
  units: Units;
  skippedCount: number;
}
