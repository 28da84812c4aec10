// Types
export * from './types';
export * from './config';

// Parsers
export { CoordinateResolver } from './units/CoordinateResolver';
export type { Axis, CoordinateFormat, ZeroSuppression } from './units/CoordinateResolver';
export { GerberOutlineParser } from './gerber/GerberOutlineParser';
export { classifyGerberCommand, tokenizeGerber } from './gerber/commands';
export type { GerberCommand, GerberParseResult, GerberParserOptions } from './gerber/types';
export { ExcellonDrillParser } from './excellon/ExcellonDrillParser';
export { classifyExcellonLine } from './excellon/commands';
export type { DrillParseResult, DrillParserOptions, ExcellonCommand } from './excellon/types';

// Filtering and output
export { filterByDiameter, isWithinRange } from './filter/diameter-filter';
export { DxfDocument, OUTLINE_LAYER, MOUNTING_HOLES_LAYER } from './dxf/DxfDocument';
export { toDxfArc, normalizeAngle } from './dxf/arc-angles';
export type { DxfArc } from './dxf/arc-angles';

// Pipeline
export { OutlineConverter } from './converter/OutlineConverter';
export * from './converter/types';
export { detectInputFiles, deriveOutputName } from './io/file-detector';
export { formatSummary } from './report/summary';

// Utilities
export { Logger } from './utils/logger';
export * from './utils/error-handler';
