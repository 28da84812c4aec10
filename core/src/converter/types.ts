import { DrillParseResult } from '../excellon/types';
import { GerberParseResult } from '../gerber/types';
import { DrillHit } from '../types';

export interface TextSource {
  name: string;
  content: string;
}

export interface DrillSource extends TextSource {
  plated: boolean;
}

// In-memory inputs; drills are concatenated in the given order
export interface ConversionSources {
  outline: TextSource;
  drills: DrillSource[];
}

export interface DrillFile {
  path: string;
  plated: boolean;
}

export interface ConversionFiles {
  outlinePath: string;
  // PTH first by convention
  drills: DrillFile[];
  outputPath: string;
}

export interface ConversionResult {
  outputPath?: string;
  outlineEntityCount: number;
  holeCount: number;
  // Every hit read from the drill files, before filtering
  totalHitCount: number;
  holes: DrillHit[];
  // Unique diameters of the kept holes, ascending
  diameters: number[];
}

export interface ConverterEvents {
  outlineParsed: (source: string, result: GerberParseResult) => void;
  drillParsed: (source: string, plated: boolean, result: DrillParseResult) => void;
  documentWritten: (path: string, entityCount: number) => void;
}
