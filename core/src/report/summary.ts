import path from 'path';
import { ConversionResult } from '../converter/types';
import { DiameterRange } from '../types';

export function formatRange(range: DiameterRange): string {
  return range.max === undefined
    ? `>= ${range.min.toFixed(4)} mm`
    : `${range.min.toFixed(4)} to ${range.max.toFixed(4)} mm`;
}

// Lines printed after a run
export function formatSummary(result: ConversionResult, range: DiameterRange): string[] {
  const diameters = result.diameters.length > 0
    ? result.diameters.map((d) => d.toFixed(4)).join(', ')
    : 'none';

  const lines: string[] = [];
  if (result.outputPath) {
    lines.push(`Output file: ${path.basename(result.outputPath)}`);
  }
  lines.push(
    `Outline entities: ${result.outlineEntityCount}`,
    `Hole count (${formatRange(range)}): ${result.holeCount}`,
    `Diameters used (mm): ${diameters}`
  );
  return lines;
}
