import { DrillHit, ToolTable } from '../types';
import { CoordinateResolver } from '../units/CoordinateResolver';
import { UnknownToolError } from '../utils/error-handler';
import { classifyExcellonLine, formatToolCode } from './commands';
import { DrillParseResult, DrillParserOptions, DrillPhase } from './types';

/**
 * Reads drill hits from an Excellon program. Tool diameters come from the
 * `T<n>C<d>` definitions, coordinates go through the same resolver as the
 * Gerber parser. Excellon files default to inches until METRIC is declared.
 */
export class ExcellonDrillParser {
  constructor(private readonly options: DrillParserOptions) {}

  parse(content: string): DrillParseResult {
    const { plated, source } = this.options;
    const resolver = new CoordinateResolver({ units: 'inch', source });
    const tools: ToolTable = new Map();
    const hits: DrillHit[] = [];
    const position: { x: number | null; y: number | null } = { x: null, y: null };

    let phase: DrillPhase = 'body';
    let currentTool: number | null = null;
    let skippedCount = 0;

    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const lineNumber = i + 1;
      const command = classifyExcellonLine(lines[i], lineNumber, source);

      if (command.kind === 'end-of-program') break;

      switch (command.kind) {
        case 'comment':
          break;
        case 'header-start':
          phase = 'header';
          break;
        case 'header-end':
          phase = 'body';
          break;
        case 'units':
          resolver.setUnits(command.units);
          if (command.zeroSuppression) resolver.setZeroSuppression(command.zeroSuppression);
          if (command.format) resolver.setFormat(command.format);
          break;
        case 'coordinate-mode':
          resolver.setMode(command.mode);
          break;
        case 'tool-definition':
          tools.set(command.tool, resolver.toMillimeters(command.diameter));
          break;
        case 'tool-select':
          if (phase === 'header') {
            skippedCount++;
            break;
          }
          // T0 unloads the spindle
          currentTool = command.tool === 0 ? null : command.tool;
          break;
        case 'hit': {
          if (phase === 'header') {
            skippedCount++;
            break;
          }
          position.x = command.x !== undefined
            ? resolver.resolve(command.x, 'x', position.x, lineNumber)
            : position.x;
          position.y = command.y !== undefined
            ? resolver.resolve(command.y, 'y', position.y, lineNumber)
            : position.y;

          const diameter = currentTool === null ? undefined : tools.get(currentTool);
          if (diameter === undefined) {
            throw new UnknownToolError(formatToolCode(currentTool ?? 0), { source, line: lineNumber });
          }
          if (position.x === null || position.y === null) {
            // first hit gave only one axis; nothing to place yet
            skippedCount++;
            break;
          }

          hits.push({ position: { x: position.x, y: position.y }, diameter, plated });
          break;
        }
        case 'unknown':
          skippedCount++;
          break;
      }
    }

    return { hits, tools, units: resolver.getUnits(), skippedCount };
  }
}
