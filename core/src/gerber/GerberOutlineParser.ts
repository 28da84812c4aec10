import { OutlineSegment, Point } from '../types';
import { CoordinateResolver } from '../units/CoordinateResolver';
import { classifyGerberCommand, tokenizeGerber } from './commands';
import {
  GerberCommand,
  GerberParseResult,
  GerberParserOptions,
  PlotterState,
} from './types';

type OperationCommand = Extract<GerberCommand, { kind: 'operation' }>;

/**
 * Extracts the board outline from a Gerber (RS-274X) program as an ordered
 * list of line and arc segments in millimetres.
 *
 * Only the plotter state matters here: unit and format declarations, the
 * interpolation mode, the current point and D01/D02/D03 operations.
 * Attributes, aperture macros, regions and every other command are skipped.
 */
export class GerberOutlineParser {
  constructor(private readonly options: GerberParserOptions = {}) {}

  parse(content: string): GerberParseResult {
    const resolver = new CoordinateResolver({ units: 'mm', source: this.options.source });
    const state: PlotterState = {
      current: { x: null, y: null },
      interpolation: 'linear',
      apertureId: null,
      lastOperation: null,
    };
    const apertures = new Set<number>();
    const segments: OutlineSegment[] = [];

    let commandCount = 0;
    let skippedCount = 0;
    let terminated = false;

    for (const raw of tokenizeGerber(content)) {
      commandCount++;
      const command = classifyGerberCommand(raw, this.options.source);

      switch (command.kind) {
        case 'comment':
          break;
        case 'format':
          resolver.setZeroSuppression(command.zeroSuppression);
          resolver.setMode(command.mode);
          resolver.setFormat({ x: command.x, y: command.y });
          break;
        case 'units':
          resolver.setUnits(command.units);
          break;
        case 'coordinate-mode':
          resolver.setMode(command.mode);
          break;
        case 'aperture-definition':
          apertures.add(command.code);
          break;
        case 'select-aperture':
          state.apertureId = command.code;
          break;
        case 'interpolation':
          state.interpolation = command.mode;
          break;
        case 'operation': {
          const applied = this.applyOperation(command, state, resolver, segments, raw.line);
          if (!applied) skippedCount++;
          break;
        }
        case 'end-of-program':
          terminated = true;
          break;
        case 'unknown':
          skippedCount++;
          break;
      }

      if (terminated) break;
    }

    return {
      segments,
      commandCount,
      skippedCount,
      units: resolver.getUnits(),
      apertureCount: apertures.size,
      aperture: state.apertureId,
      terminated,
    };
  }

  // Returns false when the operation had no effect on the plotter
  private applyOperation(
    command: OperationCommand,
    state: PlotterState,
    resolver: CoordinateResolver,
    segments: OutlineSegment[],
    line: number
  ): boolean {
    if (command.interpolation) {
      state.interpolation = command.interpolation;
    }

    // Coordinate data without a D code repeats the previous operation
    const code = command.code ?? state.lastOperation;
    if (code === null) {
      return false;
    }
    state.lastOperation = code;

    const nextX = command.x !== undefined
      ? resolver.resolve(command.x, 'x', state.current.x, line)
      : state.current.x;
    const nextY = command.y !== undefined
      ? resolver.resolve(command.y, 'y', state.current.y, line)
      : state.current.y;

    const start = toPoint(state.current.x, state.current.y);
    const end = toPoint(nextX, nextY);

    if (code === 1 && start && end) {
      if (state.interpolation === 'linear') {
        segments.push({ kind: 'line', start, end });
      } else {
        const offsetX = command.i !== undefined ? resolver.decode(command.i, 'x', line) : 0;
        const offsetY = command.j !== undefined ? resolver.decode(command.j, 'y', line) : 0;
        segments.push({
          kind: 'arc',
          start,
          end,
          center: { x: start.x + offsetX, y: start.y + offsetY },
          direction: state.interpolation,
        });
      }
    }

    state.current = { x: nextX, y: nextY };
    return true;
  }
}

function toPoint(x: number | null, y: number | null): Point | null {
  return x === null || y === null ? null : { x, y };
}
