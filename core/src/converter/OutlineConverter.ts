import EventEmitter from 'eventemitter3';
import fs from 'fs/promises';
import { ConversionOptions, resolveConversionOptions } from '../config';
import { DxfDocument } from '../dxf/DxfDocument';
import { ExcellonDrillParser } from '../excellon/ExcellonDrillParser';
import { filterByDiameter } from '../filter/diameter-filter';
import { GerberOutlineParser } from '../gerber/GerberOutlineParser';
import { DrillHit } from '../types';
import { InputNotFoundError } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import {
  ConversionFiles,
  ConversionResult,
  ConversionSources,
  ConverterEvents,
  TextSource,
} from './types';

export interface OutlineConverterDeps {
  logger?: Logger;
}

/**
 * Runs the whole transform: outline and drill texts are parsed
 * independently, the hits are filtered by diameter and the DXF document is
 * built in memory. Any failure aborts the run before a file is written.
 */
export class OutlineConverter extends EventEmitter<ConverterEvents> {
  private readonly options: ConversionOptions;
  private readonly logger: Logger;

  constructor(options: ConversionOptions = resolveConversionOptions(), deps: OutlineConverterDeps = {}) {
    super();
    this.options = options;
    this.logger = deps.logger ?? new Logger('Converter');
  }

  buildDocument(sources: ConversionSources): { document: DxfDocument; result: ConversionResult } {
    const outline = new GerberOutlineParser({ source: sources.outline.name }).parse(sources.outline.content);
    this.logger.debug(
      `${sources.outline.name}: ${outline.segments.length} segments, ` +
        `${outline.skippedCount}/${outline.commandCount} commands skipped`
    );
    if (!outline.terminated) {
      this.logger.warn(`${sources.outline.name} has no end-of-program marker; using what was read`);
    }
    this.emit('outlineParsed', sources.outline.name, outline);

    const hits: DrillHit[] = [];
    for (const drill of sources.drills) {
      const parsed = new ExcellonDrillParser({ plated: drill.plated, source: drill.name }).parse(drill.content);
      this.logger.debug(`${drill.name}: ${parsed.hits.length} hits, ${parsed.tools.size} tools`);
      this.emit('drillParsed', drill.name, drill.plated, parsed);
      hits.push(...parsed.hits);
    }

    const holes = filterByDiameter(hits, this.options.range);

    const document = new DxfDocument({ arcTolerance: this.options.arcTolerance });
    for (const segment of outline.segments) {
      document.addSegment(segment);
    }
    for (const hole of holes) {
      document.addHole(hole);
    }

    return {
      document,
      result: {
        outlineEntityCount: outline.segments.length,
        holeCount: holes.length,
        totalHitCount: hits.length,
        holes,
        diameters: uniqueDiameters(holes),
      },
    };
  }

  async convert(files: ConversionFiles): Promise<ConversionResult> {
    // Reads may run side by side; the document is only built once all are in
    const [outline, ...drills] = await Promise.all([
      readSource(files.outlinePath),
      ...files.drills.map((drill) => readSource(drill.path)),
    ]);

    const { document, result } = this.buildDocument({
      outline,
      drills: drills.map((source, index) => ({ ...source, plated: files.drills[index].plated })),
    });

    await document.writeTo(files.outputPath);
    const entityCount = result.outlineEntityCount + result.holeCount;
    this.logger.debug(`Wrote ${entityCount} entities to ${files.outputPath}`);
    this.emit('documentWritten', files.outputPath, entityCount);

    return { ...result, outputPath: files.outputPath };
  }
}

async function readSource(path: string): Promise<TextSource> {
  try {
    return { name: path, content: await fs.readFile(path, 'utf-8') };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputNotFoundError(`Cannot read ${path}: ${reason}`, { source: path });
  }
}

function uniqueDiameters(holes: DrillHit[]): number[] {
  const rounded = holes.map((hole) => Math.round(hole.diameter * 1e6) / 1e6);
  return [...new Set(rounded)].sort((a, b) => a - b);
}
