import fs from 'fs/promises';
import { DEFAULT_ARC_TOLERANCE_MM } from '../config';
import { Circle, DrillHit, OutlineSegment, Point } from '../types';
import { DxfArc, toDxfArc } from './arc-angles';

export const OUTLINE_LAYER = 'OUTLINE';
export const MOUNTING_HOLES_LAYER = 'MOUNTING_HOLES';

export type DxfLayer = typeof OUTLINE_LAYER | typeof MOUNTING_HOLES_LAYER;

export type DxfEntity =
  | { type: 'LINE'; layer: DxfLayer; start: Point; end: Point }
  | { type: 'ARC'; layer: DxfLayer; arc: DxfArc }
  | { type: 'CIRCLE'; layer: DxfLayer; circle: Circle };

export interface DxfDocumentOptions {
  arcTolerance?: number;
}

// AutoCAD colour index per layer
const LAYERS: Array<{ name: DxfLayer; color: number }> = [
  { name: OUTLINE_LAYER, color: 7 },
  { name: MOUNTING_HOLES_LAYER, color: 1 },
];

// $INSUNITS value for millimetres
const UNITS_MILLIMETERS = 4;

type GroupValue = string | number;

function coord(value: number): string {
  return value.toFixed(6);
}

/**
 * Minimal ASCII DXF document with two fixed layers: the board outline as
 * LINE/ARC entities and the mounting holes as CIRCLE entities.
 */
export class DxfDocument {
  private readonly entities: DxfEntity[] = [];
  private readonly arcTolerance: number;

  constructor(options: DxfDocumentOptions = {}) {
    this.arcTolerance = options.arcTolerance ?? DEFAULT_ARC_TOLERANCE_MM;
  }

  addSegment(segment: OutlineSegment): void {
    switch (segment.kind) {
      case 'line':
        this.entities.push({
          type: 'LINE',
          layer: OUTLINE_LAYER,
          start: { ...segment.start },
          end: { ...segment.end },
        });
        break;
      case 'arc':
        this.entities.push({
          type: 'ARC',
          layer: OUTLINE_LAYER,
          arc: toDxfArc(segment, this.arcTolerance),
        });
        break;
    }
  }

  addHole(hit: DrillHit): void {
    this.entities.push({
      type: 'CIRCLE',
      layer: MOUNTING_HOLES_LAYER,
      circle: { center: { ...hit.position }, radius: hit.diameter / 2 },
    });
  }

  getEntities(layer?: DxfLayer): DxfEntity[] {
    return layer ? this.entities.filter((e) => e.layer === layer) : [...this.entities];
  }

  serialize(): string {
    const pairs: GroupValue[] = [];
    const emit = (...values: GroupValue[]) => {
      pairs.push(...values);
    };

    emit(0, 'SECTION', 2, 'HEADER', 9, '$INSUNITS', 70, UNITS_MILLIMETERS, 0, 'ENDSEC');

    emit(0, 'SECTION', 2, 'TABLES', 0, 'TABLE', 2, 'LAYER', 70, LAYERS.length);
    for (const layer of LAYERS) {
      emit(0, 'LAYER', 2, layer.name, 70, 0, 62, layer.color, 6, 'CONTINUOUS');
    }
    emit(0, 'ENDTAB', 0, 'ENDSEC');

    emit(0, 'SECTION', 2, 'ENTITIES');
    for (const entity of this.entities) {
      switch (entity.type) {
        case 'LINE':
          emit(
            0, 'LINE', 8, entity.layer,
            10, coord(entity.start.x), 20, coord(entity.start.y), 30, '0.0',
            11, coord(entity.end.x), 21, coord(entity.end.y), 31, '0.0'
          );
          break;
        case 'ARC':
          emit(
            0, 'ARC', 8, entity.layer,
            10, coord(entity.arc.center.x), 20, coord(entity.arc.center.y), 30, '0.0',
            40, coord(entity.arc.radius),
            50, coord(entity.arc.startAngle), 51, coord(entity.arc.endAngle)
          );
          break;
        case 'CIRCLE':
          emit(
            0, 'CIRCLE', 8, entity.layer,
            10, coord(entity.circle.center.x), 20, coord(entity.circle.center.y), 30, '0.0',
            40, coord(entity.circle.radius)
          );
          break;
      }
    }
    emit(0, 'ENDSEC', 0, 'EOF');

    return pairs.map((value) => `${value}\n`).join('');
  }

  async writeTo(path: string): Promise<void> {
    await fs.writeFile(path, this.serialize(), 'ascii');
  }
}
