import { ArcSegment, Point } from '../types';
import { GeometryError } from '../utils/error-handler';

// Arc as DXF describes it: angles in degrees, swept counter-clockwise
export interface DxfArc {
  center: Point;
  radius: number;
  startAngle: number;
  endAngle: number;
}

// Endpoints closer than this are the same point (far below any Gerber coordinate resolution)
export const COINCIDENT_EPSILON_MM = 1e-9;

// Wraps into [0, 360)
export function normalizeAngle(degrees: number): number {
  const wrapped = degrees % 360;
  const positive = wrapped < 0 ? wrapped + 360 : wrapped;
  return positive === 0 || positive === 360 ? 0 : positive;
}

export function angleOf(center: Point, point: Point): number {
  return normalizeAngle(Math.atan2(point.y - center.y, point.x - center.x) * (180 / Math.PI));
}

/**
 * Converts a directed arc into DXF form. DXF arcs always run
 * counter-clockwise from start to end angle, so a clockwise arc is written
 * with its angles swapped. Coinciding endpoints mean a full circle.
 */
export function toDxfArc(arc: ArcSegment, tolerance: number): DxfArc {
  const startRadius = Math.hypot(arc.start.x - arc.center.x, arc.start.y - arc.center.y);
  const radius = Math.hypot(arc.end.x - arc.center.x, arc.end.y - arc.center.y);

  if (Math.abs(startRadius - radius) > tolerance) {
    throw new GeometryError(
      `Arc radii disagree: |start - center| = ${startRadius.toFixed(6)}, ` +
        `|end - center| = ${radius.toFixed(6)}`,
      { start: arc.start, end: arc.end, center: arc.center }
    );
  }

  const center = { ...arc.center };

  if (Math.hypot(arc.end.x - arc.start.x, arc.end.y - arc.start.y) <= COINCIDENT_EPSILON_MM) {
    return { center, radius, startAngle: 0, endAngle: 360 };
  }

  const from = angleOf(arc.center, arc.start);
  const to = angleOf(arc.center, arc.end);

  return arc.direction === 'clockwise'
    ? { center, radius, startAngle: to, endAngle: from }
    : { center, radius, startAngle: from, endAngle: to };
}
