import { DIAMETER_PRECISION } from '../config';
import { DiameterRange, DrillHit } from '../types';

const SCALE = 10 ** DIAMETER_PRECISION;

export function roundDiameter(value: number): number {
  return Math.round(value * SCALE) / SCALE;
}

// Both bounds are inclusive; a missing max means no upper bound
export function isWithinRange(diameter: number, range: DiameterRange): boolean {
  const d = roundDiameter(diameter);
  if (d < roundDiameter(range.min)) return false;
  return range.max === undefined || d <= roundDiameter(range.max);
}

export function filterByDiameter(hits: readonly DrillHit[], range: DiameterRange): DrillHit[] {
  return hits.filter((hit) => isWithinRange(hit.diameter, range));
}
