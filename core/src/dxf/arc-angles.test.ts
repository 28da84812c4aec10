import { angleOf, normalizeAngle, toDxfArc } from './arc-angles';
import { ArcSegment } from '../types';
import { GeometryError } from '../utils/error-handler';

const quarter = (direction: ArcSegment['direction']): ArcSegment => ({
  kind: 'arc',
  start: { x: 10, y: 0 },
  end: { x: 0, y: 10 },
  center: { x: 0, y: 0 },
  direction,
});

describe('normalizeAngle', () => {
  test('should wrap into [0, 360)', () => {
    expect(normalizeAngle(-90)).toBe(270);
    expect(normalizeAngle(360)).toBe(0);
    expect(normalizeAngle(725)).toBe(5);
    expect(normalizeAngle(-0)).toBe(0);
    expect(normalizeAngle(-720)).toBe(0);
  });
});

describe('angleOf', () => {
  test('should measure counter-clockwise from the positive X axis', () => {
    const center = { x: 1, y: 1 };

    expect(angleOf(center, { x: 2, y: 1 })).toBe(0);
    expect(angleOf(center, { x: 0, y: 1 })).toBeCloseTo(180, 9);
    expect(angleOf(center, { x: 1, y: 0 })).toBeCloseTo(270, 9);
  });
});

describe('toDxfArc', () => {
  test('should swap angles of a clockwise arc so the CCW sweep retraces it', () => {
    const arc = toDxfArc(quarter('clockwise'), 0.005);

    expect(arc.center).toEqual({ x: 0, y: 0 });
    expect(arc.radius).toBe(10);
    expect(arc.startAngle).toBeCloseTo(90, 9);
    expect(arc.endAngle).toBe(0);
  });

  test('should keep the angle order of a counter-clockwise arc', () => {
    const arc = toDxfArc(quarter('counterclockwise'), 0.005);

    expect(arc.radius).toBe(10);
    expect(arc.startAngle).toBe(0);
    expect(arc.endAngle).toBeCloseTo(90, 9);
  });

  test('should write coinciding endpoints as a full circle', () => {
    const arc = toDxfArc(
      { kind: 'arc', start: { x: 5, y: 0 }, end: { x: 5, y: 0 }, center: { x: 0, y: 0 }, direction: 'clockwise' },
      0.005
    );

    expect(arc).toEqual({ center: { x: 0, y: 0 }, radius: 5, startAngle: 0, endAngle: 360 });
  });

  test('should treat endpoints within a nanometre as a full circle', () => {
    const arc = toDxfArc(
      { kind: 'arc', start: { x: 5, y: 0 }, end: { x: 5, y: 1e-12 }, center: { x: 0, y: 0 }, direction: 'counterclockwise' },
      0.005
    );

    expect(arc.startAngle).toBe(0);
    expect(arc.endAngle).toBe(360);
  });

  test('should keep a short arc whose chord is below the radius tolerance', () => {
    const sweep = 0.2 * (Math.PI / 180);
    const short: ArcSegment = {
      kind: 'arc',
      start: { x: 1, y: 0 },
      end: { x: Math.cos(sweep), y: Math.sin(sweep) },
      center: { x: 0, y: 0 },
      direction: 'counterclockwise',
    };

    const ccw = toDxfArc(short, 0.005);
    expect(ccw.startAngle).toBe(0);
    expect(ccw.endAngle).toBeCloseTo(0.2, 9);

    const cw = toDxfArc({ ...short, direction: 'clockwise' }, 0.005);
    expect(cw.startAngle).toBeCloseTo(0.2, 9);
    expect(cw.endAngle).toBe(0);
  });

  test('should fail with GeometryError when the radii disagree', () => {
    const skewed: ArcSegment = { ...quarter('clockwise'), end: { x: 0, y: 12 } };

    expect(() => toDxfArc(skewed, 0.005)).toThrow(GeometryError);
  });

  test('should accept radii that differ within the tolerance', () => {
    const nearly: ArcSegment = { ...quarter('counterclockwise'), end: { x: 0, y: 10.004 } };

    expect(toDxfArc(nearly, 0.005).radius).toBeCloseTo(10.004, 9);
  });
});
