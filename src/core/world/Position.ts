// World-space coordinate. X/Y is the walking plane, Z is elevation.
export interface Position {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export const POSITION_EPSILON = 0.01;

export function pos(x: number, y: number, z = 0): Position {
  return { x, y, z };
}

export function distance(a: Position, b: Position): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  const dz = a.z - b.z;
  return Math.sqrt(dx * dx + dy * dy + dz * dz);
}

export function lerp(a: Position, b: Position, t: number): Position {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    z: a.z + (b.z - a.z) * t,
  };
}

export function approxEquals(a: Position, b: Position): boolean {
  return (
    Math.abs(a.x - b.x) < POSITION_EPSILON &&
    Math.abs(a.y - b.y) < POSITION_EPSILON &&
    Math.abs(a.z - b.z) < POSITION_EPSILON
  );
}

export function formatPosition(p: Position): string {
  return `(${p.x.toFixed(1)}, ${p.y.toFixed(1)}, ${p.z.toFixed(1)})`;
}

export function pathLength(points: readonly Position[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += distance(points[i - 1], points[i]);
  }
  return total;
}
