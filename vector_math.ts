export type Vec3 = [number, number, number];

export type Facet = {
  normal: Vec3;
  vertices: [Vec3, Vec3, Vec3];
};

export const subtract = (a: Vec3, b: Vec3): Vec3 => [a[0] - b[0], a[1] - b[1], a[2] - b[2]];

export const crossProduct = (a: Vec3, b: Vec3): Vec3 => {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
};

export const dotProduct = (a: Vec3, b: Vec3): number => a[0] * b[0] + a[1] * b[1] + a[2] * b[2];

export const magnitude = (a: Vec3): number => Math.sqrt(dotProduct(a, a));

export const normalize = (a: Vec3): Vec3 => {
  const len = magnitude(a);
  if (len === 0) return [0, 0, 0];
  return [a[0] / len, a[1] / len, a[2] / len];
};

/**
 * True when v1 -> v2 -> v3 winds counterclockwise seen from the side the
 * normal points to. Strict: a degenerate facet (collinear or coincident
 * vertices) gives a zero dot product and is not counterclockwise, and so is
 * anything involving NaN.
 */
export const isCounterClockwise = (v1: Vec3, v2: Vec3, v3: Vec3, normal: Vec3): boolean => {
  const computed = crossProduct(subtract(v2, v1), subtract(v3, v1));
  return dotProduct(computed, normal) > 0;
};

export const hasNegativeCoordinate = (vertices: readonly Vec3[]): boolean =>
  vertices.some((v) => v[0] < 0 || v[1] < 0 || v[2] < 0);

export const hasNaN = (vectors: readonly Vec3[]): boolean =>
  vectors.some((v) => Number.isNaN(v[0]) || Number.isNaN(v[1]) || Number.isNaN(v[2]));
