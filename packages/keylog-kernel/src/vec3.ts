/** Minimal 3D vectors: plain tuples. 2D inputs are lifted with z = 0. */
export type Vec3 = [number, number, number];

/**
 * Absolute tolerance for every "is zero", "is parallel" and "is coincident"
 * test in the kernel. Direction tests apply it to normalized vectors.
 */
export const TOLERANCE = 1e-9;

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/** Lift 2 or 3 coordinates into a Vec3 (missing z = 0). */
export function lift(values: readonly number[]): Vec3 {
  return [values[0] ?? 0, values[1] ?? 0, values[2] ?? 0];
}

/** First `dimension` components, for reporting. */
export function take(a: Vec3, dimension: 2 | 3): number[] {
  return dimension === 2 ? [a[0], a[1]] : [a[0], a[1], a[2]];
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(a: Vec3, s: number): Vec3 {
  return [a[0] * s, a[1] * s, a[2] * s];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length(a: Vec3): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1] + a[2] * a[2]);
}

export function normalize(a: Vec3): Vec3 {
  const l = length(a);
  return l > 0 ? [a[0] / l, a[1] / l, a[2] / l] : [0, 0, 0];
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function isZero(a: Vec3): boolean {
  return length(a) < TOLERANCE;
}

/** Direction test on normalized inputs: |â × b̂| below tolerance. */
export function isParallel(a: Vec3, b: Vec3): boolean {
  return length(cross(normalize(a), normalize(b))) < TOLERANCE;
}
