/**
 * Distance routines.
 *
 * Crossing or touching shapes have distance 0 and stay `ok`. Parallel
 * shapes that coincide report `coincident` with distance 0; whether that
 * completes is the compatibility rule's call, not ours.
 */

import { Derivation, type CalculationResult } from '../derivation.js';
import type { LineShape, PlaneShape, PointShape } from '../shapes.js';
import {
  TOLERANCE, add, sub, scale, dot, cross, length, normalize, isZero, isParallel, type Vec3,
} from '../vec3.js';

export function pointPointDistance(a: PointShape, b: PointShape): CalculationResult {
  const d = new Derivation('point_point_distance', a.dimension);
  const ab = d.vector('AB', 'B - A', sub(b.at, a.at));
  const ab2 = d.scalar('AB2', 'AB·AB', dot(ab, ab));
  const distance = d.scalar('distance', '√(AB·AB)', Math.sqrt(ab2));
  return d.set('distance', distance).ok();
}

/**
 * Drop a perpendicular from p onto the line through `origin` along `u`.
 * Records AP, AP·u, u·u, t, H, HP and the distance |HP|.
 */
function projectOntoLine(d: Derivation, p: Vec3, origin: Vec3, u: Vec3, names = { P: 'P', A: 'A' }): number {
  const ap = d.vector(`${names.A}${names.P}`, `${names.P} - ${names.A}`, sub(p, origin));
  const apu = d.scalar(`${names.A}${names.P}_u`, `${names.A}${names.P}·u`, dot(ap, u));
  const uu = d.scalar('uu', 'u·u', dot(u, u));
  const t = d.scalar('t', `${names.A}${names.P}·u / u·u`, apu / uu);
  const h = d.vector('H', `${names.A} + t·u`, add(origin, scale(u, t)));
  const hp = d.vector(`H${names.P}`, `${names.P} - H`, sub(p, h));
  d.setVector('foot', h);
  return d.scalar('distance', `√(H${names.P}·H${names.P})`, length(hp));
}

export function pointLineDistance(p: PointShape, line: LineShape): CalculationResult {
  const d = new Derivation('point_line_distance', p.dimension);
  if (isZero(line.direction)) return d.degenerate('zero_vector');
  const distance = projectOntoLine(d, p.at, line.point, line.direction);
  return d.set('distance', distance).ok();
}

/** Signed plane value n·P + d, n·n and the distance |n·P + d| / √(n·n). */
function planeOffset(d: Derivation, point: Vec3, plane: PlaneShape, label: string): number {
  const num = d.scalar('num', `n·${label} + d`, dot(plane.normal, point) + plane.d);
  const nn = d.scalar('nn', 'n·n', dot(plane.normal, plane.normal));
  const distance = d.scalar('distance', `|n·${label} + d| / √(n·n)`, Math.abs(num) / Math.sqrt(nn));
  d.setVector('foot', sub(point, scale(plane.normal, num / nn)));
  return distance;
}

export function pointPlaneDistance(p: PointShape, plane: PlaneShape): CalculationResult {
  const d = new Derivation('point_plane_distance', 3);
  if (isZero(plane.normal)) return d.degenerate('zero_vector');
  const distance = planeOffset(d, p.at, plane, 'P');
  return d.set('distance', distance).ok();
}

export function lineLineDistance(l1: LineShape, l2: LineShape): CalculationResult {
  const d = new Derivation('line_line_distance', l1.dimension);
  const u = l1.direction;
  const v = l2.direction;
  if (isZero(u) || isZero(v)) return d.degenerate('zero_vector');

  if (isParallel(u, v)) {
    d.variant('parallel');
    const distance = projectOntoLine(d, l2.point, l1.point, u, { P: 'B', A: 'A' });
    if (distance < TOLERANCE) return d.set('distance', 0).degenerate('coincident');
    return d.set('distance', distance).ok();
  }

  if (l1.dimension === 2) {
    // Non-parallel lines in the plane always cross.
    d.variant('crossing');
    d.crossProduct('n', 'u × v', cross(u, v));
    return d.set('distance', 0).ok();
  }

  d.variant('skew');
  const ab = d.vector('AB', 'B - A', sub(l2.point, l1.point));
  const n = d.crossProduct('n', 'u × v', cross(u, v));
  const nn = d.scalar('nn', 'n·n', dot(n, n));
  const abn = d.scalar('ABn', 'AB·n', dot(ab, n));
  const distance = d.scalar('distance', '|AB·n| / √(n·n)', Math.abs(abn) / Math.sqrt(nn));
  return d.set('distance', distance).ok();
}

export function linePlaneDistance(line: LineShape, plane: PlaneShape): CalculationResult {
  const d = new Derivation('line_plane_distance', 3);
  if (isZero(line.direction) || isZero(plane.normal)) return d.degenerate('zero_vector');

  d.scalar('nu', 'n·u', dot(plane.normal, line.direction));
  if (Math.abs(dot(normalize(plane.normal), normalize(line.direction))) >= TOLERANCE) {
    return d.variant('crossing').set('distance', 0).ok();
  }

  d.variant('parallel');
  const distance = planeOffset(d, line.point, plane, 'A');
  if (distance < TOLERANCE) return d.set('distance', 0).degenerate('coincident');
  return d.set('distance', distance).ok();
}

export function planePlaneDistance(p1: PlaneShape, p2: PlaneShape): CalculationResult {
  const d = new Derivation('plane_plane_distance', 3);
  if (isZero(p1.normal) || isZero(p2.normal)) return d.degenerate('zero_vector');

  if (!isParallel(p1.normal, p2.normal)) {
    d.crossProduct('dir', 'n₁ × n₂', cross(p1.normal, p2.normal));
    return d.variant('crossing').set('distance', 0).ok();
  }

  // n₁ = k·n₂, so plane 2 rescaled reads n₁·x + k·d₂ = 0.
  d.variant('parallel');
  const n1n2 = d.scalar('n1n2', 'n₁·n₂', dot(p1.normal, p2.normal));
  const n2n2 = d.scalar('n2n2', 'n₂·n₂', dot(p2.normal, p2.normal));
  const k = d.scalar('k', 'n₁·n₂ / n₂·n₂', n1n2 / n2n2);
  const dd = d.scalar('dd', 'd₁ - k·d₂', p1.d - k * p2.d);
  const n1n1 = d.scalar('n1n1', 'n₁·n₁', dot(p1.normal, p1.normal));
  const distance = d.scalar('distance', '|d₁ - k·d₂| / √(n₁·n₁)', Math.abs(dd) / Math.sqrt(n1n1));
  if (distance < TOLERANCE) return d.set('distance', 0).degenerate('coincident');
  return d.set('distance', distance).ok();
}
