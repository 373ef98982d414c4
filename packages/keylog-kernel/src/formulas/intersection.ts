/**
 * Intersection routines.
 *
 * A unique answer is `ok`. Everything else is `degenerate` with the reason
 * that rules it out: parallel, coincident, skew, disjoint, zero_vector.
 */

import { Derivation, type CalculationResult } from '../derivation.js';
import type { CircleShape, LineShape, PlaneShape, SphereShape } from '../shapes.js';
import {
  TOLERANCE, add, sub, scale, dot, cross, length, normalize, isZero, isParallel, type Vec3,
} from '../vec3.js';

export function lineLineIntersection(l1: LineShape, l2: LineShape): CalculationResult {
  const d = new Derivation('line_line_intersection', l1.dimension);
  const u = l1.direction;
  const v = l2.direction;
  if (isZero(u) || isZero(v)) return d.degenerate('zero_vector');

  const ab = d.vector('AB', 'B - A', sub(l2.point, l1.point));
  const n = d.crossProduct('n', 'u × v', cross(u, v));

  if (isParallel(u, v)) {
    // Same line iff B sits on line 1.
    const offset = length(cross(ab, normalize(u)));
    d.scalar('offset', '|AB × û|', offset);
    return d.degenerate(offset < TOLERANCE ? 'coincident' : 'parallel');
  }

  // A + t·u = B + s·v  ⇒  t = ((AB × v)·n) / n·n,  s = ((AB × u)·n) / n·n
  const nn = d.scalar('nn', 'n·n', dot(n, n));
  const tn = d.scalar('tn', '(AB × v)·n', dot(cross(ab, v), n));
  const sn = d.scalar('sn', '(AB × u)·n', dot(cross(ab, u), n));
  const t = d.scalar('t', 'tn / n·n', tn / nn);
  const s = d.scalar('s', 'sn / n·n', sn / nn);
  const p = d.vector('P', 'A + t·u', add(l1.point, scale(u, t)));
  const q = add(l2.point, scale(v, s));

  // Miss distance relative to the coordinates' magnitude.
  const miss = length(sub(p, q)) / Math.max(1, length(p), length(q));
  if (miss >= TOLERANCE) return d.degenerate('skew');
  return d.set('t', t).set('s', s).setVector('point', p).ok();
}

export function linePlaneIntersection(line: LineShape, plane: PlaneShape): CalculationResult {
  const d = new Derivation('line_plane_intersection', 3);
  if (isZero(line.direction) || isZero(plane.normal)) return d.degenerate('zero_vector');

  const na = d.scalar('nA', 'n·A + d', dot(plane.normal, line.point) + plane.d);
  const nu = d.scalar('nu', 'n·u', dot(plane.normal, line.direction));

  if (Math.abs(dot(normalize(plane.normal), normalize(line.direction))) < TOLERANCE) {
    // Direction lies in the plane: either the whole line does, or none of it.
    const offset = Math.abs(na) / length(plane.normal);
    return d.degenerate(offset < TOLERANCE ? 'coincident' : 'parallel');
  }

  const t = d.scalar('t', '-(n·A + d) / n·u', -na / nu);
  const p = d.vector('P', 'A + t·u', add(line.point, scale(line.direction, t)));
  return d.set('t', t).setVector('point', p).ok();
}

export function planePlaneIntersection(p1: PlaneShape, p2: PlaneShape): CalculationResult {
  const d = new Derivation('plane_plane_intersection', 3);
  const n1 = p1.normal;
  const n2 = p2.normal;
  if (isZero(n1) || isZero(n2)) return d.degenerate('zero_vector');

  const dir = d.vector('dir', 'n₁ × n₂', cross(n1, n2));

  if (isParallel(n1, n2)) {
    // n₁ = k·n₂; the planes coincide iff d₁ = k·d₂ after normalizing.
    const k = dot(n1, n2) / dot(n2, n2);
    const gap = Math.abs(p1.d - k * p2.d) / length(n1);
    d.scalar('gap', '|d₁ - k·d₂| / |n₁|', gap);
    return d.degenerate(gap < TOLERANCE ? 'coincident' : 'parallel');
  }

  // Planes as n·x = h with h = -d; the point c₁·n₁ + c₂·n₂ lies on both.
  const det = d.scalar('det', 'dir·dir', dot(dir, dir));
  const n1n1 = d.scalar('n1n1', 'n₁·n₁', dot(n1, n1));
  const n2n2 = d.scalar('n2n2', 'n₂·n₂', dot(n2, n2));
  const n1n2 = d.scalar('n1n2', 'n₁·n₂', dot(n1, n2));
  const h1 = -p1.d;
  const h2 = -p2.d;
  const c1 = d.scalar('c1', '(h₁·n₂·n₂ - h₂·n₁·n₂) / det', (h1 * n2n2 - h2 * n1n2) / det);
  const c2 = d.scalar('c2', '(h₂·n₁·n₁ - h₁·n₁·n₂) / det', (h2 * n1n1 - h1 * n1n2) / det);
  const p = d.vector('P', 'c₁·n₁ + c₂·n₂', add(scale(n1, c1), scale(n2, c2)));
  return d.setVector('point', p).setVector('direction', dir).ok();
}

// ─── Line against circle / sphere ─────────────────────────────────

/**
 * Solve |A + t·u - C|² = r²: a·t² + b·t + c = 0 with a = u·u,
 * b = 2·f·u, c = f·f - r², f = A - C.
 */
function lineRound(d: Derivation, line: LineShape, center: Vec3, radius: number): CalculationResult {
  const u = line.direction;
  if (isZero(u)) return d.degenerate('zero_vector');

  const f = d.vector('f', 'A - C', sub(line.point, center));
  const a = d.scalar('a', 'u·u', dot(u, u));
  const b = d.scalar('b', '2·f·u', 2 * dot(f, u));
  const c = d.scalar('c', 'f·f - r²', dot(f, f) - radius * radius);
  const disc = d.scalar('disc', 'b² - 4·a·c', b * b - 4 * a * c);

  // disc / 4a = r² - (distance from C to the line)², independent of |u|.
  const margin = disc / (4 * a);
  if (margin < -TOLERANCE) return d.degenerate('disjoint');

  if (Math.abs(margin) <= TOLERANCE) {
    d.variant('tangent');
    const t = d.scalar('t1', '-b / 2a', -b / (2 * a));
    const p = d.vector('P1', 'A + t₁·u', add(line.point, scale(u, t)));
    return d.set('count', 1).setVector('p1', p).ok();
  }

  d.variant('secant');
  const root = d.scalar('sq', '√disc', Math.sqrt(disc));
  const t1 = d.scalar('t1', '(-b - √disc) / 2a', (-b - root) / (2 * a));
  const t2 = d.scalar('t2', '(-b + √disc) / 2a', (-b + root) / (2 * a));
  const p1 = d.vector('P1', 'A + t₁·u', add(line.point, scale(u, t1)));
  const p2 = d.vector('P2', 'A + t₂·u', add(line.point, scale(u, t2)));
  return d.set('count', 2).setVector('p1', p1).setVector('p2', p2).ok();
}

export function lineCircleIntersection(line: LineShape, circle: CircleShape): CalculationResult {
  return lineRound(new Derivation('line_circle_intersection', 2), line, circle.center, circle.radius);
}

export function lineSphereIntersection(line: LineShape, sphere: SphereShape): CalculationResult {
  return lineRound(new Derivation('line_sphere_intersection', 3), line, sphere.center, sphere.radius);
}

// ─── Round against round ──────────────────────────────────────────

interface RoundPair {
  /** Distance between centers. */
  dist: number;
  /** Unit vector from C₁ to C₂. */
  axis: Vec3;
  /** Foot of the radical plane on the center line. */
  mid: Vec3;
  /** Half-chord: radius of the intersection circle, 0 when tangent. */
  h: number;
}

/** Shared center-line derivation; returns a degenerate result when there is no finite answer. */
function roundPair(
  d: Derivation,
  c1: Vec3, r1: number,
  c2: Vec3, r2: number,
): RoundPair | CalculationResult {
  const cc = d.vector('C1C2', 'C₂ - C₁', sub(c2, c1));
  const dist = d.scalar('d', '|C₁C₂|', length(cc));

  if (dist < TOLERANCE && Math.abs(r1 - r2) < TOLERANCE) return d.degenerate('coincident');
  if (dist > r1 + r2 + TOLERANCE || dist < Math.abs(r1 - r2) - TOLERANCE) {
    return d.degenerate('disjoint');
  }

  const a = d.scalar('a', '(r₁² - r₂² + d²) / 2d', (r1 * r1 - r2 * r2 + dist * dist) / (2 * dist));
  const h = d.scalar('h', '√(r₁² - a²)', Math.sqrt(Math.max(0, r1 * r1 - a * a)));
  const axis = scale(cc, 1 / dist);
  const mid = d.vector('M', 'C₁ + (a/d)·C₁C₂', add(c1, scale(axis, a)));
  return { dist, axis, mid, h };
}

function isResult(value: RoundPair | CalculationResult): value is CalculationResult {
  return 'status' in value;
}

export function circleCircleIntersection(a: CircleShape, b: CircleShape): CalculationResult {
  const d = new Derivation('circle_circle_intersection', 2);
  const pair = roundPair(d, a.center, a.radius, b.center, b.radius);
  if (isResult(pair)) return pair;

  if (pair.h < TOLERANCE) {
    return d.variant('tangent').set('count', 1).setVector('p1', pair.mid).ok();
  }

  d.variant('secant');
  const perp: Vec3 = [-pair.axis[1], pair.axis[0], 0];
  const p1 = d.vector('P1', 'M + h·n⊥', add(pair.mid, scale(perp, pair.h)));
  const p2 = d.vector('P2', 'M - h·n⊥', sub(pair.mid, scale(perp, pair.h)));
  return d.set('count', 2).setVector('p1', p1).setVector('p2', p2).ok();
}

export function sphereSphereIntersection(a: SphereShape, b: SphereShape): CalculationResult {
  const d = new Derivation('sphere_sphere_intersection', 3);
  const pair = roundPair(d, a.center, a.radius, b.center, b.radius);
  if (isResult(pair)) return pair;

  // Intersection circle: center M, radius h, in the plane with normal C₁C₂.
  return d
    .setVector('center', pair.mid)
    .set('radius', pair.h < TOLERANCE ? 0 : pair.h)
    .setVector('normal', pair.axis)
    .ok();
}
