/**
 * Shapes: wire descriptors and the tagged union the kernel computes on.
 *
 *   { kind: 'line', dimension: 3, parameters: [1, 2, 3, 1, 0, 1] }
 *     →  { kind: 'line', dimension: 3, point: [1, 2, 3], direction: [1, 0, 1] }
 *
 * Parameter layouts are fixed per kind and dimension (see SHAPE_LAYOUTS).
 */

import { lift, type Vec3 } from './vec3.js';
import type { Result } from './result.js';

// ─── Enumerations ────────────────────────────────────────────────

export const SHAPE_KINDS = ['point', 'line', 'plane', 'circle', 'sphere'] as const;
export type ShapeKind = typeof SHAPE_KINDS[number];

export const OPERATIONS = ['distance', 'intersection', 'area', 'volume', 'line_equation'] as const;
export type Operation = typeof OPERATIONS[number];

export type Dimension = 2 | 3;

/** Distance and intersection take two shapes; everything else takes one. */
export function isBinary(operation: Operation): boolean {
  switch (operation) {
    case 'distance':
    case 'intersection':
      return true;
    case 'area':
    case 'volume':
    case 'line_equation':
      return false;
  }
}

// ─── Descriptors (wire form) ─────────────────────────────────────

export interface ShapeDescriptor {
  readonly kind: ShapeKind;
  readonly dimension: Dimension;
  readonly parameters: readonly number[];
}

export interface OperationRequest {
  readonly operation: Operation;
  readonly shape_a: ShapeDescriptor;
  readonly shape_b?: ShapeDescriptor;
  readonly calculator_model: string;
}

/** Parameter names per kind; a missing dimension means the kind does not exist there. */
export const SHAPE_LAYOUTS: Readonly<Record<ShapeKind, Partial<Record<Dimension, readonly string[]>>>> = {
  point: { 2: ['x', 'y'], 3: ['x', 'y', 'z'] },
  line: { 2: ['x0', 'y0', 'dx', 'dy'], 3: ['x0', 'y0', 'z0', 'dx', 'dy', 'dz'] },
  plane: { 3: ['a', 'b', 'c', 'd'] },
  circle: { 2: ['cx', 'cy', 'r'] },
  sphere: { 3: ['cx', 'cy', 'cz', 'r'] },
};

// ─── Parsed shapes ───────────────────────────────────────────────

export interface PointShape { kind: 'point'; dimension: Dimension; at: Vec3 }
export interface LineShape { kind: 'line'; dimension: Dimension; point: Vec3; direction: Vec3 }
/** a·x + b·y + c·z + d = 0 */
export interface PlaneShape { kind: 'plane'; dimension: 3; normal: Vec3; d: number }
export interface CircleShape { kind: 'circle'; dimension: 2; center: Vec3; radius: number }
export interface SphereShape { kind: 'sphere'; dimension: 3; center: Vec3; radius: number }

export type Shape = PointShape | LineShape | PlaneShape | CircleShape | SphereShape;

export type ShapeOf<K extends ShapeKind> = Extract<Shape, { kind: K }>;

export interface InvalidShape {
  code: 'invalid_shape';
  kind: ShapeKind;
  dimension: Dimension;
  reason: string;
}

function invalid(desc: ShapeDescriptor, reason: string): Result<Shape, InvalidShape> {
  return { ok: false, error: { code: 'invalid_shape', kind: desc.kind, dimension: desc.dimension, reason } };
}

/** Check a descriptor against its layout and build the tagged shape. */
export function parseShape(desc: ShapeDescriptor): Result<Shape, InvalidShape> {
  const layout = SHAPE_LAYOUTS[desc.kind][desc.dimension];
  if (!layout) {
    return invalid(desc, `${desc.kind} does not exist in ${desc.dimension}D`);
  }
  const p = desc.parameters;
  if (p.length !== layout.length) {
    return invalid(desc, `expected ${layout.length} parameters (${layout.join(', ')}), got ${p.length}`);
  }
  const bad = p.findIndex((v) => !Number.isFinite(v));
  if (bad >= 0) {
    return invalid(desc, `parameter ${layout[bad]} must be a finite number`);
  }

  const dim = desc.dimension;
  switch (desc.kind) {
    case 'point':
      return { ok: true, value: { kind: 'point', dimension: dim, at: lift(p) } };
    case 'line':
      return {
        ok: true,
        value: { kind: 'line', dimension: dim, point: lift(p.slice(0, dim)), direction: lift(p.slice(dim)) },
      };
    case 'plane':
      return { ok: true, value: { kind: 'plane', dimension: 3, normal: lift(p.slice(0, 3)), d: p[3] } };
    case 'circle':
      if (p[2] <= 0) return invalid(desc, `radius must be positive, got ${p[2]}`);
      return { ok: true, value: { kind: 'circle', dimension: 2, center: lift(p.slice(0, 2)), radius: p[2] } };
    case 'sphere':
      if (p[3] <= 0) return invalid(desc, `radius must be positive, got ${p[3]}`);
      return { ok: true, value: { kind: 'sphere', dimension: 3, center: lift(p.slice(0, 3)), radius: p[3] } };
  }
}

/**
 * Narrow a shape to the kind a formula expects. The table loader checks
 * rule kinds against formula signatures, so a mismatch here is a bug.
 */
export function expectKind<K extends ShapeKind>(shape: Shape | undefined, kind: K): ShapeOf<K> {
  if (shape === undefined || !isKind(shape, kind)) {
    throw new Error(`Expected a ${kind}, got ${shape?.kind ?? 'nothing'}`);
  }
  return shape;
}

function isKind<K extends ShapeKind>(shape: Shape, kind: K): shape is ShapeOf<K> {
  return shape.kind === kind;
}
