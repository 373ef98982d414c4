/**
 * Geometry Kernel: one routine per formula id.
 *
 * The formula table is exhaustive over FormulaId, so adding an id without
 * a routine (or a routine without an id) fails to compile. Each formula
 * declares the shape kinds it takes; the table loader holds compatibility
 * rules to that signature.
 */

import type { CalculationResult } from './derivation.js';
import { expectKind, type Operation, type Shape, type ShapeKind } from './shapes.js';
import {
  pointPointDistance, pointLineDistance, pointPlaneDistance,
  lineLineDistance, linePlaneDistance, planePlaneDistance,
} from './formulas/distance.js';
import {
  lineLineIntersection, linePlaneIntersection, planePlaneIntersection,
  lineCircleIntersection, lineSphereIntersection,
  circleCircleIntersection, sphereSphereIntersection,
} from './formulas/intersection.js';
import { circleArea, sphereSurfaceArea, sphereVolume, lineEquation } from './formulas/measure.js';

export const FORMULA_IDS = [
  'point_point_distance',
  'point_line_distance',
  'point_plane_distance',
  'line_line_distance',
  'line_plane_distance',
  'plane_plane_distance',
  'line_line_intersection',
  'line_plane_intersection',
  'plane_plane_intersection',
  'line_circle_intersection',
  'line_sphere_intersection',
  'circle_circle_intersection',
  'sphere_sphere_intersection',
  'circle_area',
  'sphere_surface_area',
  'sphere_volume',
  'line_equation',
] as const;

export type FormulaId = typeof FORMULA_IDS[number];

export interface FormulaSpec {
  operation: Operation;
  kinds: readonly [ShapeKind] | readonly [ShapeKind, ShapeKind];
  run: (a: Shape, b?: Shape) => CalculationResult;
}

export const FORMULAS = {
  point_point_distance: {
    operation: 'distance',
    kinds: ['point', 'point'],
    run: (a, b) => pointPointDistance(expectKind(a, 'point'), expectKind(b, 'point')),
  },
  point_line_distance: {
    operation: 'distance',
    kinds: ['point', 'line'],
    run: (a, b) => pointLineDistance(expectKind(a, 'point'), expectKind(b, 'line')),
  },
  point_plane_distance: {
    operation: 'distance',
    kinds: ['point', 'plane'],
    run: (a, b) => pointPlaneDistance(expectKind(a, 'point'), expectKind(b, 'plane')),
  },
  line_line_distance: {
    operation: 'distance',
    kinds: ['line', 'line'],
    run: (a, b) => lineLineDistance(expectKind(a, 'line'), expectKind(b, 'line')),
  },
  line_plane_distance: {
    operation: 'distance',
    kinds: ['line', 'plane'],
    run: (a, b) => linePlaneDistance(expectKind(a, 'line'), expectKind(b, 'plane')),
  },
  plane_plane_distance: {
    operation: 'distance',
    kinds: ['plane', 'plane'],
    run: (a, b) => planePlaneDistance(expectKind(a, 'plane'), expectKind(b, 'plane')),
  },
  line_line_intersection: {
    operation: 'intersection',
    kinds: ['line', 'line'],
    run: (a, b) => lineLineIntersection(expectKind(a, 'line'), expectKind(b, 'line')),
  },
  line_plane_intersection: {
    operation: 'intersection',
    kinds: ['line', 'plane'],
    run: (a, b) => linePlaneIntersection(expectKind(a, 'line'), expectKind(b, 'plane')),
  },
  plane_plane_intersection: {
    operation: 'intersection',
    kinds: ['plane', 'plane'],
    run: (a, b) => planePlaneIntersection(expectKind(a, 'plane'), expectKind(b, 'plane')),
  },
  line_circle_intersection: {
    operation: 'intersection',
    kinds: ['line', 'circle'],
    run: (a, b) => lineCircleIntersection(expectKind(a, 'line'), expectKind(b, 'circle')),
  },
  line_sphere_intersection: {
    operation: 'intersection',
    kinds: ['line', 'sphere'],
    run: (a, b) => lineSphereIntersection(expectKind(a, 'line'), expectKind(b, 'sphere')),
  },
  circle_circle_intersection: {
    operation: 'intersection',
    kinds: ['circle', 'circle'],
    run: (a, b) => circleCircleIntersection(expectKind(a, 'circle'), expectKind(b, 'circle')),
  },
  sphere_sphere_intersection: {
    operation: 'intersection',
    kinds: ['sphere', 'sphere'],
    run: (a, b) => sphereSphereIntersection(expectKind(a, 'sphere'), expectKind(b, 'sphere')),
  },
  circle_area: {
    operation: 'area',
    kinds: ['circle'],
    run: (a) => circleArea(expectKind(a, 'circle')),
  },
  sphere_surface_area: {
    operation: 'area',
    kinds: ['sphere'],
    run: (a) => sphereSurfaceArea(expectKind(a, 'sphere')),
  },
  sphere_volume: {
    operation: 'volume',
    kinds: ['sphere'],
    run: (a) => sphereVolume(expectKind(a, 'sphere')),
  },
  line_equation: {
    operation: 'line_equation',
    kinds: ['line'],
    run: (a) => lineEquation(expectKind(a, 'line')),
  },
} satisfies Record<FormulaId, FormulaSpec>;

/**
 * Run the routine for `formulaId`. Shapes must arrive in the formula's
 * declared order; the validator reports when a rule matched reversed.
 */
export function compute(formulaId: FormulaId, a: Shape, b?: Shape): CalculationResult {
  const formula: FormulaSpec = FORMULAS[formulaId];
  return formula.run(a, b);
}
