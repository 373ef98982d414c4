/**
 * Descriptor constructors: the short way to write requests.
 *
 *   request('distance', point(1, 2, 3), point(4, 5, 6), 'fx799')
 *
 * Dimension follows from the number of coordinates given.
 */

import type { Dimension, Operation, OperationRequest, ShapeDescriptor } from './shapes.js';

function dimensionOf(coords: readonly number[], what: string): Dimension {
  if (coords.length === 2) return 2;
  if (coords.length === 3) return 3;
  throw new Error(`${what} needs 2 or 3 coordinates, got ${coords.length}`);
}

/** Point from 2 or 3 coordinates. */
export function point(...coords: number[]): ShapeDescriptor {
  return { kind: 'point', dimension: dimensionOf(coords, 'point()'), parameters: coords };
}

/** Line through `through` along `direction`; both in the same dimension. */
export function line(through: readonly number[], direction: readonly number[]): ShapeDescriptor {
  const dimension = dimensionOf(through, 'line()');
  if (direction.length !== through.length) {
    throw new Error(`line() point and direction must have the same dimension, got ${through.length} and ${direction.length}`);
  }
  return { kind: 'line', dimension, parameters: [...through, ...direction] };
}

/** Plane a·x + b·y + c·z + d = 0. */
export function plane(a: number, b: number, c: number, d: number): ShapeDescriptor {
  return { kind: 'plane', dimension: 3, parameters: [a, b, c, d] };
}

/** Circle in the XY plane. */
export function circle(center: readonly [number, number], radius: number): ShapeDescriptor {
  return { kind: 'circle', dimension: 2, parameters: [...center, radius] };
}

export function sphere(center: readonly [number, number, number], radius: number): ShapeDescriptor {
  return { kind: 'sphere', dimension: 3, parameters: [...center, radius] };
}

export function request(
  operation: Operation,
  shapeA: ShapeDescriptor,
  shapeB: ShapeDescriptor | undefined,
  calculatorModel: string,
): OperationRequest {
  return shapeB
    ? { operation, shape_a: shapeA, shape_b: shapeB, calculator_model: calculatorModel }
    : { operation, shape_a: shapeA, calculator_model: calculatorModel };
}
