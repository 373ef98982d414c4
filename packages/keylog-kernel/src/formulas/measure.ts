/**
 * Unary routines: area, volume and the line equation.
 */

import { Derivation, type CalculationResult } from '../derivation.js';
import type { CircleShape, LineShape, SphereShape } from '../shapes.js';
import { isZero } from '../vec3.js';

export function circleArea(circle: CircleShape): CalculationResult {
  const d = new Derivation('circle_area', 2);
  const r = d.scalar('r', 'r', circle.radius);
  const r2 = d.scalar('r2', 'r²', r * r);
  const area = d.scalar('area', 'π·r²', Math.PI * r2);
  return d.set('area', area).ok();
}

export function sphereSurfaceArea(sphere: SphereShape): CalculationResult {
  const d = new Derivation('sphere_surface_area', 3);
  const r = d.scalar('r', 'r', sphere.radius);
  const r2 = d.scalar('r2', 'r²', r * r);
  const area = d.scalar('area', '4·π·r²', 4 * Math.PI * r2);
  return d.set('area', area).ok();
}

export function sphereVolume(sphere: SphereShape): CalculationResult {
  const d = new Derivation('sphere_volume', 3);
  const r = d.scalar('r', 'r', sphere.radius);
  const r3 = d.scalar('r3', 'r³', r * r * r);
  const volume = d.scalar('volume', '(4/3)·π·r³', (4 / 3) * Math.PI * r3);
  return d.set('volume', volume).ok();
}

/**
 * Parametric coefficients per axis (x = x₀ + dx·t, ...). In 2D the general
 * form a·x + b·y + c = 0 follows from the normal (dy, -dx). No numeric
 * result: the equation is the answer.
 */
export function lineEquation(line: LineShape): CalculationResult {
  const d = new Derivation('line_equation', line.dimension);
  if (isZero(line.direction)) return d.degenerate('zero_vector');

  const [x0, y0, z0] = line.point;
  const [dx, dy, dz] = line.direction;
  d.scalar('x0', 'x₀', x0);
  d.scalar('dx', 'dx', dx);
  d.scalar('y0', 'y₀', y0);
  d.scalar('dy', 'dy', dy);

  if (line.dimension === 3) {
    d.scalar('z0', 'z₀', z0);
    d.scalar('dz', 'dz', dz);
    return d.variant('spatial').ok();
  }

  d.variant('planar');
  const a = d.scalar('a', 'a = dy', dy);
  const b = d.scalar('b', 'b = -dx', -dx);
  d.scalar('c', 'c = -(a·x₀ + b·y₀)', -(a * x0 + b * y0));
  return d.ok();
}
