import { describe, it, expect } from 'vitest';
import { compute, point, line, plane, circle, sphere, FORMULAS, FORMULA_IDS } from '../src/index.js';
import { parsed } from './fixtures.js';

const stepValues = (result: ReturnType<typeof compute>, name: string) =>
  result.intermediate_steps.find((s) => s.name === name)?.values;

describe('formula table', () => {
  it('has one routine per formula id', () => {
    expect(Object.keys(FORMULAS).sort()).toEqual([...FORMULA_IDS].sort());
  });

  it('refuses shapes of the wrong kind', () => {
    expect(() => compute('circle_area', parsed(sphere([0, 0, 0], 1)))).toThrow('Expected a circle, got sphere');
  });
});

describe('distance', () => {
  it('point to point records AB, AB·AB and the root', () => {
    const r = compute('point_point_distance', parsed(point(1, 2, 3)), parsed(point(4, 5, 6)));
    expect(r.status).toBe('ok');
    expect(r.intermediate_steps.map((s) => s.name)).toEqual(['AB', 'AB2', 'distance']);
    expect(stepValues(r, 'AB')).toEqual([3, 3, 3]);
    expect(stepValues(r, 'AB2')).toEqual([27]);
    expect(r.numeric_values.distance).toBeCloseTo(5.196152, 6);
  });

  it('point to point is symmetric', () => {
    const a = parsed(point(-1, 7));
    const b = parsed(point(2, 3));
    const ab = compute('point_point_distance', a, b).numeric_values.distance;
    const ba = compute('point_point_distance', b, a).numeric_values.distance;
    expect(ab).toBe(5);
    expect(ba).toBe(5);
  });

  it('point to line drops a perpendicular', () => {
    const r = compute('point_line_distance', parsed(point(0, 3)), parsed(line([0, 0], [1, 0])));
    expect(r.numeric_values).toEqual({ foot_x: 0, foot_y: 0, distance: 3 });
    expect(stepValues(r, 'HP')).toEqual([0, 3]);
  });

  it('point to line with a zero direction is degenerate', () => {
    const r = compute('point_line_distance', parsed(point(0, 3)), parsed(line([0, 0], [0, 0])));
    expect(r.status).toBe('degenerate');
    expect(r.reason).toBe('zero_vector');
  });

  it('point to plane divides by the normal length', () => {
    const r = compute('point_plane_distance', parsed(point(1, 1, 5)), parsed(plane(0, 0, 2, -4)));
    // |2·5 - 4| / 2
    expect(r.numeric_values.distance).toBe(3);
    expect(r.numeric_values.foot_z).toBe(2);
  });

  it('skew lines use the common normal', () => {
    const r = compute('line_line_distance', parsed(line([0, 0, 0], [1, 0, 0])), parsed(line([0, 1, 1], [0, 1, 0])));
    expect(r.variant).toBe('skew');
    expect(r.intermediate_steps.map((s) => s.name)).toEqual(['AB', 'n', 'nn', 'ABn', 'distance']);
    expect(r.numeric_values.distance).toBe(1);
  });

  it('crossing 2D lines are at distance 0', () => {
    const r = compute('line_line_distance', parsed(line([0, 0], [1, 1])), parsed(line([0, 2], [1, -1])));
    expect(r.variant).toBe('crossing');
    expect(r.status).toBe('ok');
    expect(stepValues(r, 'n')).toEqual([-2]);
    expect(r.numeric_values.distance).toBe(0);
  });

  it('coincident lines report distance 0 as degenerate', () => {
    const r = compute('line_line_distance', parsed(line([0, 0], [1, 1])), parsed(line([2, 2], [-1, -1])));
    expect(r.variant).toBe('parallel');
    expect(r.status).toBe('degenerate');
    expect(r.reason).toBe('coincident');
    expect(r.numeric_values.distance).toBe(0);
  });

  it('parallel planes rescale the second normal', () => {
    const r = compute('plane_plane_distance', parsed(plane(0, 0, 2, 0)), parsed(plane(0, 0, 1, -5)));
    expect(r.variant).toBe('parallel');
    expect(stepValues(r, 'k')).toEqual([2]);
    expect(stepValues(r, 'dd')).toEqual([10]);
    expect(r.numeric_values.distance).toBe(5);
  });

  it('a line parallel to a plane keeps its offset', () => {
    const r = compute('line_plane_distance', parsed(line([0, 0, 4], [1, 1, 0])), parsed(plane(0, 0, 1, 0)));
    expect(r.variant).toBe('parallel');
    expect(r.numeric_values.distance).toBe(4);
  });

  it('a line crossing a plane is at distance 0', () => {
    const r = compute('line_plane_distance', parsed(line([0, 0, 4], [0, 0, 1])), parsed(plane(0, 0, 1, 0)));
    expect(r.variant).toBe('crossing');
    expect(r.numeric_values.distance).toBe(0);
  });
});

describe('intersection', () => {
  it('2D lines meet at one point', () => {
    const r = compute('line_line_intersection', parsed(line([0, 0], [1, 1])), parsed(line([0, 2], [1, -1])));
    expect(r.status).toBe('ok');
    expect(r.numeric_values).toEqual({ t: 1, s: 1, point_x: 1, point_y: 1 });
  });

  it('parallel and coincident lines are degenerate', () => {
    const par = compute('line_line_intersection', parsed(line([0, 0], [1, 0])), parsed(line([0, 1], [2, 0])));
    expect(par.reason).toBe('parallel');
    const same = compute('line_line_intersection', parsed(line([0, 0], [1, 0])), parsed(line([3, 0], [-1, 0])));
    expect(same.reason).toBe('coincident');
  });

  it('3D lines that miss each other are skew', () => {
    const r = compute('line_line_intersection', parsed(line([0, 0, 0], [1, 0, 0])), parsed(line([0, 1, 1], [0, 1, 0])));
    expect(r.status).toBe('degenerate');
    expect(r.reason).toBe('skew');
  });

  it('3D lines far from the origin still meet', () => {
    const p: [number, number, number] = [12345678.9, -23456789.1, 34567890.7];
    const u = [0.3, 0.7, -1.1];
    const v = [-0.9, 0.2, 0.4];
    const a = p.map((c, i) => c - 3 * u[i]);
    const b = p.map((c, i) => c + 2.5 * v[i]);
    const r = compute('line_line_intersection', parsed(line(a, u)), parsed(line(b, v)));
    expect(r.status).toBe('ok');
    expect(r.numeric_values.t).toBeCloseTo(3, 6);
    expect(r.numeric_values.s).toBeCloseTo(-2.5, 6);
    expect(r.numeric_values.point_x).toBeCloseTo(p[0], 3);
    expect(r.numeric_values.point_y).toBeCloseTo(p[1], 3);
    expect(r.numeric_values.point_z).toBeCloseTo(p[2], 3);
  });

  it('3D lines far from the origin that miss by one unit are skew', () => {
    const p = [12345678.9, -23456789.1, 34567890.7];
    const u = [0.3, 0.7, -1.1];
    const v = [-0.9, 0.2, 0.4];
    // u × v
    const n = [0.5, 0.87, 0.69];
    const a = p.map((c, i) => c - 3 * u[i]);
    const b = p.map((c, i) => c + 2.5 * v[i] + n[i]);
    const r = compute('line_line_intersection', parsed(line(a, u)), parsed(line(b, v)));
    expect(r.status).toBe('degenerate');
    expect(r.reason).toBe('skew');
  });

  it('line meets plane', () => {
    const r = compute('line_plane_intersection', parsed(line([0, 0, 0], [1, 1, 1])), parsed(plane(1, 1, 1, -3)));
    expect(stepValues(r, 'nA')).toEqual([-3]);
    expect(stepValues(r, 'nu')).toEqual([3]);
    expect(r.numeric_values).toEqual({ t: 1, point_x: 1, point_y: 1, point_z: 1 });
  });

  it('line in or beside a plane has no single point', () => {
    const beside = compute('line_plane_intersection', parsed(line([0, 0, 1], [1, 0, 0])), parsed(plane(0, 0, 1, 0)));
    expect(beside.reason).toBe('parallel');
    const inside = compute('line_plane_intersection', parsed(line([0, 0, 0], [1, 0, 0])), parsed(plane(0, 0, 1, 0)));
    expect(inside.reason).toBe('coincident');
  });

  it('two planes meet in a line', () => {
    const r = compute('plane_plane_intersection', parsed(plane(0, 0, 1, -2)), parsed(plane(1, 0, 0, 0)));
    expect(r.numeric_values).toEqual({
      point_x: 0, point_y: 0, point_z: 2,
      direction_x: 0, direction_y: 1, direction_z: 0,
    });
  });

  it('parallel planes do not meet', () => {
    const r = compute('plane_plane_intersection', parsed(plane(0, 0, 1, 0)), parsed(plane(0, 0, 3, -3)));
    expect(r.reason).toBe('parallel');
  });

  it('a secant line cuts a circle twice', () => {
    const r = compute('line_circle_intersection', parsed(line([0, 0], [1, 0])), parsed(circle([0, 0], 2)));
    expect(r.variant).toBe('secant');
    expect(r.numeric_values).toEqual({ count: 2, p1_x: -2, p1_y: 0, p2_x: 2, p2_y: 0 });
  });

  it('a tangent line touches a sphere once', () => {
    const r = compute('line_sphere_intersection', parsed(line([0, 0, 2], [1, 0, 0])), parsed(sphere([0, 0, 0], 2)));
    expect(r.variant).toBe('tangent');
    expect(r.numeric_values).toEqual({ count: 1, p1_x: 0, p1_y: 0, p1_z: 2 });
  });

  it('a line that misses a sphere is disjoint', () => {
    const r = compute('line_sphere_intersection', parsed(line([0, 0, 5], [1, 0, 0])), parsed(sphere([0, 0, 0], 2)));
    expect(r.reason).toBe('disjoint');
  });

  it('two circles cross at two points', () => {
    const r = compute('circle_circle_intersection', parsed(circle([0, 0], 5)), parsed(circle([6, 0], 5)));
    expect(r.variant).toBe('secant');
    expect(stepValues(r, 'M')).toEqual([3, 0]);
    expect(r.numeric_values).toEqual({ count: 2, p1_x: 3, p1_y: 4, p2_x: 3, p2_y: -4 });
  });

  it('circles that touch externally meet once', () => {
    const r = compute('circle_circle_intersection', parsed(circle([0, 0], 1)), parsed(circle([2, 0], 1)));
    expect(r.variant).toBe('tangent');
    expect(r.numeric_values).toEqual({ count: 1, p1_x: 1, p1_y: 0 });
  });

  it('separate and identical circles are degenerate', () => {
    expect(compute('circle_circle_intersection', parsed(circle([0, 0], 1)), parsed(circle([5, 0], 1))).reason)
      .toBe('disjoint');
    expect(compute('circle_circle_intersection', parsed(circle([1, 1], 2)), parsed(circle([1, 1], 2))).reason)
      .toBe('coincident');
  });

  it('two spheres meet in a circle', () => {
    const r = compute('sphere_sphere_intersection', parsed(sphere([0, 0, 0], 5)), parsed(sphere([0, 0, 6], 5)));
    expect(r.numeric_values).toEqual({
      center_x: 0, center_y: 0, center_z: 3,
      radius: 4,
      normal_x: 0, normal_y: 0, normal_z: 1,
    });
  });
});

describe('measures', () => {
  it('circle area is π·r²', () => {
    const r = compute('circle_area', parsed(circle([0, 0], 5)));
    expect(stepValues(r, 'r2')).toEqual([25]);
    expect(r.numeric_values.area).toBeCloseTo(78.539816, 5);
  });

  it('sphere surface area and volume', () => {
    expect(compute('sphere_surface_area', parsed(sphere([1, 1, 1], 1))).numeric_values.area).toBeCloseTo(4 * Math.PI, 12);
    const v = compute('sphere_volume', parsed(sphere([0, 0, 0], 3)));
    expect(stepValues(v, 'r3')).toEqual([27]);
    expect(v.numeric_values.volume).toBeCloseTo(113.097336, 5);
  });

  it('2D line equation adds the general form', () => {
    const r = compute('line_equation', parsed(line([1, 2], [3, 4])));
    expect(r.variant).toBe('planar');
    expect(r.numeric_values).toEqual({});
    expect(r.intermediate_steps.map((s) => [s.name, s.values[0]])).toEqual([
      ['x0', 1], ['dx', 3], ['y0', 2], ['dy', 4], ['a', 4], ['b', -3], ['c', 2],
    ]);
  });

  it('3D line equation lists the parametric coefficients', () => {
    const r = compute('line_equation', parsed(line([1, 2, 3], [4, 5, 6])));
    expect(r.variant).toBe('spatial');
    expect(r.intermediate_steps.map((s) => s.values[0])).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it('a line without direction has no equation', () => {
    expect(compute('line_equation', parsed(line([1, 2], [0, 0]))).reason).toBe('zero_vector');
  });
});
