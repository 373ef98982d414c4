import { describe, it, expect } from 'vitest';
import {
  run, check, PipelineRun, request, point, line, plane, circle, sphere,
} from '../src/index.js';
import { fixtureTables } from './fixtures.js';

const tables = fixtureTables();

describe('run', () => {
  it('completes a distance between two points', () => {
    const r = run(request('distance', point(1, 2, 3), point(4, 5, 6), 'alpha'), tables);
    expect(r.state).toBe('completed');
    expect(r.trace).toEqual(['received', 'validated', 'computed', 'encoded', 'completed']);
    if (!r.ok) return;
    expect(r.value.rule.formula_id).toBe('point_point_distance');
    expect(r.value.calculation.numeric_values.distance).toBeCloseTo(5.196152, 6);
    expect(r.value.keylog.keylog).toBe('√((3)²+(3)²+(3)²)=');
  });

  it('completes a circle area', () => {
    const r = run(request('area', circle([0, 0], 5), undefined, 'alpha'), tables);
    expect(r.ok && r.value.calculation.numeric_values.area).toBeCloseTo(78.539816, 5);
    expect(r.ok && r.value.keylog.keylog).toBe('π(5)²=');
  });

  it('completes a sphere volume', () => {
    const r = run(request('volume', sphere([0, 0, 0], 3), undefined, 'beta'), tables);
    expect(r.ok && r.value.keylog.keylog).toBe('MODE113.1=');
  });

  it('rejects an unsupported combination before computing', () => {
    const r = run(request('area', point(1, 2), undefined, 'alpha'), tables);
    expect(r).toEqual({
      ok: false,
      state: 'rejected',
      error: { code: 'unsupported_combination', operation: 'area', kind_a: 'point', dimension: 2, reason: 'no_rule' },
      trace: ['received', 'rejected'],
    });
  });

  it('rejects a malformed shape', () => {
    const r = run(request('area', { kind: 'circle', dimension: 2, parameters: [0, 0, -1] }, undefined, 'alpha'), tables);
    expect(r.state).toBe('rejected');
    expect(!r.ok && r.error).toEqual({
      code: 'invalid_shape', kind: 'circle', dimension: 2, reason: 'radius must be positive, got -1',
    });
  });

  it('fails on degenerate geometry the rule does not tolerate', () => {
    const r = run(request('intersection', line([0, 0], [1, 0]), line([0, 1], [2, 0]), 'alpha'), tables);
    expect(r).toEqual({
      ok: false,
      state: 'failed',
      error: { code: 'degenerate_geometry', formula_id: 'line_line_intersection', reason: 'parallel' },
      trace: ['received', 'validated', 'failed'],
    });
  });

  it('completes the unique crossing of two 3D lines', () => {
    const r = run(request('intersection', line([1, 2, 3], [1, 0, 1]), line([0, 1, 2], [0, 1, 0]), 'alpha'), tables);
    expect(r.trace).toEqual(['received', 'validated', 'computed', 'encoded', 'completed']);
    if (!r.ok) return;
    expect(r.value.calculation.status).toBe('ok');
    expect(r.value.calculation.numeric_values).toEqual({ t: -1, s: 1, point_x: 0, point_y: 2, point_z: 2 });
    expect(r.value.keylog.keylog).toBe('0,2=');
  });

  it('fails on parallel 3D lines', () => {
    const r = run(request('intersection', line([0, 0, 0], [1, 2, 3]), line([1, 0, 0], [2, 4, 6]), 'alpha'), tables);
    expect(r).toEqual({
      ok: false,
      state: 'failed',
      error: { code: 'degenerate_geometry', formula_id: 'line_line_intersection', reason: 'parallel' },
      trace: ['received', 'validated', 'failed'],
    });
  });

  it('rejects a 2D circle against a 3D sphere before computing', () => {
    const r = run(request('intersection', circle([0, 0], 1), sphere([0, 0, 0], 1), 'alpha'), tables);
    expect(r).toEqual({
      ok: false,
      state: 'rejected',
      error: {
        code: 'unsupported_combination',
        operation: 'intersection',
        kind_a: 'circle',
        kind_b: 'sphere',
        dimension: 2,
        reason: 'dimension_mismatch',
      },
      trace: ['received', 'rejected'],
    });
  });

  it('completes degenerate geometry the rule tolerates', () => {
    const r = run(request('distance', line([0, 0], [1, 1]), line([2, 2], [-1, -1]), 'alpha'), tables);
    expect(r.state).toBe('completed');
    expect(r.ok && r.value.calculation.status).toBe('degenerate');
    expect(r.ok && r.value.calculation.reason).toBe('coincident');
    expect(r.ok && r.value.keylog.keylog).toBe('0=');
  });

  it('fails when the model cannot key the result', () => {
    const r = run(request('intersection', circle([0, 0], 1), circle([2, 0], 1), 'alpha'), tables);
    expect(r.state).toBe('failed');
    expect(r.trace).toEqual(['received', 'validated', 'computed', 'failed']);
    expect(!r.ok && r.error.code).toBe('missing_encoding_rule');
  });

  it('fails for an unknown model after computing', () => {
    const r = run(request('distance', point(0, 0), point(3, 4), 'zeta'), tables);
    expect(r.trace).toEqual(['received', 'validated', 'computed', 'failed']);
    expect(!r.ok && r.error).toEqual({
      code: 'missing_encoding_rule', model: 'zeta', operation: 'distance', formula_id: 'point_point_distance',
    });
  });

  it('puts swapped shapes back in rule order', () => {
    const r = run(request('distance', plane(0, 0, 1, -2), point(1, 1, 5), 'alpha'), tables);
    expect(r.ok && r.value.rule.formula_id).toBe('point_plane_distance');
    expect(r.ok && r.value.calculation.numeric_values.distance).toBe(3);
    expect(r.ok && r.value.keylog.keylog).toBe('3=');
  });
});

describe('PipelineRun', () => {
  it('runs once', () => {
    const p = new PipelineRun(request('area', circle([0, 0], 1), undefined, 'alpha'), tables);
    expect(p.current).toBe('received');
    p.execute();
    expect(p.current).toBe('completed');
    expect(() => p.execute()).toThrow('already executed');
  });
});

describe('check', () => {
  it('returns the rule without computing or encoding', () => {
    const r = check(request('distance', point(0, 0), point(1, 1), 'no-such-model'), tables);
    expect(r.ok && r.value.formula_id).toBe('point_point_distance');
  });

  it('reports malformed shapes', () => {
    const r = check(request('distance', point(0, 0), { kind: 'point', dimension: 2, parameters: [1] }, 'alpha'), tables);
    expect(!r.ok && r.error.code).toBe('invalid_shape');
  });
});
