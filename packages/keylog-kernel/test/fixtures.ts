import { createTables, parseShape, type RawTables, type Shape, type ShapeDescriptor, type TableSnapshot } from '../src/index.js';

const digits = Object.fromEntries([...'0123456789'].map((d) => [d, d]));

export const ALPHA_SYMBOLS = {
  ...digits,
  '.': '.',
  '-': '(-)',
  e: 'E',
  add: '+',
  sub: '-',
  mul: '×',
  div: '÷',
  open: '(',
  close: ')',
  square: '²',
  sqrt: '√(',
  abs: 'Abs(',
  pi: 'π',
  equals: '=',
  comma: ',',
};

export const RAW: RawTables = {
  compatibility: {
    version: 7,
    rules: [
      { operation: 'distance', kind_a: 'point', kind_b: 'point', dimensions: [2, 3], result_kind: 'scalar', formula_id: 'point_point_distance' },
      { operation: 'distance', kind_a: 'point', kind_b: 'line', dimensions: [2, 3], result_kind: 'scalar', formula_id: 'point_line_distance' },
      { operation: 'distance', kind_a: 'point', kind_b: 'plane', dimensions: [3], result_kind: 'scalar', formula_id: 'point_plane_distance' },
      { operation: 'distance', kind_a: 'line', kind_b: 'line', dimensions: [2, 3], result_kind: 'scalar', formula_id: 'line_line_distance', tolerate: ['coincident'] },
      { operation: 'distance', kind_a: 'line', kind_b: 'plane', dimensions: [3], result_kind: 'scalar', formula_id: 'line_plane_distance', directional: true },
      { operation: 'intersection', kind_a: 'line', kind_b: 'line', dimensions: [2, 3], result_kind: 'point', formula_id: 'line_line_intersection' },
      { operation: 'intersection', kind_a: 'line', kind_b: 'circle', dimensions: [2], result_kind: 'points', formula_id: 'line_circle_intersection' },
      { operation: 'intersection', kind_a: 'circle', kind_b: 'circle', dimensions: [2], result_kind: 'points', formula_id: 'circle_circle_intersection' },
      { operation: 'area', kind_a: 'circle', dimensions: [2], result_kind: 'scalar', formula_id: 'circle_area' },
      { operation: 'area', kind_a: 'sphere', dimensions: [3], allowed: false, result_kind: 'scalar', formula_id: 'sphere_surface_area' },
      { operation: 'volume', kind_a: 'sphere', dimensions: [3], result_kind: 'scalar', formula_id: 'sphere_volume' },
      { operation: 'line_equation', kind_a: 'line', dimensions: [2], result_kind: 'equation', formula_id: 'line_equation' },
    ],
  },
  calculators: [
    {
      model: 'alpha',
      name: 'Alpha',
      symbols: ALPHA_SYMBOLS,
      templates: {
        point_point_distance: [
          { symbol: 'sqrt' },
          { step: 'AB', prefix: ['open'], suffix: ['close', 'square'], separator: ['add'] },
          { symbol: 'close' },
          { symbol: 'equals' },
        ],
        distance: [{ value: 'distance' }, { symbol: 'equals' }],
        circle_area: [{ symbol: 'pi' }, { step: 'r', prefix: ['open'], suffix: ['close'] }, { symbol: 'square' }, { symbol: 'equals' }],
        volume: [{ value: 'volume' }, { symbol: 'equals' }],
        intersection: [{ value: 'point_x' }, { symbol: 'comma' }, { value: 'point_y' }, { symbol: 'equals' }],
        'line_circle_intersection.secant': [
          { step: 'P1', separator: ['comma'] },
          { symbol: 'equals' },
          { step: 'P2', separator: ['comma'] },
          { symbol: 'equals' },
        ],
        circle_circle_intersection: [{ value: 'p2_x' }, { symbol: 'equals' }],
        line_equation: [
          { step: 'a' }, { symbol: 'equals' },
          { step: 'b' }, { symbol: 'equals' },
          { step: 'c' }, { symbol: 'equals' },
        ],
      },
    },
    {
      model: 'beta',
      name: 'Beta',
      extends: 'alpha',
      precision: 4,
      symbols: { sqrt: 's', pi: 'qK' },
      templates: {
        volume: [{ key: 'MODE' }, { value: 'volume' }, { symbol: 'equals' }],
      },
    },
    {
      model: 'delta',
      name: 'Delta',
      symbols: { ...digits, equals: '=' },
      templates: {
        distance: [{ value: 'distance' }, { symbol: 'equals' }],
      },
    },
  ],
};

export function fixtureTables(): TableSnapshot {
  return createTables(RAW);
}

/** Parse a descriptor that the test knows is valid. */
export function parsed(desc: ShapeDescriptor): Shape {
  const result = parseShape(desc);
  if (!result.ok) throw new Error(`fixture shape is invalid: ${result.error.reason}`);
  return result.value;
}
