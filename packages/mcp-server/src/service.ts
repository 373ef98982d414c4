/**
 * Tool handlers as plain functions over a table snapshot.
 * tools.ts only wires them to MCP; tests call them directly.
 */

import {
  SHAPE_KINDS, SHAPE_LAYOUTS, check, compatibleShapes, describeError, run,
  point, line, plane, circle, sphere, request,
  type CalculationResult, type Dimension, type FormulaId, type Operation, type OperationRequest,
  type PipelineError, type PipelineState, type ResultKind, type ShapeDescriptor, type ShapeKind,
  type Step, type TableSnapshot,
} from '@geokeys/kernel';
import * as registry from './registry.js';

export interface CalculateInput {
  operation: Operation;
  shape_a: ShapeDescriptor;
  shape_b?: ShapeDescriptor;
  calculator_model?: string;
}

export interface CalculateSuccess {
  status: 'completed';
  operation: Operation;
  formula_id: FormulaId;
  variant?: string;
  result_kind: ResultKind;
  calculation_status: CalculationResult['status'];
  reason?: string;
  numeric_values: Readonly<Record<string, number>>;
  intermediate_steps: readonly Step[];
  model: string;
  keylog: string;
  tokens: readonly string[];
  trace: readonly PipelineState[];
}

export interface CalculateFailure {
  status: 'rejected' | 'failed';
  error: PipelineError;
  message: string;
  trace: readonly PipelineState[];
}

export type CalculateResponse = CalculateSuccess | CalculateFailure;

export function toRequest(input: CalculateInput, defaultModel: string): OperationRequest {
  return request(input.operation, input.shape_a, input.shape_b, input.calculator_model ?? defaultModel);
}

export function calculate(
  input: CalculateInput,
  defaultModel: string,
  tables: TableSnapshot = registry.current(),
): CalculateResponse {
  const req = toRequest(input, defaultModel);
  const result = run(req, tables);
  if (!result.ok) {
    return { status: result.state, error: result.error, message: describeError(result.error), trace: result.trace };
  }

  const { rule, calculation, keylog } = result.value;
  const response: CalculateSuccess = {
    status: 'completed',
    operation: req.operation,
    formula_id: calculation.formula_id,
    result_kind: rule.result_kind,
    calculation_status: calculation.status,
    numeric_values: calculation.numeric_values,
    intermediate_steps: calculation.intermediate_steps,
    model: keylog.model,
    keylog: keylog.keylog,
    tokens: keylog.tokens,
    trace: result.trace,
  };
  if (calculation.variant !== undefined) response.variant = calculation.variant;
  if (calculation.reason !== undefined) response.reason = calculation.reason;
  return response;
}

// ─── Validation only ────────────────────────────────────────────

export type ValidateResponse =
  | { valid: true; formula_id: FormulaId; result_kind: ResultKind; calculator_model: string; model_known: boolean }
  | { valid: false; error: PipelineError; message: string };

export function validateRequest(
  input: CalculateInput,
  defaultModel: string,
  tables: TableSnapshot = registry.current(),
): ValidateResponse {
  const req = toRequest(input, defaultModel);
  const checked = check(req, tables);
  if (!checked.ok) return { valid: false, error: checked.error, message: describeError(checked.error) };
  return {
    valid: true,
    formula_id: checked.value.formula_id,
    result_kind: checked.value.result_kind,
    calculator_model: req.calculator_model,
    model_known: tables.instructions.has(req.calculator_model),
  };
}

// ─── Catalogue ──────────────────────────────────────────────────

export interface ShapeInfo {
  kind: ShapeKind;
  dimensions: Dimension[];
  parameters: Partial<Record<Dimension, readonly string[]>>;
}

export function listShapes(): ShapeInfo[] {
  return SHAPE_KINDS.map((kind) => ({
    kind,
    dimensions: ([2, 3] as const).filter((d) => SHAPE_LAYOUTS[kind][d] !== undefined),
    parameters: SHAPE_LAYOUTS[kind],
  }));
}

export interface PairingInfo {
  kind_a: ShapeKind;
  kind_b?: ShapeKind;
  dimensions: readonly Dimension[];
  result_kind: ResultKind;
  formula_id: FormulaId;
  directional: boolean;
}

export function compatiblePairings(operation: Operation, tables: TableSnapshot = registry.current()): PairingInfo[] {
  return compatibleShapes(tables.compatibility, operation).map((r) => {
    const info: PairingInfo = {
      kind_a: r.kind_a,
      dimensions: r.dimensions,
      result_kind: r.result_kind,
      formula_id: r.formula_id,
      directional: r.directional ?? false,
    };
    if (r.kind_b !== undefined) info.kind_b = r.kind_b;
    return info;
  });
}

export interface CalculatorInfo {
  model: string;
  name: string;
  precision: number;
  is_default: boolean;
  templates: string[];
}

export function listCalculators(defaultModel: string, tables: TableSnapshot = registry.current()): CalculatorInfo[] {
  return [...tables.instructions.values()]
    .map((t) => ({
      model: t.model,
      name: t.name,
      precision: t.precision,
      is_default: t.model === defaultModel,
      templates: Object.keys(t.templates).sort(),
    }))
    .sort((a, b) => a.model.localeCompare(b.model));
}

export interface Example {
  title: string;
  request: OperationRequest;
}

export function getExamples(defaultModel: string, operation?: Operation): Example[] {
  const examples: Example[] = [
    { title: 'Distance between two points', request: request('distance', point(1, 2, 3), point(4, 5, 6), defaultModel) },
    { title: 'Distance between parallel planes', request: request('distance', plane(0, 0, 1, 0), plane(0, 0, 1, -5), defaultModel) },
    { title: 'Area of a circle', request: request('area', circle([0, 0], 5), undefined, defaultModel) },
    { title: 'Volume of a sphere', request: request('volume', sphere([0, 0, 0], 3), undefined, defaultModel) },
    {
      title: 'Line meets plane',
      request: request('intersection', line([0, 0, 0], [1, 1, 1]), plane(1, 1, 1, -3), defaultModel),
    },
    {
      title: 'Line through a circle',
      request: request('intersection', line([0, 0], [1, 0]), circle([0, 0], 2), defaultModel),
    },
    { title: 'Equation of a 2D line', request: request('line_equation', line([1, 2], [3, 4]), undefined, defaultModel) },
  ];
  return operation === undefined ? examples : examples.filter((e) => e.request.operation === operation);
}
