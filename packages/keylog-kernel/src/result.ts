/**
 * Typed results and the error taxonomy.
 *
 * Every stage returns a Result; failures are plain data with a `code`
 * so callers can render them without parsing messages.
 */

import type { Dimension, InvalidShape, Operation, ShapeKind } from './shapes.js';

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ─── Degenerate geometry ─────────────────────────────────────────

export const DEGENERATE_REASONS = ['zero_vector', 'parallel', 'coincident', 'skew', 'disjoint'] as const;
export type DegenerateReason = typeof DEGENERATE_REASONS[number];

// ─── Errors ──────────────────────────────────────────────────────

export type UnsupportedReason =
  | 'arity'
  | 'dimension_mismatch'
  | 'dimension_unsupported'
  | 'no_rule'
  | 'not_allowed';

export interface UnsupportedCombination {
  code: 'unsupported_combination';
  operation: Operation;
  kind_a: ShapeKind;
  kind_b?: ShapeKind;
  dimension: Dimension;
  reason: UnsupportedReason;
}

export interface DegenerateGeometry {
  code: 'degenerate_geometry';
  formula_id: string;
  reason: DegenerateReason;
}

export interface MissingEncodingRule {
  code: 'missing_encoding_rule';
  model: string;
  operation?: Operation;
  formula_id?: string;
  /** Symbol with no keystroke mapping for this model. */
  symbol?: string;
  /** Value or step a template names but the calculation does not carry. */
  placeholder?: string;
}

export type { InvalidShape };

export type PipelineError =
  | UnsupportedCombination
  | InvalidShape
  | DegenerateGeometry
  | MissingEncodingRule;

/** One-line rendering for logs and tool output. */
export function describeError(error: PipelineError): string {
  switch (error.code) {
    case 'unsupported_combination': {
      const pair = error.kind_b ? `${error.kind_a} × ${error.kind_b}` : error.kind_a;
      return `${error.operation} of ${pair} in ${error.dimension}D is not supported (${error.reason})`;
    }
    case 'invalid_shape':
      return `invalid ${error.kind} (${error.dimension}D): ${error.reason}`;
    case 'degenerate_geometry':
      return `${error.formula_id} is degenerate: ${error.reason}`;
    case 'missing_encoding_rule': {
      const what = error.symbol !== undefined ? `symbol "${error.symbol}"`
        : error.placeholder !== undefined ? `placeholder "${error.placeholder}"`
        : `template for ${error.formula_id ?? error.operation ?? 'request'}`;
      return `model ${error.model} has no ${what}`;
    }
  }
}
