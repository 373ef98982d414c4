/**
 * Pipeline Orchestrator: validate → compute → encode for one request.
 *
 *   received → validated → computed → encoded → completed
 *        ↘ rejected (unsupported / invalid shape)
 *                      ↘ failed (degenerate geometry / missing encoding)
 *
 * A run never computes after a rejected validation and never encodes a
 * degenerate result its rule does not tolerate. Each stage's failure ends
 * the run with that stage's typed error.
 */

import { validate, type CompatibilityRule } from './compatibility.js';
import { compute } from './kernel.js';
import { encode, type KeylogResult } from './encoder.js';
import { parseShape, type OperationRequest, type Shape } from './shapes.js';
import { err, ok, type PipelineError, type Result } from './result.js';
import type { CalculationResult } from './derivation.js';
import type { TableSnapshot } from './tables.js';

export type PipelineState =
  | 'received'
  | 'validated'
  | 'computed'
  | 'encoded'
  | 'completed'
  | 'rejected'
  | 'failed';

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  received: ['validated', 'rejected'],
  validated: ['computed', 'failed'],
  computed: ['encoded', 'failed'],
  encoded: ['completed'],
  completed: [],
  rejected: [],
  failed: [],
};

export interface PipelineOutput {
  rule: CompatibilityRule;
  calculation: CalculationResult;
  keylog: KeylogResult;
}

export type PipelineResult =
  | { ok: true; state: 'completed'; value: PipelineOutput; trace: readonly PipelineState[] }
  | { ok: false; state: 'rejected' | 'failed'; error: PipelineError; trace: readonly PipelineState[] };

export class PipelineRun {
  private state: PipelineState = 'received';
  private readonly trace: PipelineState[] = ['received'];

  constructor(
    private readonly request: OperationRequest,
    private readonly tables: TableSnapshot,
  ) {}

  get current(): PipelineState {
    return this.state;
  }

  execute(): PipelineResult {
    if (this.state !== 'received') {
      throw new Error(`PipelineRun already executed (state: ${this.state})`);
    }

    const validated = this.validate();
    if (!validated.ok) return this.stop('rejected', validated.error);
    this.advance('validated');

    const { rule, shapes } = validated.value;
    const calculation = compute(rule.formula_id, shapes[0], shapes[1]);
    if (calculation.status === 'degenerate' && calculation.reason !== undefined
      && !(rule.tolerate ?? []).includes(calculation.reason)) {
      return this.stop('failed', {
        code: 'degenerate_geometry',
        formula_id: calculation.formula_id,
        reason: calculation.reason,
      });
    }
    this.advance('computed');

    const encoded = encode(this.request.operation, calculation, this.request.calculator_model, this.tables.instructions);
    if (!encoded.ok) return this.stop('failed', encoded.error);
    this.advance('encoded');

    this.advance('completed');
    return {
      ok: true,
      state: 'completed',
      value: { rule, calculation, keylog: encoded.value },
      trace: [...this.trace],
    };
  }

  /** Combination check, then descriptor parsing; shapes come back in rule order. */
  private validate(): Result<{ rule: CompatibilityRule; shapes: [Shape, Shape?] }, PipelineError> {
    const { operation, shape_a, shape_b } = this.request;
    const match = validate(this.tables.compatibility, operation, shape_a, shape_b);
    if (!match.ok) return match;

    const a = parseShape(shape_a);
    if (!a.ok) return a;
    if (!shape_b) return { ok: true, value: { rule: match.value.rule, shapes: [a.value] } };

    const b = parseShape(shape_b);
    if (!b.ok) return b;
    return {
      ok: true,
      value: {
        rule: match.value.rule,
        shapes: match.value.swapped ? [b.value, a.value] : [a.value, b.value],
      },
    };
  }

  private advance(next: PipelineState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.state} → ${next}`);
    }
    this.state = next;
    this.trace.push(next);
  }

  private stop(terminal: 'rejected' | 'failed', error: PipelineError): PipelineResult {
    this.advance(terminal);
    return { ok: false, state: terminal, error, trace: [...this.trace] };
  }
}

/** Run one request against one table snapshot. */
export function run(request: OperationRequest, tables: TableSnapshot): PipelineResult {
  return new PipelineRun(request, tables).execute();
}

/** Validation stage only: does the request name a legal, well-formed combination? */
export function check(request: OperationRequest, tables: TableSnapshot): Result<CompatibilityRule, PipelineError> {
  const match = validate(tables.compatibility, request.operation, request.shape_a, request.shape_b);
  if (!match.ok) return match;
  for (const desc of [request.shape_a, request.shape_b]) {
    if (!desc) continue;
    const parsed = parseShape(desc);
    if (!parsed.ok) return err(parsed.error);
  }
  return ok(match.value.rule);
}
