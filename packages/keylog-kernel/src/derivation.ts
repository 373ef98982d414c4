/**
 * Derivation: records the steps of a manual calculation in order.
 *
 * Each kernel routine owns one Derivation per call. Steps are what the
 * encoder keys in, so their names and order are part of the output
 * contract, not a debugging aid.
 */

import { take, type Vec3 } from './vec3.js';
import type { Dimension } from './shapes.js';
import type { DegenerateReason } from './result.js';
import type { FormulaId } from './kernel.js';

export interface Step {
  /** Name templates refer to: "AB", "nn", "t". */
  name: string;
  /** Symbolic form of the sub-result: "B - A". */
  expression: string;
  /** Numeric value; vectors carry one entry per component. */
  values: readonly number[];
}

export type CalculationStatus = 'ok' | 'degenerate';

export interface CalculationResult {
  formula_id: FormulaId;
  /** Branch the routine took ("parallel", "secant", ...), when it has several. */
  variant?: string;
  numeric_values: Readonly<Record<string, number>>;
  intermediate_steps: readonly Step[];
  status: CalculationStatus;
  reason?: DegenerateReason;
}

const AXES = ['x', 'y', 'z'] as const;

/** -0 reads as "-0" once keyed in; report it as 0. */
function clean(v: number): number {
  return v === 0 ? 0 : v;
}

export class Derivation {
  private readonly steps: Step[] = [];
  private readonly values: Record<string, number> = {};
  private variantName: string | undefined;

  constructor(
    private readonly formulaId: FormulaId,
    readonly dimension: Dimension,
  ) {}

  /** Record a scalar step and return its value. */
  scalar(name: string, expression: string, value: number): number {
    this.steps.push({ name, expression, values: [clean(value)] });
    return value;
  }

  /** Record a vector step in the derivation's dimension and return the vector. */
  vector(name: string, expression: string, v: Vec3): Vec3 {
    this.steps.push({ name, expression, values: take(v, this.dimension).map(clean) });
    return v;
  }

  /**
   * Record a cross product. In 2D only the z component is non-zero,
   * so it is reported as a single determinant value.
   */
  crossProduct(name: string, expression: string, v: Vec3): Vec3 {
    this.steps.push({ name, expression, values: (this.dimension === 2 ? [v[2]] : [v[0], v[1], v[2]]).map(clean) });
    return v;
  }

  variant(name: string): this {
    this.variantName = name;
    return this;
  }

  /** Publish a named numeric result. */
  set(name: string, value: number): this {
    this.values[name] = clean(value);
    return this;
  }

  /** Publish a point or vector result as name_x, name_y[, name_z]. */
  setVector(name: string, v: Vec3): this {
    take(v, this.dimension).forEach((c, i) => {
      this.values[`${name}_${AXES[i]}`] = clean(c);
    });
    return this;
  }

  ok(): CalculationResult {
    return this.finish('ok');
  }

  degenerate(reason: DegenerateReason): CalculationResult {
    return this.finish('degenerate', reason);
  }

  private finish(status: CalculationStatus, reason?: DegenerateReason): CalculationResult {
    const result: CalculationResult = {
      formula_id: this.formulaId,
      numeric_values: { ...this.values },
      intermediate_steps: [...this.steps],
      status,
    };
    if (this.variantName !== undefined) result.variant = this.variantName;
    if (reason !== undefined) result.reason = reason;
    return result;
  }
}
