/**
 * Compatibility Table + Combination Validator.
 *
 *   validate(table, 'intersection', { kind: 'plane', dimension: 3 }, { kind: 'line', dimension: 3 })
 *     →  ok: { rule: line × plane → line_plane_intersection, swapped: true }
 *
 * Pairings are symmetric unless the rule is marked directional. Which
 * pairings exist at all is table data; this module only looks them up.
 */

import { isBinary, type Dimension, type Operation, type ShapeKind } from './shapes.js';
import type { DegenerateReason, Result, UnsupportedCombination, UnsupportedReason } from './result.js';
import type { FormulaId } from './kernel.js';

// ─── Types ──────────────────────────────────────────────────────

export const RESULT_KINDS = ['scalar', 'point', 'points', 'line', 'circle', 'equation'] as const;
export type ResultKind = typeof RESULT_KINDS[number];

export interface CompatibilityRule {
  readonly operation: Operation;
  readonly kind_a: ShapeKind;
  readonly kind_b?: ShapeKind;
  readonly dimensions: readonly Dimension[];
  readonly allowed: boolean;
  readonly result_kind: ResultKind;
  readonly formula_id: FormulaId;
  /** Only matches in the stated (kind_a, kind_b) order. */
  readonly directional?: boolean;
  /** Degenerate outcomes this rule completes with instead of failing. */
  readonly tolerate?: readonly DegenerateReason[];
}

export interface CompatibilityTable {
  readonly version: number;
  readonly rules: readonly CompatibilityRule[];
  /**
   * Lookup index keyed by ruleKey(). Built once by createCompatibilityTable();
   * read-only by type only, since a Map still accepts set() after freezing.
   */
  readonly index: ReadonlyMap<string, CompatibilityRule>;
}

export interface RuleMatch {
  rule: CompatibilityRule;
  /** True when the request's shapes matched the rule in reverse order. */
  swapped: boolean;
}

export interface ShapeSignature {
  kind: ShapeKind;
  dimension: Dimension;
}

export function ruleKey(operation: Operation, kindA: ShapeKind, kindB?: ShapeKind): string {
  return `${operation}:${kindA}:${kindB ?? ''}`;
}

/**
 * Build the lookup index. A repeated (operation, kind_a, kind_b) key is a
 * table error.
 */
export function createCompatibilityTable(version: number, rules: readonly CompatibilityRule[]): CompatibilityTable {
  const index = new Map<string, CompatibilityRule>();
  for (const rule of rules) {
    const key = ruleKey(rule.operation, rule.kind_a, rule.kind_b);
    if (index.has(key)) {
      throw new Error(`Duplicate compatibility rule "${key}"`);
    }
    index.set(key, rule);
  }
  return { version, rules, index };
}

// ─── Validation ─────────────────────────────────────────────────

export function validate(
  table: CompatibilityTable,
  operation: Operation,
  a: ShapeSignature,
  b?: ShapeSignature,
): Result<RuleMatch, UnsupportedCombination> {
  const reject = (reason: UnsupportedReason): Result<RuleMatch, UnsupportedCombination> => {
    const error: UnsupportedCombination = {
      code: 'unsupported_combination',
      operation,
      kind_a: a.kind,
      dimension: a.dimension,
      reason,
    };
    if (b) error.kind_b = b.kind;
    return { ok: false, error };
  };

  if (isBinary(operation) !== (b !== undefined)) return reject('arity');
  if (b && b.dimension !== a.dimension) return reject('dimension_mismatch');

  const candidates: RuleMatch[] = [];
  const exact = table.index.get(ruleKey(operation, a.kind, b?.kind));
  if (exact) candidates.push({ rule: exact, swapped: false });
  if (b && b.kind !== a.kind) {
    const reversed = table.index.get(ruleKey(operation, b.kind, a.kind));
    if (reversed && !reversed.directional) candidates.push({ rule: reversed, swapped: true });
  }

  if (candidates.length === 0) return reject('no_rule');
  const match = candidates.find((c) => c.rule.dimensions.includes(a.dimension));
  if (!match) return reject('dimension_unsupported');
  if (!match.rule.allowed) return reject('not_allowed');
  return { ok: true, value: match };
}

/** Every allowed pairing for an operation, in table order. */
export function compatibleShapes(table: CompatibilityTable, operation: Operation): CompatibilityRule[] {
  return table.rules.filter((r) => r.operation === operation && r.allowed);
}
