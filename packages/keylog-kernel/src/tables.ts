/**
 * Static tables: schema checks, cross checks and the snapshot store.
 *
 * Tables arrive as parsed JSON from whoever loads configuration. They are
 * validated once, frozen, and swapped in whole: a pipeline run reads one
 * snapshot from start to finish, never a half-replaced table.
 */

import { z } from 'zod';
import { OPERATIONS, SHAPE_KINDS, type Operation } from './shapes.js';
import { DEGENERATE_REASONS } from './result.js';
import { FORMULA_IDS, FORMULAS, type FormulaId } from './kernel.js';
import { RESULT_KINDS, createCompatibilityTable, type CompatibilityRule, type CompatibilityTable } from './compatibility.js';
import { resolveInstructionTables, type InstructionTableSource, type InstructionTables } from './instructions.js';

// ─── Schemas ────────────────────────────────────────────────────

const dimensionSchema = z.union([z.literal(2), z.literal(3)]);

const ruleSchema = z.object({
  operation: z.enum(OPERATIONS),
  kind_a: z.enum(SHAPE_KINDS),
  kind_b: z.enum(SHAPE_KINDS).optional(),
  dimensions: z.array(dimensionSchema).min(1),
  allowed: z.boolean().default(true),
  result_kind: z.enum(RESULT_KINDS),
  formula_id: z.enum(FORMULA_IDS),
  directional: z.boolean().optional(),
  tolerate: z.array(z.enum(DEGENERATE_REASONS)).optional(),
}).strict();

export const compatibilitySchema = z.object({
  version: z.number().int().nonnegative(),
  rules: z.array(ruleSchema),
}).strict();

const symbolList = z.array(z.string().min(1));

const slotSchema = z.union([
  z.object({ key: z.string().min(1) }).strict(),
  z.object({ symbol: z.string().min(1) }).strict(),
  z.object({ value: z.string().min(1) }).strict(),
  z.object({
    step: z.string().min(1),
    component: z.number().int().nonnegative().optional(),
    prefix: symbolList.optional(),
    suffix: symbolList.optional(),
    separator: symbolList.optional(),
  }).strict(),
]);

export const instructionTableSchema = z.object({
  model: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'model ids use letters, digits, hyphens, underscores'),
  name: z.string().optional(),
  extends: z.string().optional(),
  precision: z.number().int().min(1).max(15).optional(),
  symbols: z.record(z.string(), z.string().min(1)).default({}),
  templates: z.record(z.string(), z.array(slotSchema).min(1)).default({}),
}).strict();

// ─── Snapshot ───────────────────────────────────────────────────

export interface TableSnapshot {
  readonly version: number;
  readonly compatibility: CompatibilityTable;
  readonly instructions: InstructionTables;
}

export interface RawTables {
  compatibility: unknown;
  calculators: readonly unknown[];
}

/** Malformed or inconsistent tables. Fatal at startup. */
export class TableError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid tables:\n  ${issues.join('\n  ')}`);
    this.name = 'TableError';
  }
}

function zodIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((i) => `${prefix}${i.path.length ? '.' + i.path.join('.') : ''}: ${i.message}`);
}

/** Allowed rules must match the operation and kinds of the formula they name. */
function checkRule(rule: CompatibilityRule, i: number): string[] {
  const formula = FORMULAS[rule.formula_id];
  const issues: string[] = [];
  if (formula.operation !== rule.operation) {
    issues.push(`compatibility.rules.${i}: ${rule.formula_id} computes ${formula.operation}, not ${rule.operation}`);
  }
  const kinds = rule.kind_b !== undefined ? [rule.kind_a, rule.kind_b] : [rule.kind_a];
  if (kinds.join(',') !== formula.kinds.join(',')) {
    issues.push(
      `compatibility.rules.${i}: ${rule.formula_id} takes (${formula.kinds.join(', ')}), rule says (${kinds.join(', ')})`
    );
  }
  return issues;
}

function isTemplateKey(key: string): boolean {
  const [head, variant, ...rest] = key.split('.');
  if (rest.length > 0) return false;
  if (variant !== undefined) return variant.length > 0 && isFormulaId(head);
  return isFormulaId(head) || isOperation(head);
}

function isFormulaId(value: string): value is FormulaId {
  return FORMULA_IDS.some((id) => id === value);
}

function isOperation(value: string): value is Operation {
  return OPERATIONS.some((op) => op === value);
}

/**
 * Object.freeze on plain objects and arrays. Maps come out frozen but still
 * accept set(); the lookup Maps stay read-only through their ReadonlyMap type
 * and their values (rules, model tables) are frozen here.
 */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validate raw tables and build an immutable snapshot.
 * Collects every problem before throwing one TableError.
 */
export function createTables(raw: RawTables): TableSnapshot {
  const issues: string[] = [];

  const compat = compatibilitySchema.safeParse(raw.compatibility);
  if (!compat.success) issues.push(...zodIssues('compatibility', compat.error));

  const sources: InstructionTableSource[] = [];
  raw.calculators.forEach((entry, i) => {
    const parsed = instructionTableSchema.safeParse(entry);
    if (!parsed.success) {
      issues.push(...zodIssues(`calculators.${i}`, parsed.error));
      return;
    }
    for (const key of Object.keys(parsed.data.templates)) {
      if (!isTemplateKey(key)) {
        issues.push(`calculators.${i}.templates: "${key}" is not a formula id, formula_id.variant or operation`);
      }
    }
    sources.push(parsed.data);
  });
  if (raw.calculators.length === 0) issues.push('calculators: at least one calculator model is required');

  if (compat.success) {
    compat.data.rules.forEach((rule, i) => {
      if (rule.allowed) issues.push(...checkRule(rule, i));
    });
  }
  if (!compat.success || issues.length > 0) throw new TableError(issues);

  let compatibility: CompatibilityTable;
  let instructions: InstructionTables;
  try {
    compatibility = createCompatibilityTable(compat.data.version, compat.data.rules);
    instructions = resolveInstructionTables(sources);
  } catch (e) {
    throw new TableError([e instanceof Error ? e.message : String(e)]);
  }

  for (const table of instructions.values()) deepFreeze(table);
  deepFreeze(compatibility);
  Object.freeze(instructions);
  return Object.freeze({ version: compatibility.version, compatibility, instructions });
}

// ─── Store ──────────────────────────────────────────────────────

/**
 * Holds the current snapshot. replace() is a single reference swap:
 * callers that already read current() keep their snapshot.
 */
export class TableStore {
  private snapshot: TableSnapshot;
  private swaps = 0;

  constructor(initial: TableSnapshot) {
    this.snapshot = initial;
  }

  current(): TableSnapshot {
    return this.snapshot;
  }

  replace(next: TableSnapshot): void {
    this.snapshot = next;
    this.swaps++;
  }

  /** Number of replacements since construction. */
  get generation(): number {
    return this.swaps;
  }
}
