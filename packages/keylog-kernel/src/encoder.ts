/**
 * Keylog Encoder: calculation steps → keystroke atoms for one model.
 *
 * Template lookup, most specific first:
 *   "<formula_id>.<variant>"  →  "<formula_id>"  →  "<operation>"
 *
 * Numbers are keyed character by character through the model's symbol
 * table after rounding to the model's precision:
 *   -2.5e-12 → "-", "2", ".", "5", "e", "-", "1", "2"
 *
 * Nothing here depends on which model it is; every difference between
 * calculators lives in the tables.
 */

import type { CalculationResult } from './derivation.js';
import type { InstructionTable, InstructionTables, StepSlot, TemplateSlot } from './instructions.js';
import type { Operation } from './shapes.js';
import type { MissingEncodingRule, Result } from './result.js';
import { TOLERANCE } from './vec3.js';

export interface KeylogResult {
  model: string;
  tokens: readonly string[];
  /** Concatenation of tokens, in order. */
  keylog: string;
}

/**
 * Render a number the way it is keyed in: `precision` significant digits,
 * trailing zeros dropped, exponent as "e" with an optional "-".
 * Magnitudes below TOLERANCE are keyed as 0.
 */
export function formatNumber(value: number, precision: number): string {
  if (Math.abs(value) < TOLERANCE) return '0';
  const rounded = Number(value.toPrecision(precision));
  return String(rounded).replace('e+', 'e');
}

/** Unwinds template evaluation; caught in encode() and returned as data. */
class EncodingFailure extends Error {
  constructor(readonly error: MissingEncodingRule) {
    super(`missing encoding rule for model ${error.model}`);
  }
}

function createEmitter(table: InstructionTable, missing: (detail: Partial<MissingEncodingRule>) => EncodingFailure) {
  const tokens: string[] = [];

  function symbol(name: string): void {
    const atom = table.symbols[name];
    if (atom === undefined) throw missing({ symbol: name });
    tokens.push(atom);
  }

  function number(value: number): void {
    if (!Number.isFinite(value)) throw missing({ symbol: String(value) });
    for (const ch of formatNumber(value, table.precision)) symbol(ch);
  }

  return { tokens, symbol, number };
}

function findTemplate(table: InstructionTable, operation: Operation, calc: CalculationResult) {
  const keys = calc.variant !== undefined
    ? [`${calc.formula_id}.${calc.variant}`, calc.formula_id, operation]
    : [calc.formula_id, operation];
  for (const key of keys) {
    const template = table.templates[key];
    if (template !== undefined) return template;
  }
  return undefined;
}

function isStepSlot(slot: TemplateSlot): slot is StepSlot {
  return 'step' in slot;
}

export function encode(
  operation: Operation,
  calc: CalculationResult,
  model: string,
  tables: InstructionTables,
): Result<KeylogResult, MissingEncodingRule> {
  const missing = (detail: Partial<MissingEncodingRule>) => new EncodingFailure({
    code: 'missing_encoding_rule',
    model,
    operation,
    formula_id: calc.formula_id,
    ...detail,
  });

  const table = tables.get(model);
  if (!table) return { ok: false, error: missing({}).error };
  const template = findTemplate(table, operation, calc);
  if (!template) return { ok: false, error: missing({}).error };

  const e = createEmitter(table, missing);
  try {
    for (const slot of template) {
      if ('key' in slot) {
        e.tokens.push(slot.key);
      } else if ('symbol' in slot) {
        e.symbol(slot.symbol);
      } else if ('value' in slot) {
        const value = calc.numeric_values[slot.value];
        if (value === undefined) throw missing({ placeholder: slot.value });
        e.number(value);
      } else if (isStepSlot(slot)) {
        emitStep(e, slot, calc, missing);
      }
    }
  } catch (failure) {
    if (failure instanceof EncodingFailure) return { ok: false, error: failure.error };
    throw failure;
  }

  return {
    ok: true,
    value: { model: table.model, tokens: e.tokens, keylog: e.tokens.join('') },
  };
}

function emitStep(
  e: ReturnType<typeof createEmitter>,
  slot: StepSlot,
  calc: CalculationResult,
  missing: (detail: Partial<MissingEncodingRule>) => EncodingFailure,
): void {
  const step = calc.intermediate_steps.find((s) => s.name === slot.step);
  if (!step) throw missing({ placeholder: slot.step });

  let values = step.values;
  if (slot.component !== undefined) {
    const v = step.values[slot.component];
    if (v === undefined) throw missing({ placeholder: `${slot.step}[${slot.component}]` });
    values = [v];
  }

  values.forEach((v, i) => {
    if (i > 0) slot.separator?.forEach(e.symbol);
    slot.prefix?.forEach(e.symbol);
    e.number(v);
    slot.suffix?.forEach(e.symbol);
  });
}
