/**
 * Instruction Tables: per calculator model keystroke data.
 *
 * A model maps symbols (digits, sign, operators, function keys) to
 * keystroke atoms and maps formula ids or operations to templates.
 * Models may extend another model and override individual entries;
 * inheritance is flattened once here so the encoder never walks it.
 */

// ─── Template slots ─────────────────────────────────────────────

/** Literal keystroke atom, emitted as-is. */
export interface KeySlot { readonly key: string }

/** Named symbol looked up in the model's symbol table. */
export interface SymbolSlot { readonly symbol: string }

/** A numeric value from the calculation, keyed digit by digit. */
export interface ValueSlot { readonly value: string }

/**
 * A step from the derivation. All components are keyed unless
 * `component` picks one; each is wrapped in prefix / suffix symbols and
 * separated by separator symbols.
 */
export interface StepSlot {
  readonly step: string;
  readonly component?: number;
  readonly prefix?: readonly string[];
  readonly suffix?: readonly string[];
  readonly separator?: readonly string[];
}

export type TemplateSlot = KeySlot | SymbolSlot | ValueSlot | StepSlot;

export type Template = readonly TemplateSlot[];

// ─── Tables ─────────────────────────────────────────────────────

/** Model entry as written in configuration, before inheritance. */
export interface InstructionTableSource {
  readonly model: string;
  readonly name?: string;
  readonly extends?: string;
  readonly precision?: number;
  readonly symbols: Readonly<Record<string, string>>;
  readonly templates: Readonly<Record<string, Template>>;
}

/** Fully resolved model. */
export interface InstructionTable {
  readonly model: string;
  readonly name: string;
  readonly precision: number;
  readonly symbols: Readonly<Record<string, string>>;
  /** Keyed by "formula_id.variant", formula_id or operation. */
  readonly templates: Readonly<Record<string, Template>>;
}

export type InstructionTables = ReadonlyMap<string, InstructionTable>;

export const DEFAULT_PRECISION = 10;

/**
 * Flatten `extends` chains. Unknown parents and cycles throw; callers
 * treat that as a configuration failure.
 */
export function resolveInstructionTables(sources: readonly InstructionTableSource[]): Map<string, InstructionTable> {
  const byModel = new Map<string, InstructionTableSource>();
  for (const src of sources) {
    if (byModel.has(src.model)) {
      throw new Error(`Calculator model "${src.model}" is defined twice`);
    }
    byModel.set(src.model, src);
  }

  const resolved = new Map<string, InstructionTable>();

  function resolve(model: string, chain: string[]): InstructionTable {
    const done = resolved.get(model);
    if (done) return done;

    const src = byModel.get(model);
    if (!src) {
      throw new Error(
        `Calculator model "${chain[chain.length - 1]}" extends unknown model "${model}". ` +
        `Known models: [${[...byModel.keys()].join(', ')}]`
      );
    }
    if (chain.includes(model)) {
      throw new Error(`Calculator model inheritance cycle: ${[...chain, model].join(' → ')}`);
    }

    const parent = src.extends !== undefined ? resolve(src.extends, [...chain, model]) : undefined;
    const table: InstructionTable = {
      model: src.model,
      name: src.name ?? parent?.name ?? src.model,
      precision: src.precision ?? parent?.precision ?? DEFAULT_PRECISION,
      symbols: { ...parent?.symbols, ...src.symbols },
      templates: { ...parent?.templates, ...src.templates },
    };
    resolved.set(model, table);
    return table;
  }

  for (const model of byModel.keys()) resolve(model, []);
  return resolved;
}
