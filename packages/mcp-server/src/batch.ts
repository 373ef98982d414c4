/**
 * Batch ingestion: one request per spreadsheet row.
 *
 *   operation | shape_a | dimension_a | parameters_a | shape_b | dimension_b | parameters_b | calculator_model
 *   distance  | point   | 3           | 1,2,3        | point   | 3           | 4,5,6        | fx799
 *
 * Parameters are comma-separated numbers. shape_b empty means a unary
 * operation; dimension_b defaults to dimension_a; an empty model means
 * the default model. Every row runs against the same table snapshot.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import {
  OPERATIONS, SHAPE_KINDS, describeError, run,
  type Dimension, type OperationRequest, type TableSnapshot,
} from '@geokeys/kernel';

export const BATCH_COLUMNS = [
  'operation', 'shape_a', 'dimension_a', 'parameters_a',
  'shape_b', 'dimension_b', 'parameters_b', 'calculator_model',
] as const;

export type BatchColumn = typeof BATCH_COLUMNS[number];

// ─── Row parsing ────────────────────────────────────────────────

const dimension = z.enum(['2', '3']).transform((d): Dimension => (d === '2' ? 2 : 3));

const numbers = z.string().transform((s, ctx) => {
  const parts = s.split(',').map((p) => p.trim());
  const values = parts.map(Number);
  if (s.trim() === '' || parts.some((p) => p === '') || values.some((v) => !Number.isFinite(v))) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${s}" is not a comma-separated list of numbers` });
    return z.NEVER;
  }
  return values;
});

const unaryRow = z.object({
  operation: z.enum(OPERATIONS),
  shape_a: z.enum(SHAPE_KINDS),
  dimension_a: dimension,
  parameters_a: numbers,
  calculator_model: z.string(),
});

const binaryRow = unaryRow.extend({
  shape_b: z.enum(SHAPE_KINDS),
  dimension_b: dimension,
  parameters_b: numbers,
});

export type BatchRow =
  | { row: number; ok: true; request: OperationRequest }
  | { row: number; ok: false; error: string };

function cell(record: Readonly<Record<string, unknown>>, column: BatchColumn): string {
  const value = record[column];
  return value === undefined || value === null ? '' : String(value).trim();
}

/** Parse one sheet record. `row` is the 1-based sheet row, for messages. */
export function parseRow(record: Readonly<Record<string, unknown>>, row: number, defaultModel: string): BatchRow {
  const text = Object.fromEntries(BATCH_COLUMNS.map((c) => [c, cell(record, c)]));
  const model = text.calculator_model || defaultModel;

  if (text.shape_b === '') {
    const parsed = unaryRow.safeParse(text);
    if (!parsed.success) return { row, ok: false, error: issues(parsed.error) };
    const d = parsed.data;
    return {
      row,
      ok: true,
      request: {
        operation: d.operation,
        shape_a: { kind: d.shape_a, dimension: d.dimension_a, parameters: d.parameters_a },
        calculator_model: model,
      },
    };
  }

  const parsed = binaryRow.safeParse({ ...text, dimension_b: text.dimension_b || text.dimension_a });
  if (!parsed.success) return { row, ok: false, error: issues(parsed.error) };
  const d = parsed.data;
  return {
    row,
    ok: true,
    request: {
      operation: d.operation,
      shape_a: { kind: d.shape_a, dimension: d.dimension_a, parameters: d.parameters_a },
      shape_b: { kind: d.shape_b, dimension: d.dimension_b, parameters: d.parameters_b },
      calculator_model: model,
    },
  };
}

function issues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

/** First sheet of the workbook, header row first. */
export function parseWorkbook(workbook: XLSX.WorkBook, defaultModel: string): BatchRow[] {
  const name = workbook.SheetNames[0];
  const sheet = name !== undefined ? workbook.Sheets[name] : undefined;
  if (!sheet) throw new Error('Workbook has no sheets');

  const header = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1 })[0] ?? [];
  const missing = BATCH_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new Error(`Sheet "${name}" is missing columns: [${missing.join(', ')}]. Expected: [${BATCH_COLUMNS.join(', ')}]`);
  }

  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
  return records.map((record, i) => parseRow(record, i + 2, defaultModel));
}

// ─── Running ────────────────────────────────────────────────────

export interface BatchOutcome {
  row: number;
  operation: string;
  calculator_model: string;
  status: 'completed' | 'rejected' | 'failed' | 'invalid';
  formula_id: string;
  numeric_values: string;
  keylog: string;
  error: string;
}

export function runBatch(rows: readonly BatchRow[], tables: TableSnapshot): BatchOutcome[] {
  return rows.map((row): BatchOutcome => {
    if (!row.ok) {
      return {
        row: row.row, operation: '', calculator_model: '', status: 'invalid',
        formula_id: '', numeric_values: '', keylog: '', error: row.error,
      };
    }
    const { request } = row;
    const result = run(request, tables);
    const base = { row: row.row, operation: request.operation, calculator_model: request.calculator_model };
    if (!result.ok) {
      return { ...base, status: result.state, formula_id: '', numeric_values: '', keylog: '', error: describeError(result.error) };
    }
    const { calculation, keylog } = result.value;
    return {
      ...base,
      status: 'completed',
      formula_id: calculation.formula_id,
      numeric_values: JSON.stringify(calculation.numeric_values),
      keylog: keylog.keylog,
      error: '',
    };
  });
}

export function toWorkbook(outcomes: readonly BatchOutcome[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet([...outcomes]), 'results');
  return workbook;
}

// ─── Files ──────────────────────────────────────────────────────

export interface BatchSummary {
  input: string;
  output: string;
  rows: number;
  completed: number;
  rejected: number;
  failed: number;
  invalid: number;
}

/**
 * Read a .xlsx or .csv file, run every row, write the result workbook into
 * exportDir. CSV cells are read as text so "1,2,3" never turns into a date.
 */
export function runBatchFile(
  filePath: string,
  exportDir: string,
  tables: TableSnapshot,
  defaultModel: string,
): BatchSummary {
  const input = path.resolve(filePath);
  if (!fs.existsSync(input)) {
    throw new Error(`Batch file "${input}" not found`);
  }
  const workbook = XLSX.read(fs.readFileSync(input), { type: 'buffer', raw: true });
  const outcomes = runBatch(parseWorkbook(workbook, defaultModel), tables);

  fs.mkdirSync(exportDir, { recursive: true });
  const safeName = path.basename(input).replace(/\.[^.]*$/, '').replace(/[^a-zA-Z0-9_-]/g, '_');
  const output = path.join(exportDir, `${safeName}-results-${Date.now()}.xlsx`);
  fs.writeFileSync(output, XLSX.write(toWorkbook(outcomes), { type: 'buffer', bookType: 'xlsx' }));

  const count = (status: BatchOutcome['status']) => outcomes.filter((o) => o.status === status).length;
  return {
    input,
    output,
    rows: outcomes.length,
    completed: count('completed'),
    rejected: count('rejected'),
    failed: count('failed'),
    invalid: count('invalid'),
  };
}
