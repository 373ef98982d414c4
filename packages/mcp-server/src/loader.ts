/**
 * Reads the table directory:
 *
 *   <dir>/compatibility.json
 *   <dir>/calculators/*.json     one model per file, read in name order
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createTables, TableError, type RawTables, type TableSnapshot } from '@geokeys/kernel';
import { errorMessage } from './logger.js';

function readJson(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new TableError([`${file}: ${errorMessage(e)}`]);
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (e) {
    throw new TableError([`${file}: ${errorMessage(e)}`]);
  }
}

export function calculatorFiles(dir: string): string[] {
  const calcDir = path.join(dir, 'calculators');
  if (!fs.existsSync(calcDir)) return [];
  return fs.readdirSync(calcDir).filter((f) => f.endsWith('.json')).sort();
}

export function readRawTables(dir: string): RawTables {
  return {
    compatibility: readJson(path.join(dir, 'compatibility.json')),
    calculators: calculatorFiles(dir).map((f) => readJson(path.join(dir, 'calculators', f))),
  };
}

/** Load and validate a table directory. Issues name the offending file. */
export function loadTables(dir: string): TableSnapshot {
  const files = calculatorFiles(dir);
  try {
    return createTables(readRawTables(dir));
  } catch (e) {
    if (!(e instanceof TableError)) throw e;
    throw new TableError(e.issues.map((issue) =>
      issue.replace(/^calculators\.(\d+)/, (whole, i: string) => {
        const file = files[Number(i)];
        return file !== undefined ? `calculators/${file}` : whole;
      })
    ));
  }
}
