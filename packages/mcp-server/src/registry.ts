/**
 * Table Registry: the process-wide table snapshot.
 *
 * Tools read current() once per request and hand that snapshot to the
 * pipeline. reload() builds a complete new snapshot before swapping it
 * in; a reload that fails leaves the previous snapshot serving.
 */

import { TableError, TableStore, type TableSnapshot } from '@geokeys/kernel';
import { loadTables } from './loader.js';

export interface TableStatus {
  tables_dir: string;
  version: number;
  generation: number;
  loaded_at: string;
  models: string[];
  rule_count: number;
}

export type ReloadResult =
  | { ok: true; status: TableStatus }
  | { ok: false; issues: readonly string[]; status: TableStatus };

let store: TableStore | undefined;
let tablesDir = '';
let loadedAt = new Date(0);

/** Install the first snapshot, or replace the current one. */
export function install(snapshot: TableSnapshot, dir: string, at: Date = new Date()): void {
  if (store) store.replace(snapshot);
  else store = new TableStore(snapshot);
  tablesDir = dir;
  loadedAt = at;
}

/** Current snapshot or a clear error. */
export function current(): TableSnapshot {
  if (!store) {
    throw new Error('Tables are not loaded. The server installs them at startup; check the startup log.');
  }
  return store.current();
}

export function status(): TableStatus {
  const snapshot = current();
  return {
    tables_dir: tablesDir,
    version: snapshot.version,
    generation: store?.generation ?? 0,
    loaded_at: loadedAt.toISOString(),
    models: [...snapshot.instructions.keys()].sort(),
    rule_count: snapshot.compatibility.rules.length,
  };
}

/** Re-read the table directory. Only TableErrors are reported; anything else is a bug and throws. */
export function reload(dir: string = tablesDir): ReloadResult {
  current();
  let next: TableSnapshot;
  try {
    next = loadTables(dir);
  } catch (e) {
    if (!(e instanceof TableError)) throw e;
    return { ok: false, issues: e.issues, status: status() };
  }
  install(next, dir);
  return { ok: true, status: status() };
}

/** Drop the snapshot. */
export function clear(): void {
  store = undefined;
  tablesDir = '';
  loadedAt = new Date(0);
}
