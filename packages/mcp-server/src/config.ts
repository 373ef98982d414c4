/**
 * Server configuration from the environment.
 *
 *   GEOKEYS_TABLES_DIR     compatibility.json + calculators/*.json (default: ../tables)
 *   GEOKEYS_DEFAULT_MODEL  model used when a request names none (default: fx799)
 *   GEOKEYS_LOG_LEVEL      debug | info | warn | error (default: info)
 *   GEOKEYS_EXPORT_DIR     batch result workbooks (default: $TMPDIR/geokeys)
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const DEFAULT_TABLES_DIR = fileURLToPath(new URL('../tables/', import.meta.url));

const envSchema = z.object({
  GEOKEYS_TABLES_DIR: z.string().min(1).optional(),
  GEOKEYS_DEFAULT_MODEL: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'model ids use letters, digits, hyphens, underscores').default('fx799'),
  GEOKEYS_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  GEOKEYS_EXPORT_DIR: z.string().min(1).optional(),
  TMPDIR: z.string().optional(),
});

export interface Config {
  tablesDir: string;
  defaultModel: string;
  logLevel: LogLevel;
  exportDir: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    tablesDir: path.resolve(e.GEOKEYS_TABLES_DIR ?? DEFAULT_TABLES_DIR),
    defaultModel: e.GEOKEYS_DEFAULT_MODEL,
    logLevel: e.GEOKEYS_LOG_LEVEL,
    exportDir: path.resolve(e.GEOKEYS_EXPORT_DIR ?? path.join(e.TMPDIR ?? '/tmp', 'geokeys')),
  };
}
