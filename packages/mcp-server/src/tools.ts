/**
 * MCP Tool Registrations: 9 tools over the keylog pipeline.
 *
 * Successful tools return their JSON result as text. Requests the
 * pipeline rejects or fails come back as isError results carrying the
 * typed error, so the caller can tell which stage stopped and why.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { OPERATIONS, SHAPE_KINDS } from '@geokeys/kernel';
import * as registry from './registry.js';
import * as service from './service.js';
import { runBatchFile } from './batch.js';
import type { Config } from './config.js';
import type { Logger } from './logger.js';

const shapeDescriptor = z.object({
  kind: z.enum(SHAPE_KINDS).describe('Shape kind'),
  dimension: z.union([z.literal(2), z.literal(3)]).describe('2 or 3'),
  parameters: z.array(z.number()).describe('Flat parameter list; see list_shapes for the layout per kind and dimension'),
});

const requestShape = {
  operation: z.enum(OPERATIONS).describe('Operation to perform'),
  shape_a: shapeDescriptor.describe('First (or only) shape'),
  shape_b: shapeDescriptor.optional().describe('Second shape, for distance and intersection'),
  calculator_model: z.string().optional().describe('Calculator model id; see list_calculators. Defaults to the server default'),
};

function text(result: unknown, isError = false) {
  const content = [{ type: 'text' as const, text: JSON.stringify(result) }];
  return isError ? { content, isError } : { content };
}

export function registerTools(server: McpServer, config: Config, logger: Logger): void {

  // ─── Pipeline (2) ───────────────────────────────────────────

  server.tool(
    'calculate',
    'Compute a geometric result and the calculator keystroke sequence that reproduces it.',
    requestShape,
    async (input) => {
      const result = service.calculate(input, config.defaultModel);
      if (result.status !== 'completed') {
        logger.info('calculate stopped', { state: result.status, code: result.error.code, message: result.message });
        return text(result, true);
      }
      logger.debug('calculate completed', { formula_id: result.formula_id, model: result.model });
      return text(result);
    }
  );

  server.tool(
    'validate_request',
    'Check whether an operation and shape combination is supported, without computing it.',
    requestShape,
    async (input) => {
      const result = service.validateRequest(input, config.defaultModel);
      return text(result, !result.valid);
    }
  );

  // ─── Catalogue (4) ──────────────────────────────────────────

  server.tool(
    'list_shapes',
    'List shape kinds with their dimensions and parameter layouts.',
    {},
    async () => text(service.listShapes())
  );

  server.tool(
    'compatible_shapes',
    'List the shape pairings an operation supports, with the formula each one uses.',
    {
      operation: z.enum(OPERATIONS).describe('Operation to look up'),
    },
    async ({ operation }) => text(service.compatiblePairings(operation))
  );

  server.tool(
    'list_calculators',
    'List calculator models, their precision and the templates they define.',
    {},
    async () => text(service.listCalculators(config.defaultModel))
  );

  server.tool(
    'get_examples',
    'Example requests, ready to pass to calculate.',
    {
      operation: z.enum(OPERATIONS).optional().describe('Only examples for this operation'),
    },
    async ({ operation }) => text(service.getExamples(config.defaultModel, operation))
  );

  // ─── Tables (2) ─────────────────────────────────────────────

  server.tool(
    'table_status',
    'Show the loaded table snapshot: version, generation, load time and models.',
    {},
    async () => text(registry.status())
  );

  server.tool(
    'reload_tables',
    'Re-read the compatibility and calculator tables. A failed reload keeps the current tables.',
    {},
    async () => {
      const result = registry.reload();
      if (!result.ok) {
        logger.warn('table reload rejected', { issues: result.issues });
        return text(result, true);
      }
      logger.info('tables reloaded', { generation: result.status.generation, models: result.status.models });
      return text(result);
    }
  );

  // ─── Batch (1) ──────────────────────────────────────────────

  server.tool(
    'calculate_batch',
    `Run every row of a .xlsx or .csv file through calculate and write a result workbook to ${config.exportDir}.`,
    {
      file_path: z.string().min(1).describe('Path to the input sheet'),
    },
    async ({ file_path }) => {
      const summary = runBatchFile(file_path, config.exportDir, registry.current(), config.defaultModel);
      logger.info('batch finished', { ...summary });
      return text(summary);
    }
  );
}
