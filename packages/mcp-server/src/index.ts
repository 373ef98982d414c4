/**
 * geokeys MCP Server
 *
 * Turns geometry requests into calculator keystroke sequences.
 * Runs over stdio transport; logs go to stderr.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigError, loadConfig, type Config } from './config.js';
import { createLogger, errorMessage } from './logger.js';
import { loadTables } from './loader.js';
import { registerTools } from './tools.js';
import * as registry from './registry.js';

function startupConfig(): Config {
  try {
    return loadConfig();
  } catch (e) {
    // No logger yet: the level itself may be what failed.
    console.error(errorMessage(e));
    process.exit(e instanceof ConfigError ? 2 : 1);
  }
}

const config = startupConfig();

const logger = createLogger(config.logLevel);

try {
  registry.install(loadTables(config.tablesDir), config.tablesDir);
} catch (e) {
  logger.error('failed to load tables', { tables_dir: config.tablesDir, error: errorMessage(e) });
  process.exit(1);
}

const status = registry.status();
if (!status.models.includes(config.defaultModel)) {
  logger.error('default calculator model is not in the tables', { model: config.defaultModel, models: status.models });
  process.exit(1);
}

const server = new McpServer({
  name: 'geokeys',
  version: '0.1.0',
});

registerTools(server, config, logger);

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('server ready', { tables_dir: status.tables_dir, version: status.version, models: status.models });
