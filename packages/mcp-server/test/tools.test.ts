import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { loadConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';
import { registerTools } from '../src/tools.js';

describe('registerTools', () => {
  it('registers each tool once', () => {
    const server = new McpServer({ name: 'geokeys-test', version: '0.0.0' });
    const config = loadConfig({});
    const logger = createLogger('error', () => {});
    expect(() => registerTools(server, config, logger)).not.toThrow();
    expect(() => registerTools(server, config, logger)).toThrow();
  });
});
