#!/usr/bin/env node
/**
 * MCP server executable
 */

import { createChildLogger } from '../utils/logger.js';
import { main } from './server.js';

const log = createChildLogger('mcp-server');

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'Failed to start MCP server');
  process.exit(1);
});
