import { app } from '@azure/functions';
import { getToolRuntime } from '../services/toolRuntime.js';
import { createMcpHandler } from '../services/transport/mcpHandler.js';

export const mcpHandler = createMcpHandler(getToolRuntime);

// Register the MCP function
app.http('mcp', {
  methods: ['GET', 'POST'],
  authLevel: 'anonymous',
  route: 'mcp',
  handler: mcpHandler
});
