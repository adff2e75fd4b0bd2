import { app } from '@azure/functions';
import { getToolRuntime } from '../services/toolRuntime.js';
import { createToolsStreamHandler } from '../services/transport/toolsStream.js';

export const toolsStreamHandler = createToolsStreamHandler(getToolRuntime);

// Register the SSE tool endpoint
app.http('toolsStream', {
  methods: ['GET', 'POST'],
  authLevel: 'anonymous',
  route: 'tools/stream',
  handler: toolsStreamHandler
});
