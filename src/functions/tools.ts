import { app } from '@azure/functions';
import { getToolRuntime } from '../services/toolRuntime.js';
import { createToolsHttpHandler } from '../services/transport/toolsHttp.js';

export const toolsHandler = createToolsHttpHandler(getToolRuntime);

app.http('tools', {
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'],
  authLevel: 'anonymous',
  route: 'tools',
  handler: toolsHandler
});
