import { SERVER_NAME, SERVER_VERSION, getHostInfo } from '../../../config/settings.js';
import { definePlainTool } from '../registry.js';
import { param } from '../validator.js';

export const greetTool = definePlainTool({
  name: 'greet',
  description: 'Return a greeting for the given name',
  parameters: {
    name: param.string('Name of the person to greet'),
  },
  handler: ({ name }) => ({
    message: `Hello, ${name}! Greetings from Azure Functions with MCP Server integration!`,
  }),
});

export const getServerInfoTool = definePlainTool({
  name: 'get_server_info',
  description: 'Describe the function app hosting these tools and the active SQL configuration',
  parameters: {},
  handler: (_args, { configStore }) => ({
    server: SERVER_NAME,
    version: SERVER_VERSION,
    ...getHostInfo(),
    activeSqlConfiguration: configStore.getActiveName(),
    timestamp: new Date().toISOString(),
  }),
});
