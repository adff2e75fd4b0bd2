import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { getSettings, SERVER_NAME, SERVER_VERSION } from '../config/settings.js';
import { Logger } from '../services/logger.js';
import { getToolRuntime, ToolRuntime } from '../services/toolRuntime.js';

export function createHealthHandler(getRuntime: () => ToolRuntime) {
  return async (request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> => {
    const logger = new Logger(context);

    try {
      const { registry, configStore } = getRuntime();

      return {
        status: 200,
        jsonBody: {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          server: SERVER_NAME,
          version: SERVER_VERSION,
          activeSqlConfiguration: configStore.getActiveName(),
          toolCount: registry.size,
          environment: getSettings().nodeEnv
        }
      };
    } catch (error) {
      logger.error('Health check failed', error);

      return {
        status: 500,
        jsonBody: {
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          error: 'Health check failed'
        }
      };
    }
  };
}

export const healthHandler = createHealthHandler(getToolRuntime);

// Register the health function
app.http('health', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'health',
  handler: healthHandler
});
