import { app, HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { SERVER_VERSION } from '../config/settings.js';
import { getErrorMessage } from '../services/errors.js';
import { Logger } from '../services/logger.js';
import { getToolRuntime, ToolRuntime } from '../services/toolRuntime.js';

export function createReadyHandler(getRuntime: () => ToolRuntime) {
  return async (request: HttpRequest, context: InvocationContext): Promise<HttpResponseInit> => {
    try {
      getRuntime();
      return {
        status: 200,
        jsonBody: {
          status: 'ready',
          timestamp: new Date().toISOString(),
          version: SERVER_VERSION
        }
      };
    } catch (error) {
      new Logger(context).error('Readiness check failed', error);
      return {
        status: 503,
        jsonBody: {
          status: 'not ready',
          timestamp: new Date().toISOString(),
          reason: getErrorMessage(error)
        }
      };
    }
  };
}

export const readyHandler = createReadyHandler(getToolRuntime);

// Register the readiness function
app.http('ready', {
  methods: ['GET'],
  authLevel: 'anonymous',
  route: 'ready',
  handler: readyHandler
});
