import { HttpResponseInit } from '@azure/functions';
import { ToolCallRequest } from '../../types/index.js';
import { getErrorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { createDispatcher, ToolRuntime } from '../toolRuntime.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { errorEnvelope, toEnvelope } from '../tools/envelope.js';
import { parseToolCallRequest, readJsonBody } from './requestParsing.js';
import { encodeEvents, formatSseEvent, SSE_HEADERS } from './sse.js';
import { HttpHandler } from './toolsHttp.js';

/**
 * Events for one tool call: `start`, then `result` or `error` carrying the
 * envelope, then `end`
 */
export async function* streamToolCall(
  dispatcher: ToolDispatcher,
  request: ToolCallRequest,
  logger: Logger
): AsyncGenerator<string> {
  yield formatSseEvent('start', { tool: request.tool, timestamp: new Date().toISOString() });

  let status: 'success' | 'failure' = 'failure';
  try {
    const result = await dispatcher.dispatch(request);
    status = result.status;
    yield formatSseEvent(result.status === 'success' ? 'result' : 'error', toEnvelope(result));
  } catch (error) {
    logger.error('Error streaming tool call', error);
    yield formatSseEvent('error', errorEnvelope('InternalError', `Internal server error: ${getErrorMessage(error)}`));
  }

  yield formatSseEvent('end', { tool: request.tool, status, timestamp: new Date().toISOString() });
}

function usage(): HttpResponseInit {
  return {
    status: 200,
    jsonBody: {
      endpoint: '/api/tools/stream',
      method: 'POST',
      contentType: 'application/json',
      body: { tool: '<tool name>', arguments: {} },
      events: ['start', 'result', 'error', 'end'],
    },
  };
}

export function createToolsStreamHandler(getRuntime: () => ToolRuntime): HttpHandler {
  return async (request, context) => {
    const logger = new Logger(context);

    if (request.method === 'GET') {
      return usage();
    }

    try {
      const body = await readJsonBody(request);
      const parsed = body.ok ? parseToolCallRequest(body.value) : body;
      if (!parsed.ok) {
        return {
          status: 400,
          headers: SSE_HEADERS,
          body: formatSseEvent('error', errorEnvelope('MalformedRequest', parsed.message)),
        };
      }

      const dispatcher = createDispatcher(getRuntime(), logger);
      logger.info(`Streaming tool call '${parsed.request.tool}'`);
      return {
        status: 200,
        headers: SSE_HEADERS,
        body: encodeEvents(streamToolCall(dispatcher, parsed.request, logger)),
      };
    } catch (error) {
      logger.error('Error starting tool stream', error);
      return {
        status: 500,
        headers: SSE_HEADERS,
        body: formatSseEvent('error', errorEnvelope('InternalError', `Internal server error: ${getErrorMessage(error)}`)),
      };
    }
  };
}
