import { HttpRequest, HttpResponseInit, InvocationContext } from '@azure/functions';
import { SERVER_NAME, SERVER_VERSION } from '../../config/settings.js';
import { getErrorMessage } from '../errors.js';
import { Logger } from '../logger.js';
import { createDispatcher, ToolRuntime } from '../toolRuntime.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { errorEnvelope, toEnvelope } from '../tools/envelope.js';
import { isPlainObject } from '../tools/validator.js';
import { acceptsEventStream, parseToolCallRequest, readJsonBody } from './requestParsing.js';
import { formatSseEvent, SSE_HEADERS } from './sse.js';

export type HttpHandler = (request: HttpRequest, context: InvocationContext) => Promise<HttpResponseInit>;

export function toolListing(dispatcher: ToolDispatcher) {
  const tools = dispatcher.describe();
  return { server: SERVER_NAME, version: SERVER_VERSION, toolCount: tools.length, tools };
}

function listingResponse(request: HttpRequest, dispatcher: ToolDispatcher): HttpResponseInit {
  const listing = toolListing(dispatcher);
  if (acceptsEventStream(request)) {
    return {
      status: 200,
      headers: SSE_HEADERS,
      body: formatSseEvent('message', listing) + formatSseEvent('done', { toolCount: listing.toolCount }),
    };
  }
  return { status: 200, jsonBody: listing };
}

function malformed(message: string): HttpResponseInit {
  return { status: 400, jsonBody: errorEnvelope('MalformedRequest', message) };
}

/**
 * Plain JSON tool endpoint: GET lists tools, POST runs one tool
 */
export function createToolsHttpHandler(getRuntime: () => ToolRuntime): HttpHandler {
  return async (request, context) => {
    const logger = new Logger(context);

    try {
      logger.info(`Tools ${request.method} request received`, { url: request.url });
      const dispatcher = createDispatcher(getRuntime(), logger);

      if (request.method === 'GET') {
        return listingResponse(request, dispatcher);
      }
      if (request.method !== 'POST') {
        return {
          status: 405,
          headers: { Allow: 'GET, POST' },
          jsonBody: errorEnvelope('MalformedRequest', 'Tools endpoint supports GET and POST methods only'),
        };
      }

      const body = await readJsonBody(request);
      if (!body.ok) {
        return malformed(body.message);
      }
      if (isPlainObject(body.value) && body.value.action === 'list_tools') {
        return listingResponse(request, dispatcher);
      }

      const parsed = parseToolCallRequest(body.value);
      if (!parsed.ok) {
        return malformed(parsed.message);
      }

      const result = await dispatcher.dispatch(parsed.request);
      return { status: 200, jsonBody: toEnvelope(result) };
    } catch (error) {
      logger.error('Error handling tools request', error);
      return {
        status: 500,
        jsonBody: errorEnvelope('InternalError', `Internal server error: ${getErrorMessage(error)}`),
      };
    }
  };
}
