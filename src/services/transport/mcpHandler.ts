import { HttpResponseInit } from '@azure/functions';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  JSONRPCMessage,
  JSONRPCMessageSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME, SERVER_VERSION } from '../../config/settings.js';
import { ToolDescription } from '../../types/index.js';
import { BMI_RESOURCE_TYPES, bmiResourceUri, getBmiResource, listBmiResources } from '../bmi.js';
import { Logger } from '../logger.js';
import { createDispatcher, ToolRuntime } from '../toolRuntime.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { toEnvelope } from '../tools/envelope.js';
import { isPlainObject } from '../tools/validator.js';
import { InvocationTransport } from './mcpTransport.js';
import { HttpHandler } from './toolsHttp.js';

export function toMcpTool(description: ToolDescription): Tool {
  const properties: Record<string, object> = {};
  const required: string[] = [];

  for (const [name, parameter] of Object.entries(description.parameters)) {
    properties[name] = {
      type: parameter.type,
      ...(parameter.description ? { description: parameter.description } : {}),
      ...(parameter.default !== undefined ? { default: parameter.default } : {}),
    };
    if (parameter.required) {
      required.push(name);
    }
  }

  return {
    name: description.name,
    description: description.description,
    inputSchema: {
      type: 'object',
      properties,
      ...(required.length > 0 ? { required } : {}),
    },
  };
}

export function createMcpServer(dispatcher: ToolDispatcher, logger: Logger): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.describe().map(toMcpTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name } = request.params;
    logger.info(`MCP tools/call '${name}'`);

    const result = await dispatcher.dispatch(
      { tool: name, arguments: request.params.arguments ?? {} },
      { signal: extra.signal }
    );

    return {
      content: [{ type: 'text', text: JSON.stringify(toEnvelope(result), null, 2) }],
      isError: result.status === 'failure',
    };
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: listBmiResources().map(resource => ({
      uri: resource.uri,
      name: resource.type,
      title: resource.title,
      description: resource.description,
      mimeType: 'application/json',
    })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async request => {
    const { uri } = request.params;
    const type = BMI_RESOURCE_TYPES.find(candidate => bmiResourceUri(candidate) === uri);
    if (!type) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }

    return {
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(getBmiResource(type), null, 2) }],
    };
  });

  server.onerror = error => logger.error('MCP server error', error);
  return server;
}

const METHOD_NOT_ALLOWED = -32000;

interface RpcErrorReply {
  jsonrpc: '2.0';
  id: string | number | null;
  error: { code: number; message: string };
}

function rpcErrorReply(code: number, message: string, id: string | number | null = null): RpcErrorReply {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

function rpcError(code: number, message: string, status: number): HttpResponseInit {
  return { status, jsonBody: rpcErrorReply(code, message) };
}

async function handleMessage(
  transport: InvocationTransport,
  raw: unknown
): Promise<JSONRPCMessage | RpcErrorReply | undefined> {
  const parsed = JSONRPCMessageSchema.safeParse(raw);
  if (!parsed.success) {
    const id = isPlainObject(raw) && (typeof raw.id === 'string' || typeof raw.id === 'number') ? raw.id : null;
    return rpcErrorReply(ErrorCode.InvalidRequest, 'Invalid JSON-RPC message', id);
  }
  return transport.handle(parsed.data);
}

/**
 * Stateless MCP endpoint: every POST gets a fresh server connected to an
 * in-memory transport, answers the message (or batch) and closes.
 */
export function createMcpHandler(getRuntime: () => ToolRuntime): HttpHandler {
  return async (request, context) => {
    const logger = new Logger(context);

    if (request.method !== 'POST') {
      return {
        status: 405,
        headers: { Allow: 'POST' },
        jsonBody: rpcErrorReply(METHOD_NOT_ALLOWED, 'Method not allowed'),
      };
    }

    let body: unknown;
    try {
      body = JSON.parse(await request.text());
    } catch {
      return rpcError(ErrorCode.ParseError, 'Parse error', 400);
    }

    const transport = new InvocationTransport();
    let server: Server | undefined;

    try {
      server = createMcpServer(createDispatcher(getRuntime(), logger), logger);
      await server.connect(transport);

      if (Array.isArray(body)) {
        if (body.length === 0) {
          return rpcError(ErrorCode.InvalidRequest, 'Empty batch', 400);
        }
        const responses: Array<JSONRPCMessage | RpcErrorReply> = [];
        for (const message of body) {
          const response = await handleMessage(transport, message);
          if (response) responses.push(response);
        }
        return responses.length > 0 ? { status: 200, jsonBody: responses } : { status: 202 };
      }

      const response = await handleMessage(transport, body);
      return response ? { status: 200, jsonBody: response } : { status: 202 };
    } catch (error) {
      logger.error('Error handling MCP request', error);
      return rpcError(ErrorCode.InternalError, 'Internal server error', 500);
    } finally {
      await server?.close();
    }
  };
}
