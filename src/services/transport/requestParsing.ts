import { HttpRequest } from '@azure/functions';
import { ToolCallRequest } from '../../types/index.js';
import { isPlainObject } from '../tools/validator.js';

export type ParsedBody = { ok: true; value: unknown } | { ok: false; message: string };

export type ParsedToolCall = { ok: true; request: ToolCallRequest } | { ok: false; message: string };

export async function readJsonBody(request: HttpRequest): Promise<ParsedBody> {
  const text = await request.text();
  if (!text.trim()) {
    return { ok: false, message: 'Request body is empty' };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, message: 'Request body is not valid JSON' };
  }
}

/**
 * Extracts `{tool, arguments}` from a decoded body. Missing arguments become
 * `{}`; anything else is left to the dispatcher's validation.
 */
export function parseToolCallRequest(body: unknown): ParsedToolCall {
  if (!isPlainObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const { tool } = body;
  if (typeof tool !== 'string' || !tool.trim()) {
    return { ok: false, message: "Request body must include a 'tool' name" };
  }

  const args = body.arguments ?? {};
  if (!isPlainObject(args)) {
    return { ok: false, message: "'arguments' must be a JSON object" };
  }

  return { ok: true, request: { tool, arguments: args } };
}

export function acceptsEventStream(request: HttpRequest): boolean {
  const accept = request.headers.get('accept');
  if (!accept) {
    return false;
  }
  return accept
    .split(',')
    .some(entry => entry.split(';')[0].trim().toLowerCase() === 'text/event-stream');
}
