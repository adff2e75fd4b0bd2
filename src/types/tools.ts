/**
 * Tool dispatch types shared by the registry, dispatcher and transports
 */

export type ToolErrorKind =
  | 'UnknownTool'
  | 'InvalidArguments'
  | 'UnknownProfile'
  | 'UnsafeQuery'
  | 'HandlerError'
  | 'Timeout';

/** Errors raised by a transport before a request reaches the dispatcher. */
export type TransportErrorKind = 'MalformedRequest' | 'InternalError';

export interface ToolCallRequest {
  tool: string;
  arguments: Record<string, unknown>;
}

export type ToolCallResult =
  | { status: 'success'; payload: unknown }
  | { status: 'failure'; kind: ToolErrorKind; message: string; details?: unknown };

export type ToolEnvelope =
  | { result: unknown }
  | { error: { kind: ToolErrorKind | TransportErrorKind; message: string; details?: unknown } };

export type ParameterType = 'number' | 'string' | 'boolean' | 'object';

export interface ParameterDescription {
  type: ParameterType;
  required: boolean;
  default?: unknown;
  description?: string;
}

export interface ToolDescription {
  name: string;
  description: string;
  executesSql: boolean;
  parameters: Record<string, ParameterDescription>;
}

export interface ValidationIssue {
  parameter: string;
  problem: 'missing' | 'type';
  expected: ParameterType;
  message: string;
}
