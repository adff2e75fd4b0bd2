import { ToolCallResult, ToolEnvelope, ToolErrorKind, TransportErrorKind } from '../../types/index.js';

export function toEnvelope(result: ToolCallResult): ToolEnvelope {
  if (result.status === 'success') {
    return { result: result.payload };
  }
  return {
    error: {
      kind: result.kind,
      message: result.message,
      ...(result.details !== undefined ? { details: result.details } : {}),
    },
  };
}

export function errorEnvelope(kind: ToolErrorKind | TransportErrorKind, message: string): ToolEnvelope {
  return { error: { kind, message } };
}

export function failure(kind: ToolErrorKind, message: string, details?: unknown): ToolCallResult {
  return details === undefined ? { status: 'failure', kind, message } : { status: 'failure', kind, message, details };
}
