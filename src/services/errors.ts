import { ToolErrorKind } from '../types/index.js';

/**
 * Error carrying the failure kind reported back to the caller
 */
export class ToolError extends Error {
  readonly kind: ToolErrorKind;
  readonly details?: unknown;

  constructor(kind: ToolErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = 'ToolError';
    this.kind = kind;
    this.details = details;
  }
}

/**
 * Invalid static configuration: duplicate tools, unknown default profile,
 * missing credential variables.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * True for driver timeouts (mssql/tedious `ETIMEOUT`), requests the driver
 * cancelled (`ECANCEL`) and aborted requests, looking through wrapped causes.
 */
export function isTimeoutError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; current instanceof Error && depth < 5; depth++) {
    if (current.name === 'AbortError' || current.name === 'TimeoutError') return true;
    if ('code' in current && (current.code === 'ETIMEOUT' || current.code === 'ECANCEL')) return true;
    current = current.cause;
  }
  return false;
}

// =============================================================================
// ERROR HANDLING
// =============================================================================

export async function executeWithErrorHandling<T>(
  operation: () => Promise<T>,
  errorContext?: string
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const errorMessage = getErrorMessage(error);
    const message = errorContext ? `${errorContext}: ${errorMessage}` : errorMessage;
    if (error instanceof ToolError) {
      throw new ToolError(error.kind, message, error.details);
    }
    throw new Error(message, { cause: error });
  }
}
