import { z } from 'zod';
import { ParameterDescription, ParameterType, ValidationIssue } from '../../types/index.js';

export type ParameterShape = z.ZodRawShape;

/** The typed parameter struct a handler receives after validation. */
export type ToolArguments<S extends ParameterShape> = z.infer<z.ZodObject<S>>;

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; issues: ValidationIssue[] };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// MCP triggers and query strings deliver numbers as text
function coerceNumeric(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? value : parsed;
  }
  return value;
}

/**
 * Parameter builders. Chain `.optional()` or `.default(value)` for optional parameters.
 */
export const param = {
  number: (description: string) => z.preprocess(coerceNumeric, z.number().finite()).describe(description),
  string: (description: string) => z.string().describe(description),
  boolean: (description: string) => z.boolean().describe(description),
  object: (description: string) => z.record(z.unknown()).describe(description),
};

/**
 * Reads type, requiredness and default back out of a parameter schema
 */
export function describeParameter(schema: z.ZodTypeAny): ParameterDescription {
  let current: z.ZodTypeAny = schema;
  let required = true;
  let defaultValue: unknown;
  let description = schema.description;

  for (;;) {
    description = description ?? current.description;
    if (current instanceof z.ZodDefault) {
      required = false;
      defaultValue = current._def.defaultValue();
      current = current.removeDefault();
    } else if (current instanceof z.ZodOptional) {
      required = false;
      current = current.unwrap();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
  }

  let type: ParameterType = 'object';
  if (current instanceof z.ZodNumber) type = 'number';
  else if (current instanceof z.ZodString) type = 'string';
  else if (current instanceof z.ZodBoolean) type = 'boolean';

  return {
    type,
    required,
    ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    ...(description ? { description } : {}),
  };
}

export function describeParameters(shape: ParameterShape): Record<string, ParameterDescription> {
  const described: Record<string, ParameterDescription> = {};
  for (const [name, schema] of Object.entries(shape)) {
    described[name] = describeParameter(schema);
  }
  return described;
}

/**
 * Checks submitted arguments against a tool's parameters. Missing required
 * parameters and type mismatches are reported per parameter; parameters the
 * tool does not declare are dropped; defaults are filled in.
 */
export function validateArguments<S extends ParameterShape>(
  shape: S,
  args: unknown
): ValidationOutcome<ToolArguments<S>> {
  if (args !== undefined && args !== null && !isPlainObject(args)) {
    return {
      ok: false,
      issues: [{ parameter: '', problem: 'type', expected: 'object', message: 'Arguments must be a JSON object' }],
    };
  }

  const supplied = isPlainObject(args) ? args : {};
  const input: Record<string, unknown> = {};
  const issues: ValidationIssue[] = [];

  for (const [name, schema] of Object.entries(shape)) {
    const value = supplied[name];
    if (value === undefined || value === null) {
      const { type, required } = describeParameter(schema);
      if (required) {
        issues.push({ parameter: name, problem: 'missing', expected: type, message: `Missing required parameter '${name}'` });
      }
      continue;
    }
    input[name] = value;
  }

  const parsed = z.object(shape).safeParse(input);
  if (parsed.success && issues.length === 0) {
    return { ok: true, value: parsed.data };
  }

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const name = String(issue.path[0] ?? '');
      if (issues.some(existing => existing.parameter === name)) continue;
      const schema = Object.prototype.hasOwnProperty.call(shape, name) ? shape[name] : undefined;
      const expected = schema ? describeParameter(schema).type : 'object';
      issues.push({ parameter: name, problem: 'type', expected, message: `Parameter '${name}' must be of type ${expected}` });
    }
  }

  return { ok: false, issues };
}
