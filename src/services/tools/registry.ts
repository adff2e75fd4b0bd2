import { SqlConfigProfile, ToolDescription, ValidationIssue } from '../../types/index.js';
import { ConfigurationError } from '../errors.js';
import { Logger } from '../logger.js';
import { SqlConfigStore } from '../sql/configStore.js';
import { SqlClient } from '../sql/mssqlClient.js';
import { ParameterShape, ToolArguments, describeParameters, validateArguments } from './validator.js';

export interface ToolContext {
  logger: Logger;
  configStore: SqlConfigStore;
  signal?: AbortSignal;
}

/** Context for tools that talk to SQL Server through the active profile. */
export interface SqlToolContext extends ToolContext {
  profile: SqlConfigProfile;
  sql: SqlClient;
}

interface ToolDefinitionBase<N extends string, S extends ParameterShape> {
  name: N;
  description: string;
  parameters: S;
}

export interface PlainToolDefinition<N extends string, S extends ParameterShape> extends ToolDefinitionBase<N, S> {
  kind: 'plain';
  handler(args: ToolArguments<S>, context: ToolContext): unknown;
}

export interface SqlToolDefinition<N extends string, S extends ParameterShape> extends ToolDefinitionBase<N, S> {
  kind: 'sql';
  /** User-supplied query text that must pass the safety filter before the handler runs. */
  queryText?(args: ToolArguments<S>): string;
  handler(args: ToolArguments<S>, context: SqlToolContext): unknown;
}

export type ToolDefinition<N extends string, S extends ParameterShape> =
  | PlainToolDefinition<N, S>
  | SqlToolDefinition<N, S>;

export type AnyToolDefinition = ToolDefinition<string, ParameterShape>;

export function definePlainTool<N extends string, S extends ParameterShape>(
  definition: Omit<PlainToolDefinition<N, S>, 'kind'>
): PlainToolDefinition<N, S> {
  return { ...definition, kind: 'plain' };
}

export function defineSqlTool<N extends string, S extends ParameterShape>(
  definition: Omit<SqlToolDefinition<N, S>, 'kind'>
): SqlToolDefinition<N, S> {
  return { ...definition, kind: 'sql' };
}

/**
 * A validated call, ready to run once the dispatcher has supplied its context
 */
export type PreparedToolCall =
  | { kind: 'plain'; invoke(context: ToolContext): Promise<unknown> }
  | { kind: 'sql'; queryText?: string; invoke(context: SqlToolContext): Promise<unknown> };

export type PrepareResult =
  | { ok: true; call: PreparedToolCall }
  | { ok: false; issues: ValidationIssue[] };

export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly kind: 'plain' | 'sql';
  describe(): ToolDescription;
  prepare(args: unknown): PrepareResult;
}

function bindTool<N extends string, S extends ParameterShape>(definition: ToolDefinition<N, S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    kind: definition.kind,
    describe: () => ({
      name: definition.name,
      description: definition.description,
      executesSql: definition.kind === 'sql',
      parameters: describeParameters(definition.parameters),
    }),
    prepare: (args) => {
      const validated = validateArguments(definition.parameters, args);
      if (!validated.ok) {
        return validated;
      }
      const value = validated.value;

      if (definition.kind === 'plain') {
        const plain = definition;
        return {
          ok: true,
          call: { kind: 'plain', invoke: async (context: ToolContext) => plain.handler(value, context) },
        };
      }

      const sqlTool = definition;
      return {
        ok: true,
        call: {
          kind: 'sql',
          queryText: sqlTool.queryText?.(value),
          invoke: async (context: SqlToolContext) => sqlTool.handler(value, context),
        },
      };
    },
  };
}

/**
 * Name → tool lookup, filled once at startup
 */
export class ToolRegistry<N extends string = string> {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly order: N[] = [];
  private sealed = false;

  register(definition: AnyToolDefinition & { name: N }): this {
    if (this.sealed) {
      throw new ConfigurationError(`Cannot register tool '${definition.name}': registry is sealed`);
    }
    if (!definition.name.trim()) {
      throw new ConfigurationError('Tool name must be a non-empty string');
    }
    if (this.tools.has(definition.name)) {
      throw new ConfigurationError(`Tool '${definition.name}' is already registered`);
    }
    this.tools.set(definition.name, bindTool(definition));
    this.order.push(definition.name);
    return this;
  }

  registerAll(definitions: readonly (AnyToolDefinition & { name: N })[]): this {
    for (const definition of definitions) {
      this.register(definition);
    }
    return this;
  }

  /** Blocks further registration. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  resolve(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  /** Registered names, in registration order. */
  names(): N[] {
    return [...this.order];
  }

  describe(): ToolDescription[] {
    return [...this.tools.values()].map(tool => tool.describe());
  }

  get size(): number {
    return this.tools.size;
  }
}
