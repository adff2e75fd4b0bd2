import { ToolCallRequest, ToolCallResult, ToolDescription } from '../../types/index.js';
import { ToolError, getErrorMessage, isTimeoutError } from '../errors.js';
import { Logger } from '../logger.js';
import { SqlConfigStore } from '../sql/configStore.js';
import { SqlClientFactory } from '../sql/mssqlClient.js';
import { SafetyCheckResult, checkQuery } from '../sql/safetyFilter.js';
import { failure } from './envelope.js';
import { PreparedToolCall, ToolContext, ToolRegistry } from './registry.js';

export interface ToolDispatcherOptions {
  registry: ToolRegistry;
  configStore: SqlConfigStore;
  sqlClientFactory: SqlClientFactory;
  logger: Logger;
  safetyFilter?: (query: string) => SafetyCheckResult;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

/**
 * ToolDispatcher - runs one tool call from name and JSON arguments to a
 * result, turning every failure into a `ToolCallResult`
 */
export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly configStore: SqlConfigStore;
  private readonly sqlClientFactory: SqlClientFactory;
  private readonly logger: Logger;
  private readonly safetyFilter: (query: string) => SafetyCheckResult;

  constructor(options: ToolDispatcherOptions) {
    this.registry = options.registry;
    this.configStore = options.configStore;
    this.sqlClientFactory = options.sqlClientFactory;
    this.logger = options.logger;
    this.safetyFilter = options.safetyFilter ?? checkQuery;
  }

  describe(): ToolDescription[] {
    return this.registry.describe();
  }

  async dispatch(request: ToolCallRequest, options: DispatchOptions = {}): Promise<ToolCallResult> {
    const tool = this.registry.resolve(request.tool);
    if (!tool) {
      this.logger.warn(`Unknown tool requested: ${request.tool}`);
      return failure('UnknownTool', `Unknown tool '${request.tool}'. Available tools: ${this.registry.names().join(', ')}`);
    }

    const prepared = tool.prepare(request.arguments);
    if (!prepared.ok) {
      const summary = prepared.issues.map(issue => issue.message).join('; ');
      return failure('InvalidArguments', `Invalid arguments for '${tool.name}': ${summary}`, prepared.issues);
    }

    const startedAt = Date.now();
    try {
      const payload = await this.invoke(prepared.call, options.signal);
      if (!payload.ok) {
        return payload.result;
      }
      this.logger.info(`Tool '${tool.name}' completed in ${Date.now() - startedAt}ms`);
      return { status: 'success', payload: payload.value };
    } catch (error) {
      return this.toFailure(tool.name, error, options.signal);
    }
  }

  private async invoke(
    call: PreparedToolCall,
    signal: AbortSignal | undefined
  ): Promise<{ ok: true; value: unknown } | { ok: false; result: ToolCallResult }> {
    const context: ToolContext = { logger: this.logger, configStore: this.configStore, signal };

    if (call.kind === 'plain') {
      return { ok: true, value: await call.invoke(context) };
    }

    // Read once; a concurrent switch affects only later calls
    const profile = this.configStore.getActive();

    if (call.queryText !== undefined) {
      const verdict = this.safetyFilter(call.queryText);
      if (!verdict.allowed) {
        this.logger.warn(`Rejected query: ${verdict.reason}`);
        return {
          ok: false,
          result: failure('UnsafeQuery', verdict.reason, verdict.keyword ? { keyword: verdict.keyword } : undefined),
        };
      }
    }

    const sql = this.sqlClientFactory(profile, { signal, logger: this.logger });
    return { ok: true, value: await call.invoke({ ...context, profile, sql }) };
  }

  private toFailure(toolName: string, error: unknown, signal: AbortSignal | undefined): ToolCallResult {
    const message = getErrorMessage(error);

    if (error instanceof ToolError) {
      this.logger.warn(`Tool '${toolName}' failed (${error.kind}): ${message}`);
      return failure(error.kind, message, error.details);
    }
    if (signal?.aborted || isTimeoutError(error)) {
      this.logger.error(`Tool '${toolName}' timed out`, error);
      return failure('Timeout', message);
    }

    this.logger.error(`Tool '${toolName}' failed`, error);
    return failure('HandlerError', message);
  }
}
