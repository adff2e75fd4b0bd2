import { HttpRequest, InvocationContext } from '@azure/functions';
import { Logger } from '../logger.js';
import { SqlConfigStore } from '../sql/configStore.js';
import { SqlClient, SqlClientFactory } from '../sql/mssqlClient.js';
import { createToolRegistry } from '../tools/definitions/index.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { ToolRuntime } from '../toolRuntime.js';
import { SqlConfigProfile, SqlParameter, SqlQueryResult } from '../../types/index.js';

export function makeProfile(overrides: Partial<SqlConfigProfile> = {}): SqlConfigProfile {
  return {
    name: 'local_test',
    title: 'Local Test Server',
    description: 'Local SQL Server with SQL authentication',
    server: 'localhost',
    port: 1433,
    database: 'TestDB',
    authMode: 'password',
    encrypt: false,
    trustServerCertificate: true,
    timeoutSeconds: 30,
    credential: { username: 'sa', passwordVariable: 'TEST_SQL_PASSWORD' },
    ...overrides,
  };
}

export function makeProfiles(): SqlConfigProfile[] {
  return [
    makeProfile({
      name: 'azure_relaxed',
      title: 'Azure (Relaxed)',
      description: 'Azure SQL with relaxed certificate validation',
      server: 'test-server.database.windows.net',
      authMode: 'interactive-ad',
      encrypt: true,
      timeoutSeconds: 60,
      credential: { usernameVariable: 'TEST_SQL_USERNAME' },
    }),
    makeProfile(),
    makeProfile({ name: 'docker_test', title: 'Docker', server: '127.0.0.1', database: 'master' }),
  ];
}

export function makeStore(active = 'azure_relaxed'): SqlConfigStore {
  return new SqlConfigStore(makeProfiles(), active);
}

export interface RecordedQuery {
  profile: string;
  text: string;
  parameters: readonly SqlParameter[];
}

/**
 * In-memory SqlClient that records queries and answers from a callback
 */
export function fakeSqlClientFactory(
  answer: (text: string, parameters: readonly SqlParameter[]) => SqlQueryResult | Promise<SqlQueryResult> = () => ({
    columns: [],
    rows: [],
  })
): { factory: SqlClientFactory; queries: RecordedQuery[] } {
  const queries: RecordedQuery[] = [];
  const factory: SqlClientFactory = profile => {
    const client: SqlClient = {
      query: async (text, parameters = []) => {
        queries.push({ profile: profile.name, text, parameters });
        return answer(text, parameters);
      },
    };
    return client;
  };
  return { factory, queries };
}

export function quietContext(functionName = 'test'): InvocationContext {
  return new InvocationContext({ invocationId: 'test-invocation', functionName, logHandler: () => {} });
}

export function quietLogger(): Logger {
  return new Logger(quietContext());
}

export function makeRuntime(sqlClientFactory: SqlClientFactory = fakeSqlClientFactory().factory): ToolRuntime {
  return { registry: createToolRegistry(), configStore: makeStore(), sqlClientFactory };
}

export function makeDispatcher(runtime: ToolRuntime = makeRuntime()): ToolDispatcher {
  return new ToolDispatcher({ ...runtime, logger: quietLogger() });
}

export function jsonRequest(method: string, url: string, body?: unknown, headers: Record<string, string> = {}): HttpRequest {
  return new HttpRequest({
    method,
    url,
    headers: { 'content-type': 'application/json', ...headers },
    ...(body === undefined ? {} : { body: { string: typeof body === 'string' ? body : JSON.stringify(body) } }),
  });
}
