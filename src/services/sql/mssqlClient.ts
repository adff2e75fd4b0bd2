import sql from 'mssql';
import { SqlConfigProfile, SqlParameter, SqlQueryResult, SqlValue } from '../../types/index.js';
import { Logger } from '../logger.js';
import { CredentialResolverOptions, resolveCredentials } from './credentials.js';

export interface SqlClient {
  query(text: string, parameters?: readonly SqlParameter[]): Promise<SqlQueryResult>;
}

export interface SqlClientOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export type SqlClientFactory = (profile: SqlConfigProfile, options?: SqlClientOptions) => SqlClient;

export function normalizeSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString('base64');
  return String(value);
}

/**
 * Shapes driver rows into JSON-safe records, keeping the column order the
 * driver reports
 */
export function toQueryResult(
  rows: readonly Record<string, unknown>[],
  columns?: Record<string, { index: number; name: string }>
): SqlQueryResult {
  const columnNames = columns
    ? Object.values(columns).sort((a, b) => a.index - b.index).map(column => column.name)
    : Object.keys(rows[0] ?? {});

  return {
    columns: columnNames,
    rows: rows.map(row => {
      const normalized: Record<string, SqlValue> = {};
      for (const column of columnNames) {
        normalized[column] = normalizeSqlValue(row[column]);
      }
      return normalized;
    }),
  };
}

/**
 * One connection per query, opened with the profile's timeout and closed
 * afterwards. Aborting the signal cancels the running request.
 */
export class MssqlClient implements SqlClient {
  private readonly profile: SqlConfigProfile;
  private readonly options: SqlClientOptions & CredentialResolverOptions;

  constructor(profile: SqlConfigProfile, options: SqlClientOptions & CredentialResolverOptions = {}) {
    this.profile = profile;
    this.options = options;
  }

  async query(text: string, parameters: readonly SqlParameter[] = []): Promise<SqlQueryResult> {
    const { signal, logger } = this.options;
    signal?.throwIfAborted();

    const config = await resolveCredentials(this.profile, this.options);
    const pool = new sql.ConnectionPool(config);

    try {
      await pool.connect();
      logger?.debug(`Connected to ${this.profile.server}/${this.profile.database} using profile '${this.profile.name}'`);

      const request = pool.request();
      for (const parameter of parameters) {
        request.input(parameter.name, sql.NVarChar, parameter.value);
      }

      const onAbort = () => request.cancel();
      signal?.addEventListener('abort', onAbort, { once: true });
      try {
        const result = await request.query<Record<string, unknown>>(text);
        const recordset = result.recordset ?? [];
        return toQueryResult(recordset, result.recordset?.columns);
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }
    } finally {
      await pool.close();
    }
  }
}

export const createMssqlClient: SqlClientFactory = (profile, options) => new MssqlClient(profile, options);
