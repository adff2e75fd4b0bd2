/**
 * SQL Server profile and query result types
 */

export type SqlAuthMode = 'password' | 'interactive-ad' | 'managed-identity';

/**
 * Where a profile's credentials come from. Only user names and the names of
 * environment variables are stored here, never a secret.
 */
export interface SqlCredentialReference {
  username?: string;
  usernameVariable?: string;
  passwordVariable?: string;
  clientIdVariable?: string;
}

export interface SqlConfigProfile {
  name: string;
  title: string;
  description: string;
  server: string;
  port: number;
  database: string;
  authMode: SqlAuthMode;
  encrypt: boolean;
  trustServerCertificate: boolean;
  timeoutSeconds: number;
  credential: SqlCredentialReference;
}

export type SqlValue = string | number | boolean | null;

export interface SqlQueryResult {
  columns: string[];
  rows: Record<string, SqlValue>[];
}

export interface SqlParameter {
  name: string;
  value: string;
}
