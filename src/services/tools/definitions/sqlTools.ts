import { executeWithErrorHandling, ToolError } from '../../errors.js';
import { probeTcp } from '../../sql/connectivity.js';
import { defineSqlTool } from '../registry.js';
import { param } from '../validator.js';

const NETWORK_PROBE_TIMEOUT_MS = 10_000;

export const testNetworkConnectivityTool = defineSqlTool({
  name: 'test_network_connectivity',
  description: 'Check that the SQL Server host of the active configuration accepts TCP connections',
  parameters: {},
  handler: async (_args, { profile, logger }) => {
    const probe = await probeTcp(profile.server, profile.port, NETWORK_PROBE_TIMEOUT_MS);
    logger.info(`TCP probe ${profile.server}:${profile.port} reachable=${probe.reachable}`);
    return probe;
  },
});

export const testSqlConnectionTool = defineSqlTool({
  name: 'test_sql_connection',
  description: 'Connect with the active configuration and report the server version and database',
  parameters: {},
  handler: (_args, { profile, sql }) =>
    executeWithErrorHandling(async () => {
      const { rows } = await sql.query('SELECT @@VERSION AS server_version, DB_NAME() AS database_name');
      const [row] = rows;
      return {
        connected: true,
        serverVersion: row?.server_version ?? null,
        databaseName: row?.database_name ?? null,
        server: profile.server,
        database: profile.database,
        authMode: profile.authMode,
      };
    }, `SQL connection test failed for '${profile.name}'`),
});

export const querySqlServerTool = defineSqlTool({
  name: 'query_sql_server',
  description: 'Run a read-only SELECT query against the active SQL Server configuration',
  parameters: {
    query: param.string('SELECT statement to execute'),
  },
  queryText: ({ query }) => query,
  handler: ({ query }, { profile, sql }) =>
    executeWithErrorHandling(async () => {
      const { columns, rows } = await sql.query(query);
      return { rowCount: rows.length, columns, rows, profile: profile.name };
    }, 'Query failed'),
});

export const getTableListTool = defineSqlTool({
  name: 'get_table_list',
  description: 'List the base tables in the database of the active configuration',
  parameters: {},
  handler: (_args, { sql }) =>
    executeWithErrorHandling(async () => {
      const { rows } = await sql.query(
        `SELECT TABLE_SCHEMA, TABLE_NAME, TABLE_TYPE
         FROM INFORMATION_SCHEMA.TABLES
         WHERE TABLE_TYPE = 'BASE TABLE'
         ORDER BY TABLE_SCHEMA, TABLE_NAME`
      );
      const tables = rows.map(row => ({
        schema: String(row.TABLE_SCHEMA),
        tableName: String(row.TABLE_NAME),
        tableType: String(row.TABLE_TYPE),
        fullName: `${row.TABLE_SCHEMA}.${row.TABLE_NAME}`,
      }));
      return { tableCount: tables.length, tables };
    }, 'Failed to list tables'),
});

export const getTableSchemaTool = defineSqlTool({
  name: 'get_table_schema',
  description: 'Describe the columns of a table in the active configuration',
  parameters: {
    table_name: param.string('Table name'),
    schema_name: param.string('Schema name').default('dbo'),
  },
  handler: async ({ table_name, schema_name }, { sql }) => {
    const { rows } = await executeWithErrorHandling(
      () =>
        sql.query(
          `SELECT COLUMN_NAME, DATA_TYPE, IS_NULLABLE, COLUMN_DEFAULT, CHARACTER_MAXIMUM_LENGTH, ORDINAL_POSITION
           FROM INFORMATION_SCHEMA.COLUMNS
           WHERE TABLE_NAME = @table_name AND TABLE_SCHEMA = @schema_name
           ORDER BY ORDINAL_POSITION`,
          [
            { name: 'table_name', value: table_name },
            { name: 'schema_name', value: schema_name },
          ]
        ),
      `Failed to read schema of '${schema_name}.${table_name}'`
    );

    if (rows.length === 0) {
      throw new ToolError('HandlerError', `Table '${schema_name}.${table_name}' not found`);
    }

    return {
      table: `${schema_name}.${table_name}`,
      columnCount: rows.length,
      columns: rows.map(row => ({
        name: String(row.COLUMN_NAME),
        dataType: String(row.DATA_TYPE),
        nullable: row.IS_NULLABLE === 'YES',
        defaultValue: row.COLUMN_DEFAULT,
        maxLength: row.CHARACTER_MAXIMUM_LENGTH,
        position: row.ORDINAL_POSITION,
      })),
    };
  },
});
