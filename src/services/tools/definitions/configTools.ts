import { SqlConfigProfile } from '../../../types/index.js';
import { ToolError } from '../../errors.js';
import { definePlainTool, defineSqlTool } from '../registry.js';
import { param } from '../validator.js';

export const listSqlConfigurationsTool = definePlainTool({
  name: 'list_sql_configurations',
  description: 'List the available SQL Server configurations and mark the active one',
  parameters: {},
  handler: (_args, { configStore }) => {
    const activeName = configStore.getActiveName();
    return configStore.listProfiles().map(profile => ({
      name: profile.name,
      title: profile.title,
      server: profile.server,
      database: profile.database,
      authMode: profile.authMode,
      description: profile.description,
      active: profile.name === activeName,
    }));
  },
});

export const setSqlConfigurationTool = definePlainTool({
  name: 'set_sql_configuration',
  description: 'Switch the SQL Server configuration used by subsequent SQL tool calls',
  parameters: {
    config_name: param.string('Name of the configuration to activate'),
  },
  handler: ({ config_name }, { configStore, logger }) => {
    const outcome = configStore.setActive(config_name);
    if (!outcome.ok) {
      throw new ToolError('UnknownProfile', outcome.message, { available: outcome.available });
    }

    logger.info(`SQL configuration switched from '${outcome.previous}' to '${outcome.current}'`);
    return {
      previous: outcome.previous,
      current: outcome.current,
      message: `Active SQL configuration set to '${outcome.current}'`,
      description: outcome.profile.description,
    };
  },
});

function variableStatus(name: string | undefined, env: Record<string, string | undefined>) {
  if (!name) return undefined;
  return { variable: name, set: Boolean(env[name] && env[name]?.trim()) };
}

function recommendationsFor(profile: SqlConfigProfile, env: Record<string, string | undefined>): string[] {
  const recommendations: string[] = [];
  const { credential } = profile;

  if (profile.authMode === 'password') {
    if (credential.passwordVariable && !env[credential.passwordVariable]) {
      recommendations.push(`Set ${credential.passwordVariable} to the password for this server`);
    }
    if (!credential.username && credential.usernameVariable && !env[credential.usernameVariable]) {
      recommendations.push(`Set ${credential.usernameVariable} to the SQL login name`);
    }
  }
  if (profile.authMode === 'interactive-ad') {
    recommendations.push('Interactive Azure AD sign-in opens a browser; use a managed-identity profile when deployed');
    if (credential.usernameVariable && !env[credential.usernameVariable]) {
      recommendations.push(`Set ${credential.usernameVariable} to pre-fill the Azure AD account`);
    }
  }
  if (profile.authMode === 'managed-identity' && credential.clientIdVariable && !env[credential.clientIdVariable]) {
    recommendations.push(`Set ${credential.clientIdVariable} when using a user-assigned managed identity`);
  }
  if (profile.trustServerCertificate) {
    recommendations.push('Server certificate validation is disabled; prefer a profile that validates it outside testing');
  }
  if (recommendations.length === 0) {
    recommendations.push('Configuration looks complete; run test_network_connectivity and test_sql_connection next');
  }
  return recommendations;
}

export const getSqlConfigDebugTool = defineSqlTool({
  name: 'get_sql_config_debug',
  description: 'Show the active SQL configuration, which credential variables are set, and setup recommendations',
  parameters: {},
  handler: (_args, { profile }) => {
    const env = process.env;
    const { credential } = profile;

    return {
      activeConfiguration: profile.name,
      title: profile.title,
      settings: {
        server: profile.server,
        port: profile.port,
        database: profile.database,
        authMode: profile.authMode,
        encrypt: profile.encrypt,
        trustServerCertificate: profile.trustServerCertificate,
        timeoutSeconds: profile.timeoutSeconds,
      },
      connectionSummary:
        `Server=${profile.server},${profile.port};Database=${profile.database};` +
        `Encrypt=${profile.encrypt};TrustServerCertificate=${profile.trustServerCertificate};` +
        `Authentication=${profile.authMode}` +
        (profile.authMode === 'password' ? ';Password=***' : ''),
      credentials: {
        username: credential.username,
        usernameVariable: variableStatus(credential.usernameVariable, env),
        passwordVariable: variableStatus(credential.passwordVariable, env),
        clientIdVariable: variableStatus(credential.clientIdVariable, env),
      },
      recommendations: recommendationsFor(profile, env),
    };
  },
});
