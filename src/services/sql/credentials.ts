import sql from 'mssql';
import { InteractiveBrowserCredential, ManagedIdentityCredential, TokenCredential } from '@azure/identity';
import { Environment } from '../../config/settings.js';
import { SqlConfigProfile } from '../../types/index.js';
import { ConfigurationError } from '../errors.js';

export const SQL_TOKEN_SCOPE = 'https://database.windows.net/.default';

export type CredentialFactory = (profile: SqlConfigProfile, env: Environment) => TokenCredential;

export interface CredentialResolverOptions {
  env?: Environment;
  credentialFactory?: CredentialFactory;
}

function readVariable(env: Environment, variable: string | undefined): string | undefined {
  if (!variable) return undefined;
  const value = env[variable];
  return value && value.trim() ? value : undefined;
}

export function resolveUsername(profile: SqlConfigProfile, env: Environment): string | undefined {
  return profile.credential.username ?? readVariable(env, profile.credential.usernameVariable);
}

export const defaultCredentialFactory: CredentialFactory = (profile, env) => {
  if (profile.authMode === 'managed-identity') {
    return new ManagedIdentityCredential({ clientId: readVariable(env, profile.credential.clientIdVariable) });
  }
  return new InteractiveBrowserCredential({
    redirectUri: 'http://localhost',
    loginHint: resolveUsername(profile, env),
  });
};

/**
 * Turns a profile into an mssql connection config. Runs when a connection is
 * opened; secrets are read from the environment here and not kept.
 */
export async function resolveCredentials(
  profile: SqlConfigProfile,
  options: CredentialResolverOptions = {}
): Promise<sql.config> {
  const env = options.env ?? process.env;
  const timeoutMs = profile.timeoutSeconds * 1000;

  const baseConfig = {
    server: profile.server,
    port: profile.port,
    database: profile.database,
    connectionTimeout: timeoutMs,
    requestTimeout: timeoutMs,
    pool: { max: 1, min: 0 },
    options: {
      encrypt: profile.encrypt,
      trustServerCertificate: profile.trustServerCertificate,
    },
  };

  if (profile.authMode === 'password') {
    const user = resolveUsername(profile, env);
    const password = readVariable(env, profile.credential.passwordVariable);

    if (!user) {
      const source = profile.credential.usernameVariable ?? 'a username';
      throw new ConfigurationError(`Profile '${profile.name}' requires ${source} for password authentication`);
    }
    if (!password) {
      const source = profile.credential.passwordVariable ?? 'a password variable';
      throw new ConfigurationError(`Profile '${profile.name}' requires ${source} for password authentication`);
    }

    return { ...baseConfig, user, password };
  }

  const factory = options.credentialFactory ?? defaultCredentialFactory;
  const credential = factory(profile, env);
  const accessToken = await credential.getToken(SQL_TOKEN_SCOPE);

  if (!accessToken?.token) {
    throw new ConfigurationError(`Failed to acquire Azure AD token for profile '${profile.name}'`);
  }

  return {
    ...baseConfig,
    authentication: {
      type: 'azure-active-directory-access-token',
      options: {
        token: accessToken.token,
      },
    },
  };
}
