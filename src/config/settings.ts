export const SERVER_NAME = 'bmi-sql-tools';
export const SERVER_VERSION = '1.0.0';

export type Environment = Record<string, string | undefined>;

export interface Settings {
  /** Profile selected at startup (`SQL_CONFIG`). */
  activeProfile?: string;
  /** Alternative location of the SQL profile file (`SQL_PROFILES_PATH`). */
  profilesPath?: string;
  nodeEnv: string;
}

export interface HostInfo {
  functionAppName: string;
  region: string;
  resourceGroup: string;
  nodeVersion: string;
  environment: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export function getSettings(env: Environment = process.env): Settings {
  return {
    activeProfile: nonEmpty(env.SQL_CONFIG),
    profilesPath: nonEmpty(env.SQL_PROFILES_PATH),
    nodeEnv: nonEmpty(env.NODE_ENV) ?? 'development',
  };
}

export function getHostInfo(env: Environment = process.env): HostInfo {
  return {
    functionAppName: nonEmpty(env.WEBSITE_SITE_NAME) ?? 'local',
    region: nonEmpty(env.WEBSITE_REGION_NAME) ?? 'unknown',
    resourceGroup: nonEmpty(env.WEBSITE_RESOURCE_GROUP) ?? 'unknown',
    nodeVersion: process.version,
    environment: getSettings(env).nodeEnv,
  };
}
