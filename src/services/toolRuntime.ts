import { getSettings, Settings } from '../config/settings.js';
import { loadSqlProfiles, SqlProfileSet } from '../config/sqlProfiles.js';
import { Logger } from './logger.js';
import { SqlConfigStore } from './sql/configStore.js';
import { createMssqlClient, SqlClientFactory } from './sql/mssqlClient.js';
import { createToolRegistry } from './tools/definitions/index.js';
import { ToolDispatcher } from './tools/dispatcher.js';
import { ToolRegistry } from './tools/registry.js';

/**
 * Process-wide state shared by every invocation: the sealed tool registry and
 * the SQL configuration store holding the active selection.
 */
export interface ToolRuntime {
  registry: ToolRegistry;
  configStore: SqlConfigStore;
  sqlClientFactory: SqlClientFactory;
}

export interface ToolRuntimeOptions {
  settings?: Settings;
  profiles?: SqlProfileSet;
  registry?: ToolRegistry;
  sqlClientFactory?: SqlClientFactory;
}

export function createToolRuntime(options: ToolRuntimeOptions = {}): ToolRuntime {
  const settings = options.settings ?? getSettings();
  const profiles = options.profiles ?? loadSqlProfiles(settings.profilesPath);
  const initialProfile = settings.activeProfile ?? profiles.defaultProfile;

  return {
    registry: options.registry ?? createToolRegistry(),
    configStore: new SqlConfigStore(profiles.profiles, initialProfile),
    sqlClientFactory: options.sqlClientFactory ?? createMssqlClient,
  };
}

let runtime: ToolRuntime | undefined;

export function getToolRuntime(): ToolRuntime {
  if (!runtime) {
    runtime = createToolRuntime();
  }
  return runtime;
}

export function createDispatcher(toolRuntime: ToolRuntime, logger: Logger): ToolDispatcher {
  return new ToolDispatcher({ ...toolRuntime, logger });
}
