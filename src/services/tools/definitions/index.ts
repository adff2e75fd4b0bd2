import { ToolRegistry } from '../registry.js';
import { calculateBmiTool, getBmiResourcesTool } from './bmiTools.js';
import { getSqlConfigDebugTool, listSqlConfigurationsTool, setSqlConfigurationTool } from './configTools.js';
import {
  getTableListTool,
  getTableSchemaTool,
  querySqlServerTool,
  testNetworkConnectivityTool,
  testSqlConnectionTool,
} from './sqlTools.js';
import { getServerInfoTool, greetTool } from './utilityTools.js';

export const builtinTools = [
  greetTool,
  calculateBmiTool,
  getBmiResourcesTool,
  listSqlConfigurationsTool,
  setSqlConfigurationTool,
  getSqlConfigDebugTool,
  testNetworkConnectivityTool,
  testSqlConnectionTool,
  querySqlServerTool,
  getTableListTool,
  getTableSchemaTool,
  getServerInfoTool,
] as const;

export type ToolName = (typeof builtinTools)[number]['name'];

export function createToolRegistry(): ToolRegistry<ToolName> {
  return new ToolRegistry<ToolName>().registerAll(builtinTools).seal();
}
