import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { ToolRegistry } from './ToolRegistry.js';
import { mailToolConfigs } from './definitions/mail.tools.js';
import { maintenanceToolConfigs } from './definitions/maintenance.tools.js';
import { nasToolConfigs } from './definitions/nas.tools.js';

export const allToolConfigs = [...mailToolConfigs, ...nasToolConfigs, ...maintenanceToolConfigs];

export function registerBuiltInTools(registry: ToolRegistry): ToolRegistry {
  registry.registerConfigs(allToolConfigs);
  logger.info('Built-in tools registered', registry.getStats());
  return registry;
}

// Get all tool definitions for MCP
export function getToolDefinitions(): Tool[] {
  return registerBuiltInTools(new ToolRegistry()).getAllTools();
}
