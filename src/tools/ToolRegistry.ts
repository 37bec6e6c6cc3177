import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { ToolBuilder } from './base/ToolBuilder.js';
import type { ToolConfig } from './base/ToolBuilder.js';

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private categories: Map<string, Tool[]> = new Map();

  /**
   * Register a single tool
   */
  registerTool(tool: Tool, category?: string): void {
    if (this.tools.has(tool.name)) {
      logger.warn(`Tool ${tool.name} is already registered. Overwriting.`);
      this.removeFromCategories(tool.name);
    }

    this.tools.set(tool.name, tool);

    if (category) {
      const categoryTools = this.categories.get(category) || [];
      categoryTools.push(tool);
      this.categories.set(category, categoryTools);
    }

    logger.debug(`Registered tool: ${tool.name}`, { category });
  }

  /**
   * Build and register tools from their configs, each under its own category
   */
  registerConfigs(configs: ToolConfig[]): void {
    for (const config of configs) {
      this.registerTool(ToolBuilder.fromConfig(config), config.category);
    }
  }

  getAllTools(): Tool[] {
    return Array.from(this.tools.values());
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getToolsByCategory(category: string): Tool[] {
    return this.categories.get(category) || [];
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  private removeFromCategories(name: string): void {
    this.categories.forEach((tools, category) => {
      const filtered = tools.filter((tool) => tool.name !== name);
      if (filtered.length !== tools.length) {
        this.categories.set(category, filtered);
      }
    });
  }

  /**
   * Get registry statistics
   */
  getStats(): {
    totalTools: number;
    categories: Record<string, number>;
    tools: string[];
  } {
    const stats: Record<string, number> = {};
    this.categories.forEach((tools, category) => {
      stats[category] = tools.length;
    });

    return {
      totalTools: this.tools.size,
      categories: stats,
      tools: Array.from(this.tools.keys()),
    };
  }
}
