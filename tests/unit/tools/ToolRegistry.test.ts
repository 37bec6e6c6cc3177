import { describe, expect, beforeEach, test } from '@jest/globals';
import { ToolBuilder } from '../../../src/tools/base/ToolBuilder.js';
import { ToolRegistry } from '../../../src/tools/ToolRegistry.js';
import { allToolConfigs, getToolDefinitions, registerBuiltInTools } from '../../../src/tools/definitions.js';

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  test('registers every built-in tool under its category', () => {
    registerBuiltInTools(registry);

    expect(registry.getStats()).toEqual({
      totalTools: 6,
      categories: { mail: 3, nas: 2, maintenance: 1 },
      tools: ['list_folders', 'download_folder', 'archive_folder', 'upload_directory', 'test_connection', 'clean_folder'],
    });
    expect(registry.getToolsByCategory('maintenance').map((tool) => tool.name)).toEqual(['clean_folder']);
  });

  test('re-registering a tool replaces it in its category', () => {
    const first = ToolBuilder.fromConfig({ name: 'probe', description: 'first', category: 'nas' });
    const second = ToolBuilder.fromConfig({ name: 'probe', description: 'second', category: 'nas' });

    registry.registerTool(first, 'nas');
    registry.registerTool(second, 'nas');

    expect(registry.getTool('probe')?.description).toBe('second');
    expect(registry.getToolsByCategory('nas')).toEqual([second]);
    expect(registry.hasTool('probe')).toBe(true);
    expect(registry.hasTool('missing')).toBe(false);
  });

  test('builds JSON schemas with defaults and required fields', () => {
    const cleanFolder = getToolDefinitions().find((tool) => tool.name === 'clean_folder');

    expect(cleanFolder?.inputSchema.required).toEqual(['folder']);
    expect(cleanFolder?.inputSchema.properties).toMatchObject({
      folder: { type: 'string' },
      dry_run: { type: 'boolean', default: false },
      confirm: { type: 'boolean', default: false },
      confirm_irreversible: { type: 'boolean', default: false },
    });
  });

  test('omits unset schema keys', () => {
    const tool = ToolBuilder.fromConfig({
      name: 'bare',
      description: 'no parameters',
      category: 'test',
      parameters: { flag: { type: 'boolean' } },
    });

    expect(tool.inputSchema).toEqual({ type: 'object', properties: { flag: { type: 'boolean' } } });
  });

  test('every tool config has a unique name', () => {
    const names = allToolConfigs.map((config) => config.name);
    expect(new Set(names).size).toBe(names.length);
  });
});
