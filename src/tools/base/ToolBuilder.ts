import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export interface ToolParameter {
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: string[];
  default?: string | number | boolean;
  items?: ToolParameter;
  minimum?: number;
  maximum?: number;
}

export interface ToolConfig {
  name: string;
  description: string;
  category: string;
  parameters?: Record<string, ToolParameter>;
  required?: string[];
}

type InputSchema = Tool['inputSchema'];

export class ToolBuilder {
  private tool: Tool;

  constructor(config: ToolConfig) {
    this.tool = {
      name: config.name,
      description: config.description,
      inputSchema: this.buildInputSchema(config),
    };
  }

  private buildInputSchema(config: ToolConfig): InputSchema {
    const properties: Record<string, ToolParameter> = {};

    for (const [key, param] of Object.entries(config.parameters ?? {})) {
      properties[key] = this.buildParameterSchema(param);
    }

    const schema: InputSchema = { type: 'object', properties };
    if (config.required && config.required.length > 0) {
      schema.required = config.required;
    }
    return schema;
  }

  /**
   * Copies only the keys that are set, so the published schema has no undefined entries
   */
  private buildParameterSchema(param: ToolParameter): ToolParameter {
    const schema: ToolParameter = { type: param.type };

    if (param.description) schema.description = param.description;
    if (param.enum) schema.enum = param.enum;
    if (param.default !== undefined) schema.default = param.default;
    if (param.items) schema.items = this.buildParameterSchema(param.items);
    if (param.minimum !== undefined) schema.minimum = param.minimum;
    if (param.maximum !== undefined) schema.maximum = param.maximum;

    return schema;
  }

  build(): Tool {
    return this.tool;
  }

  static fromConfig(config: ToolConfig): Tool {
    return new ToolBuilder(config).build();
  }
}

export const ParameterTypes = {
  string: (description?: string, enumValues?: string[], defaultValue?: string): ToolParameter => ({
    type: 'string',
    description,
    enum: enumValues,
    default: defaultValue,
  }),

  boolean: (description?: string, defaultValue?: boolean): ToolParameter => ({
    type: 'boolean',
    description,
    default: defaultValue,
  }),

  folder: (): ToolParameter => ({
    type: 'string',
    description: 'Mailbox folder name exactly as listed by list_folders (e.g. INBOX)',
  }),

  dryRun: (): ToolParameter => ({
    type: 'boolean',
    description: 'Report what would happen without changing anything',
    default: false,
  }),

  provider: (): ToolParameter => ({
    type: 'string',
    description: 'Mail provider from providers.json (gmx, gmail, outlook, ..., custom). Defaults to MAIL_PROVIDER',
  }),

  retention: (): ToolParameter => ({
    type: 'string',
    description: 'Only messages older than this: a number followed by D, W, M or Y (e.g. 30D, 2W, 6M, 1Y)',
  }),

  confirmations: (): Record<string, ToolParameter> => ({
    confirm: {
      type: 'boolean',
      description: 'First confirmation: delete the matched messages',
      default: false,
    },
    confirm_irreversible: {
      type: 'boolean',
      description: 'Second confirmation: acknowledge that expunged messages cannot be recovered',
      default: false,
    },
  }),
};
