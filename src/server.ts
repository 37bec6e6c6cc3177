import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { ArchiveWorkflow } from "./archive/ArchiveWorkflow.js";
import { loadMailConfig, loadNasConfig, loadProviderConfig } from "./config/AppConfig.js";
import { errorMessage } from "./errors/ArchiveErrors.js";
import { MailSessionFactory } from "./mail/MailSessionFactory.js";
import { SmbShareClient } from "./nas/SmbShareClient.js";
import { getToolDefinitions } from "./tools/definitions.js";
import { handleToolCall } from "./tools/handler.js";
import type { ToolContext } from "./tools/handler.js";
import { logger } from "./utils/logger.js";

type Env = Record<string, string | undefined>;

/**
 * Wires the engines to their IMAP and SMB adapters. Configuration is read
 * from `env` on every call; nothing is cached between tool calls.
 */
export function createWorkflow(provider?: string, env: Env = process.env): ArchiveWorkflow {
  return new ArchiveWorkflow({
    sessions: () => {
      const account = loadMailConfig(provider, env);
      return new MailSessionFactory(account, loadProviderConfig(account.provider, undefined, env));
    },
    nas: loadNasConfig(env),
    createShareClient: (nas) => new SmbShareClient(nas),
  });
}

export class MailArchiveMcpServer {
  private server: Server;
  private tools: Tool[];
  private context: ToolContext;

  constructor(context: ToolContext = { createWorkflow: (provider) => createWorkflow(provider) }) {
    this.server = new Server(
      {
        name: "mail-archive-mcp-server",
        version: "0.1.0",
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.tools = getToolDefinitions();
    this.context = context;

    this.setupHandlers();
    this.setupErrorHandling();
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.debug("Handling list tools request");
      return {
        tools: this.tools,
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      logger.debug("Handling tool call", { tool: request.params.name });
      try {
        return await handleToolCall(
          request.params.name,
          request.params.arguments || {},
          this.context
        );
      } catch (error) {
        if (error instanceof McpError) {
          throw error;
        }
        logger.error("Tool call error:", { error: errorMessage(error) });
        throw new McpError(
          ErrorCode.InternalError,
          `Tool execution failed: ${errorMessage(error)}`
        );
      }
    });
  }

  private setupErrorHandling() {
    this.server.onerror = (error) => {
      logger.error("MCP Server error:", { error: error.message });
    };
  }

  async connect(transport: Transport) {
    await this.server.connect(transport);
    logger.debug("Mail archive MCP server connected to transport");
  }

  async close() {
    try {
      await this.server.close();
      logger.debug("Mail archive MCP server closed");
    } catch (error) {
      logger.error("Error closing server:", { error: errorMessage(error) });
    }
  }
}
