#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import path from "path";
import { formatErrorForLogs } from "./errors/ArchiveErrors.js";
import { MailArchiveMcpServer } from "./server.js";
import { logger } from "./utils/logger.js";

/**
 * Main entry point for the mail archive MCP server.
 * Loads environment variables, starts the server and connects it to stdio.
 */
async function main() {
  dotenv.config({
    path: path.join(__dirname, "../.env"),
  });
  logger.info("Environment loaded", {
    NODE_ENV: process.env.NODE_ENV,
    MAIL_PROVIDER: process.env.MAIL_PROVIDER,
    NAS_HOST: process.env.NAS_HOST,
    OUTPUT_DIR: process.env.OUTPUT_DIR,
  });

  const server = new MailArchiveMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", { error: String(error) });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection", { reason: String(reason) });
  });

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception:", formatErrorForLogs(error));
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
