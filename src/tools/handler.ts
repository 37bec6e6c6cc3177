import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ArchiveWorkflow } from '../archive/ArchiveWorkflow.js';
import { resolveOutputDir } from '../config/AppConfig.js';
import { PresetConfirmer } from '../delete/Confirmer.js';
import { ArchiveError, ConfigurationError, errorMessage, formatErrorForLogs } from '../errors/ArchiveErrors.js';
import type { Outcome } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface ToolContext {
  /** Builds a workflow for the given provider, or the configured default */
  createWorkflow: (provider?: string) => ArchiveWorkflow;
}

const provider = z.string().min(1).optional();
const dryRun = z.boolean().default(false);

const listFoldersArgs = z.object({ provider });

const downloadFolderArgs = z.object({
  folder: z.string().min(1),
  output_dir: z.string().min(1).optional(),
  dry_run: dryRun,
  provider,
});

const archiveFolderArgs = z.object({
  folder: z.string().min(1),
  output_dir: z.string().min(1).optional(),
  upload_to_nas: z.boolean().default(false),
  overwrite: z.boolean().default(false),
  delete_local: z.boolean().default(false),
  clean: z.boolean().default(false),
  since: z.string().min(1).optional(),
  dry_run: dryRun,
  provider,
  confirm: z.boolean().default(false),
  confirm_irreversible: z.boolean().default(false),
});

const uploadDirectoryArgs = z.object({
  local_path: z.string().min(1),
  remote_path: z.string().min(1).optional(),
  overwrite: z.boolean().default(false),
  dry_run: dryRun,
});

const cleanFolderArgs = z.object({
  folder: z.string().min(1),
  since: z.string().min(1).optional(),
  dry_run: dryRun,
  provider,
  confirm: z.boolean().default(false),
  confirm_irreversible: z.boolean().default(false),
});

const testConnectionArgs = z.object({
  mail: z.boolean().default(true),
  nas: z.boolean().default(false),
  dry_run: dryRun,
  provider,
});

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown, toolName: string): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${toolName}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Errors become { name, code, message }; everything else is left to JSON
 */
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof ArchiveError) {
    return { name: value.name, code: value.code, message: value.message };
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function jsonResponse(payload: unknown, isError = false): CallToolResult {
  const response: CallToolResult = {
    content: [{ type: 'text', text: JSON.stringify(payload, replacer, 2) }],
  };
  if (isError) {
    response.isError = true;
  }
  return response;
}

function outcomeResponse<T extends object>(outcome: Outcome<T>): CallToolResult {
  if (outcome.ok) {
    return jsonResponse({ success: true, ...outcome.value });
  }
  return jsonResponse({ success: false, error: outcome.error }, true);
}

export async function handleToolCall(
  toolName: string,
  args: unknown,
  context: ToolContext
): Promise<CallToolResult> {
  logger.info(`Handling tool call: ${toolName}`, { args });

  try {
    switch (toolName) {
      case 'list_folders':
        return await handleListFolders(parseArgs(listFoldersArgs, args, toolName), context);

      case 'download_folder':
        return await handleDownloadFolder(parseArgs(downloadFolderArgs, args, toolName), context);

      case 'archive_folder':
        return await handleArchiveFolder(parseArgs(archiveFolderArgs, args, toolName), context);

      case 'upload_directory':
        return await handleUploadDirectory(parseArgs(uploadDirectoryArgs, args, toolName), context);

      case 'clean_folder':
        return await handleCleanFolder(parseArgs(cleanFolderArgs, args, toolName), context);

      case 'test_connection':
        return await handleTestConnection(parseArgs(testConnectionArgs, args, toolName), context);

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
    }
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof ConfigurationError) {
      logger.warn(`Configuration error in tool ${toolName}`, { code: error.code, error: error.message });
      throw new McpError(ErrorCode.InvalidParams, error.message);
    }
    logger.error(`Error in tool ${toolName}:`, formatErrorForLogs(error));
    throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage(error)}`);
  }
}

async function handleListFolders(args: z.infer<typeof listFoldersArgs>, context: ToolContext) {
  const outcome = await context.createWorkflow(args.provider).listFolders();
  if (!outcome.ok) {
    return outcomeResponse(outcome);
  }
  return jsonResponse({ success: true, folders: outcome.value });
}

async function handleDownloadFolder(args: z.infer<typeof downloadFolderArgs>, context: ToolContext) {
  const outcome = await context
    .createWorkflow(args.provider)
    .downloadFolder(args.folder, resolveOutputDir(args.output_dir), args.dry_run);
  return outcomeResponse(outcome);
}

async function handleArchiveFolder(args: z.infer<typeof archiveFolderArgs>, context: ToolContext) {
  const outcome = await context.createWorkflow(args.provider).archiveFolder(
    {
      folder: args.folder,
      outputDir: resolveOutputDir(args.output_dir),
      dryRun: args.dry_run,
      uploadToNas: args.upload_to_nas,
      overwrite: args.overwrite,
      deleteLocal: args.delete_local,
      clean: args.clean,
      since: args.since,
    },
    new PresetConfirmer([args.confirm, args.confirm_irreversible])
  );
  return outcomeResponse(outcome);
}

async function handleUploadDirectory(args: z.infer<typeof uploadDirectoryArgs>, context: ToolContext) {
  const outcome = await context.createWorkflow().uploadDirectory(args.local_path, {
    dryRun: args.dry_run,
    overwrite: args.overwrite,
    remoteBasePath: args.remote_path,
  });
  return outcomeResponse(outcome);
}

async function handleCleanFolder(args: z.infer<typeof cleanFolderArgs>, context: ToolContext) {
  const outcome = await context.createWorkflow(args.provider).cleanFolder(
    { folder: args.folder, dryRun: args.dry_run, since: args.since },
    new PresetConfirmer([args.confirm, args.confirm_irreversible])
  );
  return outcomeResponse(outcome);
}

async function handleTestConnection(args: z.infer<typeof testConnectionArgs>, context: ToolContext) {
  const result = await context
    .createWorkflow(args.provider)
    .testConnection({ mail: args.mail, nas: args.nas, dryRun: args.dry_run });
  return jsonResponse({ success: result.passed, ...result }, !result.passed);
}
