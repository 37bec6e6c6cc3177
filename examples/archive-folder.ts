import dotenv from 'dotenv';
import { PresetConfirmer } from '../src/delete/Confirmer.js';
import { resolveOutputDir } from '../src/config/AppConfig.js';
import { createWorkflow } from '../src/server.js';
import { logger } from '../src/utils/logger.js';

/**
 * Example: archive one folder without going through an MCP client
 *
 * Reads the same MAIL_* and NAS_* variables as the server, previews the
 * download and upload with a dry run, and never deletes anything because
 * both confirmations are answered "no". The folder name is the first
 * command-line argument (INBOX by default).
 */
async function archiveFolderExample(folder: string) {
  dotenv.config();

  const workflow = createWorkflow();

  const folders = await workflow.listFolders();
  if (!folders.ok) {
    logger.error('Could not list folders', { error: folders.error.message });
    return;
  }
  for (const entry of folders.value) {
    console.log(`${entry.name.padEnd(40)} ${entry.messages}`);
  }

  const result = await workflow.archiveFolder(
    {
      folder,
      outputDir: resolveOutputDir(),
      dryRun: true,
      uploadToNas: process.env.NAS_HOST !== undefined,
      overwrite: false,
      deleteLocal: false,
      clean: true,
      since: '1Y',
    },
    new PresetConfirmer([false, false])
  );

  if (!result.ok) {
    logger.error('Archive failed', { code: result.error.code, error: result.error.message });
    return;
  }

  const { download, upload, retention } = result.value;
  console.log(`Would download: ${download?.downloaded ?? 0} messages`);
  if (upload) {
    console.log(`Would upload: ${upload.totalFiles} files (${upload.totalBytes} bytes) to ${upload.destination}`);
  }
  if (retention) {
    console.log(`Would delete: ${retention.matched} of ${retention.totalInFolder} messages (${retention.filter})`);
  }
}

archiveFolderExample(process.argv[2] ?? 'INBOX').catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
