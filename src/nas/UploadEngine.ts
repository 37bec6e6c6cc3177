import fs from 'fs';
import { pipeline } from 'stream/promises';
import { ConnectionError, PerItemError, errorMessage, toError } from '../errors/ArchiveErrors.js';
import type {
  FileOutcome,
  NasConfig,
  Outcome,
  ShareClient,
  UploadOptions,
  UploadReport,
  UploadTask,
} from '../types/index.js';
import { fail, succeed } from '../types/index.js';
import { listFilesRecursive } from '../utils/files.js';
import { componentLogger } from '../utils/logger.js';
import { ensureRemoteDirectory } from './RemoteDirectory.js';
import { buildUncPath, parentDirectory, toRemotePath } from './RemotePath.js';

const log = componentLogger('UploadEngine');

/**
 * Mirrors a local directory tree onto the SMB share, file by file
 */
export class UploadEngine {
  constructor(
    private readonly share: ShareClient,
    private readonly nas: NasConfig
  ) {}

  async uploadDirectory(
    localRoot: string,
    options: UploadOptions
  ): Promise<Outcome<UploadReport, ConnectionError>> {
    const destination = buildUncPath(this.nas.host, this.nas.share, options.remoteBasePath ?? this.nas.basePath);

    // The task list is fixed before any network call
    const files = await listFilesRecursive(localRoot);
    const tasks: UploadTask[] = files.map((file) => ({
      localPath: file.path,
      remotePath: toRemotePath(localRoot, file.path, destination),
      size: file.size,
    }));

    const report: UploadReport = {
      localRoot,
      destination,
      dryRun: options.dryRun,
      overwrite: options.overwrite,
      totalFiles: tasks.length,
      totalBytes: tasks.reduce((sum, task) => sum + task.size, 0),
      uploaded: 0,
      uploadedBytes: 0,
      skipped: 0,
      failed: 0,
      outcomes: [],
    };

    if (options.dryRun) {
      log.info('Dry run: files to upload', {
        files: report.totalFiles,
        bytes: report.totalBytes,
        destination,
        overwrite: options.overwrite,
      });
      return succeed(report);
    }

    try {
      await this.share.registerSession(this.nas.host, this.nas.username, this.nas.password);
    } catch (error) {
      log.error('NAS connection failed', { host: this.nas.host, error: errorMessage(error) });
      return fail(
        new ConnectionError('nas', `NAS connection failed: ${errorMessage(error)}`, toError(error))
      );
    }

    try {
      log.debug('Creating base directory', { path: destination });
      await ensureRemoteDirectory(this.share, destination);

      const createdDirectories = new Set<string>();
      for (const task of tasks) {
        const outcome = await this.uploadFile(task, options.overwrite, createdDirectories);
        report.outcomes.push(outcome);

        switch (outcome.status) {
          case 'uploaded':
            report.uploaded++;
            report.uploadedBytes += task.size;
            break;
          case 'skipped':
            report.skipped++;
            break;
          case 'failed':
            report.failed++;
            break;
        }
      }
    } finally {
      await this.share.close();
    }

    log.info('Upload complete', {
      uploaded: report.uploaded,
      skipped: report.skipped,
      failed: report.failed,
      bytes: report.uploadedBytes,
    });

    return succeed(report);
  }

  private async uploadFile(
    task: UploadTask,
    overwrite: boolean,
    createdDirectories: Set<string>
  ): Promise<FileOutcome> {
    try {
      const remoteDirectory = parentDirectory(task.remotePath);
      if (!createdDirectories.has(remoteDirectory)) {
        await ensureRemoteDirectory(this.share, remoteDirectory);
        createdDirectories.add(remoteDirectory);
      }

      if (!overwrite && (await this.existsOnShare(task.remotePath))) {
        return { task, status: 'skipped' };
      }

      const target = await this.share.openForWrite(task.remotePath);
      await pipeline(fs.createReadStream(task.localPath), target);
      return { task, status: 'uploaded' };
    } catch (error) {
      log.error('Failed to upload file', { file: task.localPath, error: errorMessage(error) });
      return {
        task,
        status: 'failed',
        error: new PerItemError(task.localPath, `Failed to upload ${task.localPath}: ${errorMessage(error)}`, toError(error)),
      };
    }
  }

  /**
   * Any stat failure counts as absent
   */
  private async existsOnShare(remotePath: string): Promise<boolean> {
    try {
      await this.share.stat(remotePath);
      return true;
    } catch (error) {
      log.debug('Remote stat failed, treating as absent', { path: remotePath, error: errorMessage(error) });
      return false;
    }
  }
}
