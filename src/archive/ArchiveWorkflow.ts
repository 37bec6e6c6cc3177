import { accountName, getNasFolderPath } from '../config/AppConfig.js';
import { RetentionEngine } from '../delete/RetentionEngine.js';
import { ConnectionProbe } from '../diagnostics/ConnectionProbe.js';
import {
  ConfigurationError,
  ConnectionError,
  FolderAccessError,
  errorMessage,
} from '../errors/ArchiveErrors.js';
import type { MailSessionFactory } from '../mail/MailSessionFactory.js';
import { UploadEngine } from '../nas/UploadEngine.js';
import { cutoffFrom, parseTimeRange } from '../retention/RetentionFilter.js';
import type {
  ArchiveFailure,
  ArchiveFolderRequest,
  ArchiveFolderResult,
  Confirmer,
  ConnectionTestResult,
  DownloadReport,
  FolderSummary,
  MailboxClient,
  NasConfig,
  Outcome,
  ProbeReport,
  RetentionReport,
  ShareClient,
  UploadOptions,
  UploadReport,
} from '../types/index.js';
import { fail, succeed } from '../types/index.js';
import { deleteDirectory } from '../utils/files.js';
import { componentLogger } from '../utils/logger.js';
import { DownloadEngine, folderDirectoryName } from './DownloadEngine.js';

const log = componentLogger('ArchiveWorkflow');

export interface ArchiveWorkflowDependencies {
  /** Throws ConfigurationError when mail credentials are missing */
  sessions: () => MailSessionFactory;
  nas: NasConfig | null;
  createShareClient: (nas: NasConfig) => ShareClient;
  probe?: ConnectionProbe;
  now?: () => Date;
}

export interface CleanFolderRequest {
  folder: string;
  dryRun: boolean;
  since?: string;
}

/**
 * Collapse the session outcome and the engine outcome into one
 */
function flatten<T, E extends ArchiveFailure>(
  outcome: Outcome<Outcome<T, E>, ConnectionError>
): Outcome<T, E | ConnectionError> {
  return outcome.ok ? outcome.value : outcome;
}

/**
 * Orchestrates the engines for one tool call: a single mailbox session,
 * a fresh share session per upload or probe, and no state between calls.
 */
export class ArchiveWorkflow {
  private readonly probe: ConnectionProbe;
  private readonly now: () => Date;

  constructor(private readonly deps: ArchiveWorkflowDependencies) {
    this.probe = deps.probe ?? new ConnectionProbe();
    this.now = deps.now ?? (() => new Date());
  }

  private requireNas(): NasConfig {
    if (!this.deps.nas) {
      throw new ConfigurationError(
        'NAS configuration not found. Set NAS_HOST, NAS_SHARE, NAS_USERNAME and NAS_PASSWORD',
        'MISSING_NAS_CONFIG'
      );
    }
    return this.deps.nas;
  }

  private resolveCutoff(since?: string): Date | undefined {
    return since ? cutoffFrom(parseTimeRange(since), this.now()) : undefined;
  }

  /**
   * Every folder with its message count, or '?' where selecting it failed
   */
  async listFolders(): Promise<Outcome<FolderSummary[], ConnectionError>> {
    return this.deps.sessions().run(async (mailbox) => {
      const folders = await mailbox.listFolders();
      const summaries: FolderSummary[] = [];
      for (const folder of folders) {
        try {
          summaries.push({ name: folder.name, messages: await mailbox.selectFolder(folder.name, { readOnly: true }) });
        } catch (error) {
          log.debug('Could not count folder', { folder: folder.name, error: errorMessage(error) });
          summaries.push({ name: folder.name, messages: '?' });
        }
      }
      return summaries;
    });
  }

  async downloadFolder(
    folder: string,
    outputDir: string,
    dryRun: boolean
  ): Promise<Outcome<DownloadReport, ArchiveFailure>> {
    return flatten(
      await this.deps.sessions().run((mailbox) =>
        new DownloadEngine(mailbox).downloadFolder(folder, outputDir, { dryRun })
      )
    );
  }

  async uploadDirectory(localRoot: string, options: UploadOptions): Promise<Outcome<UploadReport, ConnectionError>> {
    const nas = this.requireNas();
    return new UploadEngine(this.deps.createShareClient(nas), nas).uploadDirectory(localRoot, options);
  }

  async cleanFolder(
    request: CleanFolderRequest,
    confirmer: Confirmer
  ): Promise<Outcome<RetentionReport, ArchiveFailure>> {
    const cutoff = this.resolveCutoff(request.since);
    return flatten(
      await this.deps.sessions().run((mailbox) =>
        new RetentionEngine(mailbox).deleteMessages(request.folder, { dryRun: request.dryRun, cutoff }, confirmer)
      )
    );
  }

  async testConnection(options: { mail: boolean; nas: boolean; dryRun: boolean }): Promise<ConnectionTestResult> {
    const result: ConnectionTestResult = { passed: true };

    if (options.mail) {
      const sessions = this.deps.sessions();
      const outcome = await sessions.run((mailbox) => this.probe.probeMailbox(mailbox, sessions.accountConfig));
      result.mail = outcome.ok ? outcome.value : this.failedLogin(outcome.error);
      result.passed = result.passed && result.mail.passed;
    }

    if (options.nas) {
      const nas = this.requireNas();
      result.nas = await this.probe.probeShare(this.deps.createShareClient(nas), nas, { dryRun: options.dryRun });
      result.passed = result.passed && result.nas.passed;
    }

    return result;
  }

  private failedLogin(error: ConnectionError): ProbeReport {
    return {
      target: 'mail',
      passed: false,
      steps: [{ name: 'login', ok: false, detail: error.message }],
      error: error.message,
    };
  }

  /**
   * Download a folder, then optionally mirror it to the share, remove the
   * local copy and prune the mailbox. Configuration problems throw before
   * any connection is made.
   */
  async archiveFolder(
    request: ArchiveFolderRequest,
    confirmer: Confirmer
  ): Promise<Outcome<ArchiveFolderResult, ArchiveFailure>> {
    const cutoff = this.resolveCutoff(request.since);
    const nas = request.uploadToNas ? this.requireNas() : null;
    const sessions = this.deps.sessions();
    const account = accountName(sessions.accountConfig);

    return flatten(
      await sessions.run((mailbox) => this.archiveWithSession(mailbox, request, confirmer, { nas, cutoff, account }))
    );
  }

  private async archiveWithSession(
    mailbox: MailboxClient,
    request: ArchiveFolderRequest,
    confirmer: Confirmer,
    context: { nas: NasConfig | null; cutoff?: Date; account: string }
  ): Promise<Outcome<ArchiveFolderResult, ArchiveFailure>> {
    const { folder } = request;
    const result: ArchiveFolderResult = { folder, mode: 'archive', localDeleted: false };

    const folderNames = (await mailbox.listFolders()).map((entry) => entry.name);
    if (!folderNames.includes(folder)) {
      return fail(
        new FolderAccessError(folder, `Folder '${folder}' not found. Available: ${folderNames.join(', ')}`)
      );
    }

    if (context.nas && !request.dryRun) {
      result.nasProbe = await this.probe.probeShare(this.deps.createShareClient(context.nas), context.nas, {
        dryRun: false,
      });
      if (!result.nasProbe.passed) {
        return fail(
          new ConnectionError('nas', result.nasProbe.error ?? 'NAS connection test failed; aborting before download')
        );
      }
    }

    const retention = new RetentionEngine(mailbox);

    if (request.clean && request.since && !context.nas) {
      result.mode = 'clean_only';
      const cleaned = await retention.deleteMessages(folder, { dryRun: request.dryRun, cutoff: context.cutoff }, confirmer);
      if (!cleaned.ok) {
        return cleaned;
      }
      result.retention = cleaned.value;
      return succeed(result);
    }

    const downloaded = await new DownloadEngine(mailbox).downloadFolder(folder, request.outputDir, {
      dryRun: request.dryRun,
    });
    if (!downloaded.ok) {
      return downloaded;
    }
    result.download = downloaded.value;
    const newMessages = downloaded.value.downloaded;

    if (context.nas) {
      await this.uploadArchive(result, downloaded.value, context.nas, context.account, request);
    }

    if (request.clean) {
      if (request.dryRun || newMessages > 0) {
        const cleaned = await retention.deleteMessages(folder, { dryRun: request.dryRun, cutoff: context.cutoff }, confirmer);
        if (cleaned.ok) {
          result.retention = cleaned.value;
        } else {
          result.retentionError = cleaned.error.message;
        }
      } else {
        result.retentionSkippedReason = 'No emails downloaded, skipping clean';
      }
    }

    return succeed(result);
  }

  private async uploadArchive(
    result: ArchiveFolderResult,
    download: DownloadReport,
    nas: NasConfig,
    account: string,
    request: ArchiveFolderRequest
  ): Promise<void> {
    if (download.downloaded === 0) {
      result.uploadSkippedReason = 'No emails downloaded, skipping NAS upload';
      return;
    }

    const remoteBasePath = getNasFolderPath(nas, account, folderDirectoryName(request.folder));
    const uploaded = await new UploadEngine(this.deps.createShareClient(nas), nas).uploadDirectory(download.outputDir, {
      dryRun: request.dryRun,
      overwrite: request.overwrite,
      remoteBasePath,
    });

    if (!uploaded.ok) {
      result.uploadError = uploaded.error.message;
      return;
    }
    result.upload = uploaded.value;

    if (request.deleteLocal && !request.dryRun && uploaded.value.uploaded > 0) {
      result.localDeleted = await deleteDirectory(download.outputDir);
      log.info('Deleted local files after upload', { path: download.outputDir, deleted: result.localDeleted });
    }
  }
}
