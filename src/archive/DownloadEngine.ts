import fs from 'fs/promises';
import path from 'path';
import { FolderAccessError, PerItemError, errorMessage, toError } from '../errors/ArchiveErrors.js';
import { MessageParser } from '../mail/MessageParser.js';
import type {
  DownloadOptions,
  DownloadReport,
  MailboxClient,
  MessageOutcome,
  Outcome,
  ParsedMessage,
} from '../types/index.js';
import { fail, succeed } from '../types/index.js';
import { fileSize } from '../utils/files.js';
import { componentLogger } from '../utils/logger.js';
import { resolveCollision, sanitizeName, truncateName } from '../utils/naming.js';

const log = componentLogger('DownloadEngine');

export const RAW_MESSAGE_FILE = 'email.raw';
export const SUBJECT_MAX_LENGTH = 50;
const FALLBACK_ATTACHMENT_NAME = 'attachment';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD_HHMMSS in UTC
 */
export function formatArrivalTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * Deterministic per-message directory name. The same (arrival time, uid,
 * subject) always maps to the same name, which is what makes re-runs skip.
 */
export function messageDirectoryName(internalDate: Date, uid: number, subject: string): string {
  const safeSubject = sanitizeName(truncateName(sanitizeName(subject), SUBJECT_MAX_LENGTH));
  return `${formatArrivalTimestamp(internalDate)}_${uid}_${safeSubject}`;
}

export function folderDirectoryName(folder: string): string {
  return sanitizeName(folder);
}

/**
 * Mirrors one mailbox folder into `{destination}/{folder}/{message}/email.raw`
 * plus the attachments of each message.
 */
export class DownloadEngine {
  constructor(
    private readonly mailbox: MailboxClient,
    private readonly parser: MessageParser = new MessageParser()
  ) {}

  async downloadFolder(
    folder: string,
    destinationRoot: string,
    options: DownloadOptions
  ): Promise<Outcome<DownloadReport, FolderAccessError>> {
    const folderOutput = path.join(destinationRoot, folderDirectoryName(folder));
    const report: DownloadReport = {
      folder,
      outputDir: folderOutput,
      dryRun: options.dryRun,
      totalMessages: 0,
      downloaded: 0,
      attachments: 0,
      skipped: 0,
      failed: 0,
      outcomes: [],
    };

    try {
      report.totalMessages = await this.mailbox.selectFolder(folder, { readOnly: true });
    } catch (error) {
      log.error('Failed to select folder', { folder, error: errorMessage(error) });
      return fail(
        new FolderAccessError(folder, `Error selecting folder '${folder}': ${errorMessage(error)}`, toError(error))
      );
    }

    if (report.totalMessages === 0) {
      log.info('No messages in folder', { folder });
      return succeed(report);
    }

    // Would-download is the folder size; real dedup needs every message fetched
    if (options.dryRun) {
      report.downloaded = report.totalMessages;
      log.info('Dry run: messages to download', { folder, count: report.totalMessages, outputDir: folderOutput });
      return succeed(report);
    }

    let uids: number[];
    try {
      uids = await this.mailbox.search({ all: true });
    } catch (error) {
      log.error('Failed to search folder', { folder, error: errorMessage(error) });
      return fail(
        new FolderAccessError(folder, `Error searching folder '${folder}': ${errorMessage(error)}`, toError(error))
      );
    }

    try {
      await fs.mkdir(folderOutput, { recursive: true });
    } catch (error) {
      log.error('Failed to create output directory', { folder, outputDir: folderOutput, error: errorMessage(error) });
      return fail(
        new FolderAccessError(
          folder,
          `Cannot create output directory '${folderOutput}': ${errorMessage(error)}`,
          toError(error)
        )
      );
    }

    for (const uid of uids) {
      const outcome = await this.processMessage(uid, folderOutput);
      report.outcomes.push(outcome);

      switch (outcome.status) {
        case 'downloaded':
          report.downloaded++;
          report.attachments += outcome.attachments;
          break;
        case 'skipped':
          report.skipped++;
          break;
        case 'failed':
          report.failed++;
          break;
      }
    }

    log.info('Folder download complete', {
      folder,
      downloaded: report.downloaded,
      attachments: report.attachments,
      skipped: report.skipped,
      failed: report.failed,
    });

    return succeed(report);
  }

  private async processMessage(uid: number, folderOutput: string): Promise<MessageOutcome> {
    try {
      const message = await this.mailbox.fetch(uid);
      if (!message) {
        throw new Error('server returned no data for this message');
      }

      const parsed = await this.parser.parse(message.raw);
      const directory = path.join(
        folderOutput,
        messageDirectoryName(message.internalDate, uid, parsed.subject)
      );
      const rawPath = path.join(directory, RAW_MESSAGE_FILE);

      // Byte length is the only dedup signal
      if ((await fileSize(rawPath)) === message.raw.length) {
        return { uid, status: 'skipped', directory, attachments: 0 };
      }

      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(rawPath, message.raw);

      const attachments = await this.saveAttachments(parsed, directory, uid);
      return { uid, status: 'downloaded', directory, attachments };
    } catch (error) {
      log.error('Error processing message', { uid, error: errorMessage(error) });
      return {
        uid,
        status: 'failed',
        attachments: 0,
        error: new PerItemError(
          `message ${uid}`,
          `Error processing message ${uid}: ${errorMessage(error)}`,
          toError(error)
        ),
      };
    }
  }

  private async saveAttachments(parsed: ParsedMessage, directory: string, uid: number): Promise<number> {
    let saved = 0;

    for (const attachment of parsed.attachments) {
      if (attachment.content.length === 0) {
        continue;
      }

      const name = sanitizeName(attachment.filename) || FALLBACK_ATTACHMENT_NAME;
      try {
        const target = await resolveCollision(directory, name);
        await fs.writeFile(target, attachment.content);
        saved++;
      } catch (error) {
        log.warn('Failed to save attachment', { uid, filename: name, error: errorMessage(error) });
      }
    }

    return saved;
  }
}
