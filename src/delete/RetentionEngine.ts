import { FolderAccessError, errorMessage, toError } from '../errors/ArchiveErrors.js';
import { cutoffDay, describeFilter } from '../retention/RetentionFilter.js';
import type {
  Confirmer,
  MailboxClient,
  Outcome,
  RetentionOptions,
  RetentionReport,
  SearchCriteria,
} from '../types/index.js';
import { fail, succeed } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('RetentionEngine');

/**
 * Deletes messages from one folder, optionally only those older than a
 * cutoff, behind two confirmations.
 */
export class RetentionEngine {
  constructor(private readonly mailbox: MailboxClient) {}

  async deleteMessages(
    folder: string,
    options: RetentionOptions,
    confirmer: Confirmer
  ): Promise<Outcome<RetentionReport, FolderAccessError>> {
    const filter = describeFilter(options.cutoff);
    const report: RetentionReport = {
      folder,
      status: 'empty_folder',
      filter,
      totalInFolder: 0,
      matched: 0,
      deleted: 0,
    };

    try {
      report.totalInFolder = await this.mailbox.selectFolder(folder, { readOnly: false });
    } catch (error) {
      log.error('Failed to select folder for deletion', { folder, error: errorMessage(error) });
      return fail(
        new FolderAccessError(folder, `Error selecting folder '${folder}': ${errorMessage(error)}`, toError(error))
      );
    }

    if (report.totalInFolder === 0) {
      log.info('No messages in folder', { folder });
      return succeed(report);
    }

    // BEFORE compares dates only: strictly earlier than the cutoff day
    const criteria: SearchCriteria = options.cutoff ? { before: cutoffDay(options.cutoff) } : { all: true };

    let uids: number[];
    try {
      uids = await this.mailbox.search(criteria);
    } catch (error) {
      log.error('Failed to search folder for deletion', { folder, error: errorMessage(error) });
      return fail(
        new FolderAccessError(folder, `Error searching folder '${folder}': ${errorMessage(error)}`, toError(error))
      );
    }

    report.matched = uids.length;

    if (uids.length === 0) {
      report.status = 'no_matches';
      log.info('No messages to delete', { folder, filter });
      return succeed(report);
    }

    if (options.dryRun) {
      report.status = 'dry_run';
      report.deleted = uids.length;
      log.info('Dry run: messages to delete', { folder, filter, matched: uids.length, total: report.totalInFolder });
      return succeed(report);
    }

    const confirmed = await this.confirmDeletion(confirmer, folder, filter, uids.length, report.totalInFolder);
    if (!confirmed) {
      report.status = 'declined';
      log.info('Deletion cancelled', { folder });
      return succeed(report);
    }

    try {
      await this.mailbox.deleteMessages(uids);
      await this.mailbox.expunge();
    } catch (error) {
      log.error('Failed to delete messages', { folder, error: errorMessage(error) });
      return fail(
        new FolderAccessError(folder, `Error deleting messages in '${folder}': ${errorMessage(error)}`, toError(error))
      );
    }

    report.status = 'deleted';
    report.deleted = uids.length;
    log.info('Deleted messages', { folder, deleted: report.deleted });
    return succeed(report);
  }

  private async confirmDeletion(
    confirmer: Confirmer,
    folder: string,
    filter: string,
    matched: number,
    total: number
  ): Promise<boolean> {
    const first = await confirmer.confirm({
      step: 1,
      folder,
      filter,
      matched,
      message: `This will permanently delete ${matched} of ${total} messages in '${folder}' (${filter}). Are you sure?`,
    });
    if (!first) {
      return false;
    }

    return confirmer.confirm({
      step: 2,
      folder,
      filter,
      matched,
      message: 'This action cannot be undone. Confirm deletion again to proceed.',
    });
  }
}
