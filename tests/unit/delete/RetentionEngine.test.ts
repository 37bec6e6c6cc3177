import { describe, expect, beforeEach, test } from '@jest/globals';
import { PresetConfirmer } from '../../../src/delete/Confirmer.js';
import { RetentionEngine } from '../../../src/delete/RetentionEngine.js';
import { FolderAccessError } from '../../../src/errors/ArchiveErrors.js';
import type { Outcome, RetentionReport } from '../../../src/types/index.js';
import { FakeMailbox } from '../../fixtures/FakeMailbox.js';
import { fakeMessage } from '../../fixtures/messages.js';

class FailingExpungeMailbox extends FakeMailbox {
  async expunge(): Promise<void> {
    this.calls.push('expunge');
    throw new Error('EXPUNGE failed');
  }
}

function unwrap(outcome: Outcome<RetentionReport, FolderAccessError>): RetentionReport {
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

const cutoff = new Date('2024-05-16T12:00:00.000Z');

function inboxMessages() {
  return [
    fakeMessage(1, '2024-05-15T23:59:59Z', { subject: 'Day before cutoff' }),
    fakeMessage(2, '2024-05-16T00:00:00Z', { subject: 'Cutoff day' }),
    fakeMessage(3, '2024-06-01T09:00:00Z', { subject: 'Recent' }),
  ];
}

describe('RetentionEngine', () => {
  let mailbox: FakeMailbox;

  beforeEach(() => {
    mailbox = new FakeMailbox({ folders: { INBOX: inboxMessages(), Trash: [] } });
  });

  test('deletes only messages strictly before the cutoff day after two confirmations', async () => {
    const confirmer = new PresetConfirmer([true, true]);

    const report = unwrap(await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false, cutoff }, confirmer));

    expect(report).toEqual({
      folder: 'INBOX',
      status: 'deleted',
      filter: 'older than 2024-05-16',
      totalInFolder: 3,
      matched: 1,
      deleted: 1,
    });
    expect(mailbox.messages('INBOX').map((message) => message.uid)).toEqual([2, 3]);
    expect(mailbox.calls).toEqual([
      'select:INBOX:rw',
      'search:before:2024-05-16T00:00:00.000Z',
      'delete:1',
      'expunge',
    ]);
  });

  test('asks both confirmations with the match count and filter', async () => {
    const confirmer = new PresetConfirmer([true, true]);

    await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false, cutoff }, confirmer);

    expect(confirmer.prompts).toEqual([
      {
        step: 1,
        folder: 'INBOX',
        filter: 'older than 2024-05-16',
        matched: 1,
        message: "This will permanently delete 1 of 3 messages in 'INBOX' (older than 2024-05-16). Are you sure?",
      },
      {
        step: 2,
        folder: 'INBOX',
        filter: 'older than 2024-05-16',
        matched: 1,
        message: 'This action cannot be undone. Confirm deletion again to proceed.',
      },
    ]);
  });

  test('without a cutoff every message matches', async () => {
    const report = unwrap(
      await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false }, new PresetConfirmer([true, true]))
    );

    expect(report).toMatchObject({ filter: 'all messages', matched: 3, deleted: 3, status: 'deleted' });
    expect(mailbox.messages('INBOX')).toEqual([]);
    expect(mailbox.calls).toContain('search:all');
  });

  test('declining the first confirmation deletes nothing', async () => {
    const confirmer = new PresetConfirmer([false, true]);

    const report = unwrap(await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false }, confirmer));

    expect(report).toMatchObject({ status: 'declined', matched: 3, deleted: 0 });
    expect(confirmer.prompts).toHaveLength(1);
    expect(mailbox.messages('INBOX')).toHaveLength(3);
    expect(mailbox.calls.some((call) => call.startsWith('delete:'))).toBe(false);
  });

  test('declining the second confirmation deletes nothing', async () => {
    const confirmer = new PresetConfirmer([true, false]);

    const report = unwrap(await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false }, confirmer));

    expect(report.status).toBe('declined');
    expect(confirmer.prompts).toHaveLength(2);
    expect(mailbox.messages('INBOX')).toHaveLength(3);
  });

  test('missing answers count as declined', async () => {
    const report = unwrap(
      await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false }, new PresetConfirmer([true]))
    );

    expect(report.status).toBe('declined');
  });

  test('dry run reports matches without asking or deleting', async () => {
    const confirmer = new PresetConfirmer([true, true]);

    const report = unwrap(await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: true, cutoff }, confirmer));

    expect(report).toMatchObject({ status: 'dry_run', matched: 1, deleted: 1 });
    expect(confirmer.prompts).toEqual([]);
    expect(mailbox.messages('INBOX')).toHaveLength(3);
  });

  test('an empty folder is reported without searching', async () => {
    const report = unwrap(
      await new RetentionEngine(mailbox).deleteMessages('Trash', { dryRun: false }, new PresetConfirmer([true, true]))
    );

    expect(report).toMatchObject({ status: 'empty_folder', totalInFolder: 0, matched: 0 });
    expect(mailbox.calls).toEqual(['select:Trash:rw']);
  });

  test('no matches is reported without asking', async () => {
    const confirmer = new PresetConfirmer([true, true]);
    const early = new Date('2020-01-01T00:00:00.000Z');

    const report = unwrap(
      await new RetentionEngine(mailbox).deleteMessages('INBOX', { dryRun: false, cutoff: early }, confirmer)
    );

    expect(report).toMatchObject({ status: 'no_matches', matched: 0, deleted: 0, totalInFolder: 3 });
    expect(confirmer.prompts).toEqual([]);
  });

  test('an unknown folder is a folder access error', async () => {
    const outcome = await new RetentionEngine(mailbox).deleteMessages(
      'Nope',
      { dryRun: false },
      new PresetConfirmer([true, true])
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(FolderAccessError);
      expect(outcome.error.folder).toBe('Nope');
    }
  });

  test('an expunge failure is a folder access error', async () => {
    const failing = new FailingExpungeMailbox({ folders: { INBOX: inboxMessages() } });

    const outcome = await new RetentionEngine(failing).deleteMessages(
      'INBOX',
      { dryRun: false },
      new PresetConfirmer([true, true])
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("Error deleting messages in 'INBOX': EXPUNGE failed");
    }
  });
});
