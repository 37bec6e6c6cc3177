import { describe, expect, beforeEach, afterEach, test } from '@jest/globals';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConnectionError, PerItemError } from '../../../src/errors/ArchiveErrors.js';
import { UploadEngine } from '../../../src/nas/UploadEngine.js';
import type { NasConfig, UploadReport } from '../../../src/types/index.js';
import { FakeShare } from '../../fixtures/FakeShare.js';

const nas: NasConfig = {
  host: 'nas.local',
  share: 'backup',
  username: 'archiver',
  password: 'test-secret',
  basePath: '/mail-archive',
  domain: 'WORKGROUP',
};

const BASE = String.raw`\\nas.local\backup\mail-archive`;
const M1_RAW = String.raw`\\nas.local\backup\mail-archive\m1\email.raw`;
const M1_PDF = String.raw`\\nas.local\backup\mail-archive\m1\report.pdf`;
const M2_RAW = String.raw`\\nas.local\backup\mail-archive\m2\email.raw`;

describe('UploadEngine', () => {
  let localRoot: string;

  beforeEach(async () => {
    localRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'upload-'));
    await fs.mkdir(path.join(localRoot, 'm1'));
    await fs.mkdir(path.join(localRoot, 'm2'));
    await fs.writeFile(path.join(localRoot, 'm1', 'email.raw'), 'raw-1');
    await fs.writeFile(path.join(localRoot, 'm1', 'report.pdf'), 'pdf');
    await fs.writeFile(path.join(localRoot, 'm2', 'email.raw'), 'raw-two');
  });

  afterEach(async () => {
    await fs.rm(localRoot, { recursive: true, force: true });
  });

  async function upload(
    share: FakeShare,
    options: { dryRun?: boolean; overwrite?: boolean; remoteBasePath?: string } = {}
  ): Promise<UploadReport> {
    const outcome = await new UploadEngine(share, nas).uploadDirectory(localRoot, {
      dryRun: options.dryRun ?? false,
      overwrite: options.overwrite ?? false,
      remoteBasePath: options.remoteBasePath,
    });
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }

  test('mirrors the local tree onto the share', async () => {
    const share = new FakeShare();

    const report = await upload(share);

    expect(report).toMatchObject({
      destination: BASE,
      totalFiles: 3,
      totalBytes: 15,
      uploaded: 3,
      uploadedBytes: 15,
      skipped: 0,
      failed: 0,
    });
    expect(share.content(M1_RAW)).toBe('raw-1');
    expect(share.content(M1_PDF)).toBe('pdf');
    expect(share.content(M2_RAW)).toBe('raw-two');
    expect(share.calls[0]).toBe('session:nas.local:archiver');
    expect(share.closed).toBe(true);
  });

  test('skips files that already exist unless overwriting', async () => {
    const existingFiles = { [M1_RAW]: 'old-1', [M1_PDF]: 'old', [M2_RAW]: 'old-two' };

    const kept = new FakeShare({ existingFiles });
    const skippedReport = await upload(kept);
    expect(skippedReport).toMatchObject({ uploaded: 0, uploadedBytes: 0, skipped: 3 });
    expect(kept.content(M1_RAW)).toBe('old-1');

    const replaced = new FakeShare({ existingFiles });
    const overwriteReport = await upload(replaced, { overwrite: true });
    expect(overwriteReport).toMatchObject({ uploaded: 3, uploadedBytes: 15, skipped: 0 });
    expect(replaced.content(M1_RAW)).toBe('raw-1');
  });

  test('counts only uploaded bytes when some files are skipped', async () => {
    const share = new FakeShare({ existingFiles: { [M2_RAW]: 'old-two' } });

    const report = await upload(share);

    expect(report).toMatchObject({ uploaded: 2, uploadedBytes: 8, skipped: 1, totalBytes: 15 });
  });

  test('treats a failing stat as absent', async () => {
    const share = new FakeShare({ existingFiles: { [M1_RAW]: 'old-1' }, failStat: true });

    const report = await upload(share);

    expect(report.uploaded).toBe(3);
    expect(share.content(M1_RAW)).toBe('raw-1');
  });

  test('dry run reports totals without touching the share', async () => {
    const share = new FakeShare();

    const report = await upload(share, { dryRun: true });

    expect(report).toMatchObject({ dryRun: true, totalFiles: 3, totalBytes: 15, uploaded: 0 });
    expect(share.calls).toEqual([]);
  });

  test('a session failure is a connection error', async () => {
    const share = new FakeShare({ failSession: new Error('STATUS_LOGON_FAILURE') });

    const outcome = await new UploadEngine(share, nas).uploadDirectory(localRoot, { dryRun: false, overwrite: false });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ConnectionError);
      expect(outcome.error.target).toBe('nas');
      expect(outcome.error.message).toBe('NAS connection failed: STATUS_LOGON_FAILURE');
    }
    expect(share.calls).toEqual(['session:nas.local:archiver']);
  });

  test('a failing file does not stop the others', async () => {
    const share = new FakeShare({ failWrites: [M2_RAW] });

    const report = await upload(share);

    expect(report).toMatchObject({ uploaded: 2, failed: 1, uploadedBytes: 8 });
    const failed = report.outcomes.find((outcome) => outcome.status === 'failed');
    const localPath = path.join(localRoot, 'm2', 'email.raw');
    expect(failed?.error).toBeInstanceOf(PerItemError);
    expect(failed?.error?.message).toBe(`Failed to upload ${localPath}: STATUS_ACCESS_DENIED`);
    expect(share.closed).toBe(true);
  });

  test('uses the remote base path override', async () => {
    const share = new FakeShare();

    const report = await upload(share, { remoteBasePath: '/mail-archive/alice/INBOX' });

    expect(report.destination).toBe(String.raw`\\nas.local\backup\mail-archive\alice\INBOX`);
    expect(share.content(String.raw`\\nas.local\backup\mail-archive\alice\INBOX\m1\email.raw`)).toBe('raw-1');
  });

  test('creates nested directories on servers without recursive create', async () => {
    const share = new FakeShare({ rejectMultiLevelMkdir: true });

    const report = await upload(share, { remoteBasePath: '/mail-archive/alice/INBOX' });

    expect(report.uploaded).toBe(3);
    expect(share.directories.has(String.raw`\\nas.local\backup\mail-archive\alice\INBOX\m2`)).toBe(true);
  });

  test('creates each remote directory once', async () => {
    const share = new FakeShare();

    await upload(share);

    const m1Creates = share.calls.filter((call) => call === `mkdir:${BASE}\\m1`);
    expect(m1Creates).toHaveLength(1);
  });

  test('an absent local directory uploads nothing', async () => {
    const share = new FakeShare();
    await fs.rm(localRoot, { recursive: true, force: true });

    const report = await upload(share);

    expect(report).toMatchObject({ totalFiles: 0, uploaded: 0, failed: 0 });
  });
});
