import type { Writable } from 'stream';
import type {
  ArchiveError,
  ConnectionError,
  FolderAccessError,
  PerItemError,
} from '../errors/ArchiveErrors.js';

/**
 * Result of an engine invocation. Domain failures are values, not exceptions.
 */
export type Outcome<T, E extends ArchiveError = ArchiveError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function succeed<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends ArchiveError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ProviderConfig {
  name: string;
  imapHost: string;
  imapPort: number;
  ssl: boolean;
  description?: string;
}

export interface MailAccountConfig {
  email: string;
  password: string;
  provider: string;
}

export interface NasConfig {
  host: string;
  share: string;
  username: string;
  password: string;
  basePath: string;
  domain: string;
}

// ---------------------------------------------------------------------------
// Mailbox capability
// ---------------------------------------------------------------------------

export interface FolderInfo {
  name: string;
  flags: string[];
}

export type SearchCriteria = { all: true } | { before: Date };

export interface FetchedMessage {
  uid: number;
  raw: Buffer;
  /** Server-reported arrival time (INTERNALDATE) */
  internalDate: Date;
}

export interface MailboxClient {
  login(address: string, secret: string): Promise<void>;
  listFolders(): Promise<FolderInfo[]>;
  /** Returns the number of messages in the folder */
  selectFolder(name: string, options: { readOnly: boolean }): Promise<number>;
  search(criteria: SearchCriteria): Promise<number[]>;
  /** Resolves to null when the server returned nothing for the handle */
  fetch(uid: number): Promise<FetchedMessage | null>;
  /** Marks messages as deleted; expunge() makes it permanent */
  deleteMessages(uids: number[]): Promise<void>;
  expunge(): Promise<void>;
  capabilities(): Promise<string[]>;
  logout(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Share capability
// ---------------------------------------------------------------------------

export interface RemoteStat {
  path: string;
}

/**
 * Paths are UNC-style: \\host\share\dir\file
 */
export interface ShareClient {
  registerSession(host: string, username: string, secret: string): Promise<void>;
  listDirectory(path: string): Promise<string[]>;
  /** Rejects with RemoteNotFoundError when the path does not exist */
  stat(path: string): Promise<RemoteStat>;
  /** Succeeds when the directory already exists */
  makeDirectories(path: string): Promise<void>;
  openForWrite(path: string): Promise<Writable>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Messages and downloads
// ---------------------------------------------------------------------------

export interface ExtractedAttachment {
  filename: string;
  disposition: 'attachment' | 'inline';
  content: Buffer;
}

export interface ParsedMessage {
  subject: string;
  isMultipart: boolean;
  attachments: ExtractedAttachment[];
}

export type MessageStatus = 'downloaded' | 'skipped' | 'failed';

export interface MessageOutcome {
  uid: number;
  status: MessageStatus;
  directory?: string;
  attachments: number;
  error?: PerItemError;
}

export interface DownloadOptions {
  dryRun: boolean;
}

export interface DownloadReport {
  folder: string;
  outputDir: string;
  dryRun: boolean;
  totalMessages: number;
  downloaded: number;
  attachments: number;
  skipped: number;
  failed: number;
  outcomes: MessageOutcome[];
}

// ---------------------------------------------------------------------------
// Uploads
// ---------------------------------------------------------------------------

export interface UploadTask {
  localPath: string;
  remotePath: string;
  size: number;
}

export type FileStatus = 'uploaded' | 'skipped' | 'failed';

export interface FileOutcome {
  task: UploadTask;
  status: FileStatus;
  error?: PerItemError;
}

export interface UploadOptions {
  dryRun: boolean;
  overwrite: boolean;
  /** Overrides the configured NAS base path */
  remoteBasePath?: string;
}

export interface UploadReport {
  localRoot: string;
  destination: string;
  dryRun: boolean;
  overwrite: boolean;
  totalFiles: number;
  totalBytes: number;
  uploaded: number;
  uploadedBytes: number;
  skipped: number;
  failed: number;
  outcomes: FileOutcome[];
}

// ---------------------------------------------------------------------------
// Retention
// ---------------------------------------------------------------------------

export interface RetentionPeriod {
  expression: string;
  days: number;
}

export interface ConfirmationPrompt {
  step: 1 | 2;
  message: string;
  folder: string;
  filter: string;
  matched: number;
}

export interface Confirmer {
  confirm(prompt: ConfirmationPrompt): Promise<boolean>;
}

export interface RetentionOptions {
  dryRun: boolean;
  cutoff?: Date;
}

export type RetentionStatus = 'empty_folder' | 'no_matches' | 'dry_run' | 'declined' | 'deleted';

export interface RetentionReport {
  folder: string;
  status: RetentionStatus;
  filter: string;
  totalInFolder: number;
  matched: number;
  deleted: number;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export interface ProbeStep {
  name: string;
  ok: boolean;
  detail: string;
  warning?: boolean;
}

export interface ProbeReport {
  target: 'mail' | 'nas';
  passed: boolean;
  steps: ProbeStep[];
  error?: string;
}

// ---------------------------------------------------------------------------
// Workflow
// ---------------------------------------------------------------------------

export interface FolderSummary {
  name: string;
  messages: number | '?';
}

export interface ArchiveFolderRequest {
  folder: string;
  outputDir: string;
  dryRun: boolean;
  uploadToNas: boolean;
  overwrite: boolean;
  deleteLocal: boolean;
  clean: boolean;
  since?: string;
}

export interface ArchiveFolderResult {
  folder: string;
  mode: 'archive' | 'clean_only';
  download?: DownloadReport;
  upload?: UploadReport;
  uploadSkippedReason?: string;
  uploadError?: string;
  localDeleted: boolean;
  retention?: RetentionReport;
  retentionSkippedReason?: string;
  retentionError?: string;
  nasProbe?: ProbeReport;
}

export interface ConnectionTestResult {
  mail?: ProbeReport;
  nas?: ProbeReport;
  passed: boolean;
}

export type ArchiveFailure = ConnectionError | FolderAccessError;
