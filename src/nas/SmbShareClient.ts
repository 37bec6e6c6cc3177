import SMB2 from '@marsaud/smb2';
import type { Writable } from 'stream';
import { RemoteNotFoundError } from '../errors/ArchiveErrors.js';
import type { NasConfig, RemoteStat, ShareClient } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';
import { REMOTE_SEPARATOR, parseUncPath } from './RemotePath.js';

const log = componentLogger('SmbShareClient');

const ALREADY_EXISTS = 'STATUS_OBJECT_NAME_COLLISION';

// 'w' opens with FILE_OVERWRITE_IF; the library default 'wx' refuses existing files
const WRITE_FLAGS = 'w';

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * ShareClient over @marsaud/smb2. The library addresses files relative to
 * the share, so UNC paths are translated at this boundary.
 */
export class SmbShareClient implements ShareClient {
  private client: SMB2 | null = null;
  private host = '';

  constructor(private readonly nas: Pick<NasConfig, 'share' | 'domain'>) {}

  async registerSession(host: string, username: string, secret: string): Promise<void> {
    const client = new SMB2({
      share: `\\\\${host}\\${this.nas.share}`,
      domain: this.nas.domain,
      username,
      password: secret,
    });

    // The library connects lazily, so list the root to prove the credentials
    await client.readdir('');

    this.client = client;
    this.host = host;
    log.info('SMB session established', { host, share: this.nas.share });
  }

  private session(): SMB2 {
    if (!this.client) {
      throw new Error('SMB session not established; call registerSession() first');
    }
    return this.client;
  }

  /**
   * `\\host\share\a\b` to `a\b`
   */
  private toShareRelative(uncPath: string): string {
    const parts = parseUncPath(uncPath);
    if (!parts) {
      throw new Error(`Not a UNC path: ${uncPath}`);
    }
    if (
      parts.host.toLowerCase() !== this.host.toLowerCase() ||
      parts.share.toLowerCase() !== this.nas.share.toLowerCase()
    ) {
      throw new Error(`Path ${uncPath} is outside \\\\${this.host}\\${this.nas.share}`);
    }
    return parts.segments.join(REMOTE_SEPARATOR);
  }

  async listDirectory(path: string): Promise<string[]> {
    const client = this.session();
    const relative = this.toShareRelative(path);

    const exists = relative === '' || (await client.exists(relative));
    if (!exists) {
      throw new RemoteNotFoundError(path);
    }

    return client.readdir(relative);
  }

  async stat(path: string): Promise<RemoteStat> {
    const client = this.session();
    const relative = this.toShareRelative(path);

    // RemoteStat carries only the path, so existence is all that is asked
    if (relative !== '' && !(await client.exists(relative))) {
      throw new RemoteNotFoundError(path);
    }
    return { path };
  }

  /**
   * One mkdir for the full path. Servers answer STATUS_OBJECT_PATH_NOT_FOUND
   * when intermediate levels are missing.
   */
  async makeDirectories(path: string): Promise<void> {
    const client = this.session();
    const relative = this.toShareRelative(path);
    if (relative === '') {
      return;
    }

    try {
      await client.mkdir(relative);
    } catch (error) {
      if (!hasCode(error, ALREADY_EXISTS)) {
        throw error;
      }
    }
  }

  async openForWrite(path: string): Promise<Writable> {
    const client = this.session();
    const relative = this.toShareRelative(path);

    return client.createWriteStream(relative, { flags: WRITE_FLAGS });
  }

  async close(): Promise<void> {
    if (this.client) {
      this.client.disconnect();
      this.client = null;
      log.info('SMB session closed', { host: this.host });
    }
  }
}
