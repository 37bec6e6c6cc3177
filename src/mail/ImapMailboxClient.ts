import { ImapFlow } from 'imapflow';
import type { FetchedMessage, FolderInfo, MailboxClient, ProviderConfig, SearchCriteria } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('ImapMailboxClient');

/**
 * MailboxClient backed by imapflow. One instance is one IMAP session.
 */
export class ImapMailboxClient implements MailboxClient {
  private client: ImapFlow | null = null;

  constructor(private readonly provider: ProviderConfig) {}

  async login(address: string, secret: string): Promise<void> {
    const client = new ImapFlow({
      host: this.provider.imapHost,
      port: this.provider.imapPort,
      secure: this.provider.ssl,
      auth: {
        user: address,
        pass: secret,
      },
      logger: false,
    });

    // Socket errors after login are reported on the next command instead
    client.on('error', (error: Error) => {
      log.warn('IMAP connection error', { host: this.provider.imapHost, error: error.message });
    });

    await client.connect();
    this.client = client;
    log.info('Connected to IMAP server', { host: this.provider.imapHost, provider: this.provider.name });
  }

  private session(): ImapFlow {
    if (!this.client) {
      throw new Error('IMAP session not established; call login() first');
    }
    return this.client;
  }

  async listFolders(): Promise<FolderInfo[]> {
    const folders = await this.session().list();
    return folders.map((folder) => ({
      name: folder.path,
      flags: Array.from(folder.flags),
    }));
  }

  async selectFolder(name: string, options: { readOnly: boolean }): Promise<number> {
    const mailbox = await this.session().mailboxOpen(name, { readOnly: options.readOnly });
    return mailbox.exists;
  }

  async search(criteria: SearchCriteria): Promise<number[]> {
    const result = await this.session().search(criteria, { uid: true });
    return Array.isArray(result) ? result : [];
  }

  async fetch(uid: number): Promise<FetchedMessage | null> {
    const message = await this.session().fetchOne(
      String(uid),
      { uid: true, source: true, internalDate: true },
      { uid: true }
    );

    if (!message || !message.source) {
      return null;
    }

    const internalDate = message.internalDate ? new Date(message.internalDate) : new Date();

    return {
      uid,
      raw: message.source,
      internalDate,
    };
  }

  async deleteMessages(uids: number[]): Promise<void> {
    if (uids.length === 0) {
      return;
    }
    await this.session().messageFlagsAdd(uids, ['\\Deleted'], { uid: true });
  }

  /**
   * Closing the selected mailbox issues CLOSE, which expunges every
   * message flagged \Deleted
   */
  async expunge(): Promise<void> {
    await this.session().mailboxClose();
  }

  async capabilities(): Promise<string[]> {
    return Array.from(this.session().capabilities.keys());
  }

  async logout(): Promise<void> {
    if (!this.client) {
      return;
    }
    const client = this.client;
    this.client = null;
    await client.logout();
    log.info('Disconnected from IMAP server', { host: this.provider.imapHost });
  }
}
