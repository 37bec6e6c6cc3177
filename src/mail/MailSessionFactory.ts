import { ConnectionError, errorMessage, toError } from '../errors/ArchiveErrors.js';
import type { MailAccountConfig, MailboxClient, Outcome, ProviderConfig } from '../types/index.js';
import { fail, succeed } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';
import { ImapMailboxClient } from './ImapMailboxClient.js';

const log = componentLogger('MailSessionFactory');

export type MailboxClientFactory = (provider: ProviderConfig) => MailboxClient;

const defaultClientFactory: MailboxClientFactory = (provider) => new ImapMailboxClient(provider);

/**
 * Opens one authenticated mailbox session per call and always logs out
 * afterwards, whatever the callback returns or throws.
 */
export class MailSessionFactory {
  constructor(
    private readonly account: MailAccountConfig,
    private readonly provider: ProviderConfig,
    private readonly createClient: MailboxClientFactory = defaultClientFactory
  ) {}

  get accountConfig(): MailAccountConfig {
    return this.account;
  }

  get providerConfig(): ProviderConfig {
    return this.provider;
  }

  async run<T>(work: (mailbox: MailboxClient) => Promise<T>): Promise<Outcome<T, ConnectionError>> {
    const mailbox = this.createClient(this.provider);

    try {
      await mailbox.login(this.account.email, this.account.password);
    } catch (error) {
      log.error('Mailbox login failed', {
        host: this.provider.imapHost,
        error: errorMessage(error),
      });
      return fail(
        new ConnectionError(
          'mail',
          `Failed to connect to ${this.provider.imapHost}: ${errorMessage(error)}`,
          toError(error)
        )
      );
    }

    try {
      return succeed(await work(mailbox));
    } finally {
      try {
        await mailbox.logout();
      } catch (error) {
        log.warn('Mailbox logout failed', { error: errorMessage(error) });
      }
    }
  }
}
