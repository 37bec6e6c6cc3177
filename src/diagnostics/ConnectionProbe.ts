import { RemoteNotFoundError, errorMessage } from '../errors/ArchiveErrors.js';
import { isPathNotFound } from '../nas/RemoteDirectory.js';
import { buildUncPath } from '../nas/RemotePath.js';
import type {
  MailAccountConfig,
  MailboxClient,
  NasConfig,
  ProbeReport,
  ProbeStep,
  ShareClient,
} from '../types/index.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('ConnectionProbe');

type StepResult = string | { detail: string; warning: true };

interface ProbeDefinition {
  name: string;
  run: () => Promise<StepResult>;
}

/**
 * Read-only walk over each external service to validate configuration.
 * The first hard failure ends the probe; steps already run are kept.
 */
export class ConnectionProbe {
  async probeMailbox(mailbox: MailboxClient, account: MailAccountConfig): Promise<ProbeReport> {
    return this.runSteps('mail', [
      {
        name: 'capabilities',
        run: async () => `Server capabilities: ${(await mailbox.capabilities()).length} features`,
      },
      {
        name: 'folders',
        run: async () => `Found ${(await mailbox.listFolders()).length} folders`,
      },
      {
        name: 'inbox',
        run: async () => {
          const count = await mailbox.selectFolder('INBOX', { readOnly: true });
          return `INBOX accessible (${count} messages)`;
        },
      },
      {
        name: 'account',
        run: async () => `Logged in as: ${account.email}`,
      },
    ]);
  }

  async probeShare(share: ShareClient, nas: NasConfig, options: { dryRun: boolean }): Promise<ProbeReport> {
    const shareRoot = buildUncPath(nas.host, nas.share, '');
    const basePath = buildUncPath(nas.host, nas.share, nas.basePath);

    if (options.dryRun) {
      return {
        target: 'nas',
        passed: true,
        steps: [{ name: 'dry_run', ok: true, detail: `Would test connection to ${shareRoot}` }],
      };
    }

    const steps: ProbeDefinition[] = [
      {
        name: 'session',
        run: async () => {
          await share.registerSession(nas.host, nas.username, nas.password);
          return 'SMB session established';
        },
      },
      {
        name: 'share',
        run: async () => `Share accessible (${(await share.listDirectory(shareRoot)).length} items in root)`,
      },
    ];

    if (basePath !== shareRoot) {
      steps.push({
        name: 'base_path',
        run: async () => {
          try {
            return `Base path exists (${(await share.listDirectory(basePath)).length} items)`;
          } catch (error) {
            if (error instanceof RemoteNotFoundError || isPathNotFound(error)) {
              return { detail: 'Base path does not exist (will be created on upload)', warning: true };
            }
            throw error;
          }
        },
      });
    }

    steps.push({
      name: 'share_info',
      run: async () => {
        try {
          await share.stat(shareRoot);
          return 'Share is accessible';
        } catch (error) {
          log.debug('Share stat failed', { error: errorMessage(error) });
          return { detail: 'Could not get share stats (may still work)', warning: true };
        }
      },
    });

    try {
      return await this.runSteps('nas', steps);
    } finally {
      await share.close();
    }
  }

  private async runSteps(target: 'mail' | 'nas', definitions: ProbeDefinition[]): Promise<ProbeReport> {
    const report: ProbeReport = { target, passed: true, steps: [] };

    for (const definition of definitions) {
      try {
        const result = await definition.run();
        const step: ProbeStep =
          typeof result === 'string'
            ? { name: definition.name, ok: true, detail: result }
            : { name: definition.name, ok: true, detail: result.detail, warning: true };
        report.steps.push(step);
      } catch (error) {
        const message = errorMessage(error);
        report.steps.push({ name: definition.name, ok: false, detail: message });
        report.passed = false;
        report.error = `${target === 'mail' ? 'Connection' : 'NAS connection'} test failed at ${definition.name}: ${message}`;
        log.warn('Connection probe failed', { target, step: definition.name, error: message });
        return report;
      }
    }

    log.info('Connection probe passed', { target, steps: report.steps.length });
    return report;
  }
}
