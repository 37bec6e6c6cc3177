import fs from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors/ArchiveErrors.js';
import { componentLogger } from '../utils/logger.js';
import type { MailAccountConfig, NasConfig, ProviderConfig } from '../types/index.js';

const log = componentLogger('AppConfig');

type Env = Record<string, string | undefined>;

export const DEFAULT_PROVIDER = 'gmx';
export const DEFAULT_NAS_PATH = '/mail-archive';
export const DEFAULT_NAS_DOMAIN = 'WORKGROUP';
export const DEFAULT_OUTPUT_DIR = './downloads';

export const PROVIDER_CONFIG_PATHS = [
  path.join(__dirname, '../../config/providers.json'),
  path.join(os.homedir(), '.config', 'mail-archive', 'providers.json'),
  '/etc/mail-archive/providers.json',
];

const providerEntrySchema = z.object({
  name: z.string().optional(),
  imap_host: z.string(),
  imap_port: z.number().int().positive().default(993),
  ssl: z.boolean().default(true),
  description: z.string().optional(),
});

const providersFileSchema = z.object({
  default: z.string().optional(),
  providers: z.record(providerEntrySchema).default({}),
});

type ProvidersFile = z.infer<typeof providersFileSchema>;

const BUILTIN_PROVIDERS: Record<string, ProviderConfig> = {
  gmx: { name: 'GMX Mail', imapHost: 'imap.gmx.net', imapPort: 993, ssl: true },
  gmail: { name: 'Gmail', imapHost: 'imap.gmail.com', imapPort: 993, ssl: true },
  outlook: { name: 'Outlook', imapHost: 'outlook.office365.com', imapPort: 993, ssl: true },
};

/**
 * Mailbox credentials from MAIL_EMAIL / MAIL_PASSWORD
 */
export function loadMailConfig(provider?: string, env: Env = process.env): MailAccountConfig {
  const email = env.MAIL_EMAIL;
  const password = env.MAIL_PASSWORD;

  if (!email || !password) {
    throw new ConfigurationError(
      'Mail credentials not configured. Set MAIL_EMAIL and MAIL_PASSWORD in the environment or .env file',
      'MISSING_CREDENTIALS'
    );
  }

  return {
    email,
    password,
    provider: provider || env.MAIL_PROVIDER || getDefaultProvider(env.PROVIDERS_CONFIG),
  };
}

/**
 * Local part of the address, used as the per-account directory on the share
 */
export function accountName(account: MailAccountConfig): string {
  return account.email.split('@')[0];
}

/**
 * Share settings, or null when any of the required variables is missing
 */
export function loadNasConfig(env: Env = process.env): NasConfig | null {
  const { NAS_HOST, NAS_SHARE, NAS_USERNAME, NAS_PASSWORD } = env;

  if (!NAS_HOST || !NAS_SHARE || !NAS_USERNAME || !NAS_PASSWORD) {
    return null;
  }

  return {
    host: NAS_HOST,
    share: NAS_SHARE,
    username: NAS_USERNAME,
    password: NAS_PASSWORD,
    basePath: env.NAS_PATH || DEFAULT_NAS_PATH,
    domain: env.NAS_DOMAIN || DEFAULT_NAS_DOMAIN,
  };
}

/**
 * Share path that receives one folder of one account
 */
export function getNasFolderPath(nas: NasConfig, mailAccount: string, folderName: string): string {
  return `${nas.basePath}/${mailAccount}/${folderName}`;
}

export function resolveOutputDir(requested?: string, env: Env = process.env): string {
  return path.resolve(requested || env.OUTPUT_DIR || DEFAULT_OUTPUT_DIR);
}

function findConfigFile(configPath?: string): string | null {
  const candidates = configPath ? [configPath] : PROVIDER_CONFIG_PATHS;
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

function readProvidersFile(file: string): ProvidersFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read provider config ${file}: ${errorMessage(error)}`
    );
  }

  const parsed = providersFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid provider config ${file}: ${issues}`);
  }
  return parsed.data;
}

function parseSslFlag(value: string): boolean {
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/**
 * IMAP_HOST, IMAP_PORT and IMAP_SSL take precedence for the custom provider
 */
function applyCustomProviderEnv(provider: ProviderConfig, env: Env): ProviderConfig {
  const port = env.IMAP_PORT ? Number.parseInt(env.IMAP_PORT, 10) : provider.imapPort;
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`Invalid IMAP_PORT: '${env.IMAP_PORT}'`);
  }

  return {
    ...provider,
    imapHost: env.IMAP_HOST || provider.imapHost,
    imapPort: port,
    ssl: env.IMAP_SSL !== undefined ? parseSslFlag(env.IMAP_SSL) : provider.ssl,
  };
}

/**
 * Resolve the IMAP endpoint for a provider name. Falls back to built-in
 * defaults when no providers.json exists on the search path.
 */
export function loadProviderConfig(
  provider: string,
  configPath?: string,
  env: Env = process.env
): ProviderConfig {
  const file = findConfigFile(configPath ?? env.PROVIDERS_CONFIG);

  if (!file) {
    const builtin = BUILTIN_PROVIDERS[provider];
    if (!builtin) {
      throw new ConfigurationError(
        `Unknown provider '${provider}' and no config file found`,
        'UNKNOWN_PROVIDER'
      );
    }
    log.debug('Using built-in provider defaults', { provider });
    return builtin;
  }

  const { providers } = readProvidersFile(file);
  const entry = providers[provider];
  if (!entry) {
    throw new ConfigurationError(
      `Unknown provider '${provider}'. Available: ${Object.keys(providers).join(', ')}`,
      'UNKNOWN_PROVIDER'
    );
  }

  let resolved: ProviderConfig = {
    name: entry.name ?? provider,
    imapHost: entry.imap_host,
    imapPort: entry.imap_port,
    ssl: entry.ssl,
    description: entry.description,
  };

  if (provider === 'custom') {
    resolved = applyCustomProviderEnv(resolved, env);
  }

  if (!resolved.imapHost) {
    throw new ConfigurationError(`Provider '${provider}' has no IMAP host configured`);
  }

  log.debug('Loaded provider config', { provider, file, name: resolved.name });
  return resolved;
}

/**
 * The `default` entry of the first providers.json found, or gmx
 */
export function getDefaultProvider(configPath?: string): string {
  const file = findConfigFile(configPath);
  if (!file) {
    return DEFAULT_PROVIDER;
  }
  return readProvidersFile(file).default ?? DEFAULT_PROVIDER;
}
