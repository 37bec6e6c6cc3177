import { errorMessage } from '../errors/ArchiveErrors.js';
import type { ShareClient } from '../types/index.js';
import { componentLogger } from '../utils/logger.js';
import { REMOTE_SEPARATOR, parseUncPath } from './RemotePath.js';

const log = componentLogger('RemoteDirectory');

const PATH_NOT_FOUND_CODES = new Set(['ENOENT', 'STATUS_OBJECT_PATH_NOT_FOUND']);

/**
 * True for the "no such path" failures some SMB servers return when asked
 * to create several missing levels in one call
 */
export function isPathNotFound(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  if (message.includes('no such file') || message.includes('0xc000003a')) {
    return true;
  }
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    PATH_NOT_FOUND_CODES.has(error.code)
  );
}

/**
 * Create every segment after `\\host\share` one at a time. A segment that
 * already exists fails harmlessly and is skipped.
 */
export async function createDirectoriesIncrementally(share: ShareClient, uncPath: string): Promise<void> {
  const parts = parseUncPath(uncPath);
  if (!parts) {
    log.warn('Not a UNC path, skipping incremental creation', { path: uncPath });
    return;
  }

  let current = `\\\\${parts.host}${REMOTE_SEPARATOR}${parts.share}`;
  for (const segment of parts.segments) {
    current = `${current}${REMOTE_SEPARATOR}${segment}`;
    try {
      await share.makeDirectories(current);
    } catch (error) {
      log.debug('Incremental directory step failed', { path: current, error: errorMessage(error) });
    }
  }
}

/**
 * Ensure a remote directory exists: one bulk create first, then the
 * segment-by-segment fallback when the server reports a missing path
 */
export async function ensureRemoteDirectory(share: ShareClient, uncPath: string): Promise<void> {
  try {
    await share.makeDirectories(uncPath);
  } catch (error) {
    if (isPathNotFound(error)) {
      log.debug('Bulk directory creation rejected, creating incrementally', { path: uncPath });
      await createDirectoriesIncrementally(share, uncPath);
      return;
    }
    // A real problem resurfaces on the file write that follows
    log.warn('Could not create remote directory', { path: uncPath, error: errorMessage(error) });
  }
}
