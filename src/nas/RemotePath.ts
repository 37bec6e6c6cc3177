import path from 'path';

export const REMOTE_SEPARATOR = '\\';

function segments(value: string): string[] {
  return value.split(/[\\/]+/).filter((segment) => segment.length > 0);
}

/**
 * `\\host\share\base\path`, with every separator in `basePath` normalised
 */
export function buildUncPath(host: string, share: string, basePath: string): string {
  return [`\\\\${host}`, share, ...segments(basePath)].join(REMOTE_SEPARATOR);
}

/**
 * Remote path of a local file: its path relative to `localRoot`, joined to
 * `remoteBase` with backslashes whatever the local convention.
 */
export function toRemotePath(localRoot: string, localFile: string, remoteBase: string): string {
  const relative = path.relative(localRoot, localFile);
  return [remoteBase, ...segments(relative)].join(REMOTE_SEPARATOR);
}

export function parentDirectory(remotePath: string): string {
  const index = remotePath.lastIndexOf(REMOTE_SEPARATOR);
  return index > 0 ? remotePath.slice(0, index) : remotePath;
}

export interface UncParts {
  host: string;
  share: string;
  segments: string[];
}

/**
 * Split `\\host\share\a\b` into its host, share and trailing segments
 */
export function parseUncPath(uncPath: string): UncParts | null {
  if (!uncPath.startsWith('\\\\')) {
    return null;
  }
  const [host, share, ...rest] = segments(uncPath);
  if (!host || !share) {
    return null;
  }
  return { host, share, segments: rest };
}
