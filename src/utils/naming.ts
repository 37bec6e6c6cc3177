import fs from 'fs/promises';
import path from 'path';

// Characters rejected by common filesystems and by SMB path segments,
// plus every C0 control character and DEL
const INVALID_CHARACTERS = /[\u0000-\u001f\u007f:/\\"<>|?*]/g;

const RESERVED_NAMES = new Set([
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
]);

/**
 * Turn an arbitrary string into a single safe path segment.
 * Unicode outside the invalid set is kept as-is. Idempotent.
 */
export function sanitizeName(raw: string): string {
  // \s and trim() share one whitespace set, so a second pass finds nothing left to strip
  const cleaned = raw
    .replace(INVALID_CHARACTERS, '')
    .trim()
    .replace(/[.\s]+$/, '');

  if (RESERVED_NAMES.has(cleaned.toUpperCase())) {
    return `${cleaned}_`;
  }

  return cleaned;
}

/**
 * Truncate to at most `max` code points
 */
export function truncateName(name: string, max: number): string {
  const codePoints = Array.from(name);
  if (codePoints.length <= max) {
    return name;
  }
  return codePoints.slice(0, max).join('');
}

async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.lstat(candidate);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  // fs errors are created outside the caller's realm under some runners, so match on shape
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Return `dir/desiredName`, or the first free `dir/{stem}_{n}{ext}` for n = 1, 2, ...
 */
export async function resolveCollision(dir: string, desiredName: string): Promise<string> {
  const first = path.join(dir, desiredName);
  if (!(await pathExists(first))) {
    return first;
  }

  const extension = path.extname(desiredName);
  const stem = desiredName.slice(0, desiredName.length - extension.length);

  for (let counter = 1; ; counter++) {
    const candidate = path.join(dir, `${stem}_${counter}${extension}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}
