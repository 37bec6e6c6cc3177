import fs from 'fs/promises';
import path from 'path';
import { isNotFound } from './naming.js';

export interface LocalFile {
  path: string;
  size: number;
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    return stats.isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Every regular file under `root`, in directory enumeration order.
 * A missing root yields an empty list.
 */
export async function listFilesRecursive(root: string): Promise<LocalFile[]> {
  const files: LocalFile[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (entry.isFile()) {
        const stats = await fs.stat(entryPath);
        files.push({ path: entryPath, size: stats.size });
      }
    }
  };

  if (!(await directoryExists(root))) {
    return files;
  }

  await walk(root);
  return files;
}

/**
 * Remove a directory tree. Resolves to false when there was nothing to remove.
 */
export async function deleteDirectory(dir: string): Promise<boolean> {
  try {
    await fs.access(dir);
  } catch {
    return false;
  }
  await fs.rm(dir, { recursive: true, force: true });
  return true;
}

/**
 * Size of a file in bytes, or null when it does not exist
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}
