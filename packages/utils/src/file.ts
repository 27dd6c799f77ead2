/**
 * File Operations
 */

import { mkdir, writeFile, rm, access } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Write a binary payload, creating the parent directory first.
 * Fails if the file already exists.
 */
export async function writeExclusive(filePath: string, content: Buffer): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, { flag: 'wx', mode: 0o600 });
}

/**
 * Delete a file; a missing file is not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
