/**
 * File Operations
 */

import { mkdir, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Ensure the parent directory of a file exists
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await ensureDir(dirname(filePath));
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Check whether a path is a directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Remove a file. Returns true when something was deleted, false when
 * the file was already absent.
 */
export async function removeFile(filePath: string): Promise<boolean> {
  const existed = await pathExists(filePath);
  await rm(filePath, { force: true });
  return existed;
}
