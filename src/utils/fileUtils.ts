import { promises as fs } from 'fs';
import { constants } from 'fs';
import path from 'path';
import { isErrorWithCode } from '../types/index.js';
import { logger } from './logger.js';

/**
 * File utilities for atomic operations and safe file handling
 */

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.access(dirPath, constants.F_OK);
  } catch {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * Path of the temporary file a write goes through before the rename
 */
export function tempPathFor(filePath: string): string {
  return `${filePath}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Write data to a file atomically using temp file + rename.
 * On failure the target is left untouched and the temp file is removed.
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = tempPathFor(filePath);

  try {
    await ensureDirectory(path.dirname(filePath));
    await fs.writeFile(tempPath, data, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    try {
      await removeFileSafe(tempPath);
    } catch (cleanupError: unknown) {
      logger.warn('Failed to remove temp file after write error', {
        operation: 'writeFileAtomic',
        tempPath,
        cleanupError: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
      });
    }
    throw error;
  }
}

/**
 * Read a file safely, returning null if it doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isErrorWithCode(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file safely (no error if it doesn't exist)
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error: unknown) {
    if (!(isErrorWithCode(error) && error.code === 'ENOENT')) {
      throw error;
    }
  }
}
