/**
 * FileWriter - Write operations for file system utilities
 */

import fs from 'fs/promises';
import path from 'path';
import { FileOperationError } from './types';

function isErrnoCode(error: unknown, code: string): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === code;
}

/**
 * Ensure a directory exists, creating it if necessary.
 * Resolves to true when the directory had to be created.
 */
export async function ensureDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    if (!stats.isDirectory()) {
      throw new FileOperationError(
        `Path exists but is not a directory: ${dirPath}`,
        'ensureDirectory',
        dirPath
      );
    }
    return false;
  } catch (error: unknown) {
    if (isErrnoCode(error, 'ENOENT')) {
      try {
        await fs.mkdir(dirPath, { recursive: true });
        return true;
      } catch (mkdirError: unknown) {
        throw new FileOperationError(
          `Failed to create directory: ${mkdirError instanceof Error ? mkdirError.message : String(mkdirError)}`,
          'ensureDirectory',
          dirPath
        );
      }
    } else if (!(error instanceof FileOperationError)) {
      throw new FileOperationError(
        `Failed to check directory: ${error instanceof Error ? error.message : String(error)}`,
        'ensureDirectory',
        dirPath
      );
    } else {
      throw error;
    }
  }
}

/**
 * Write UTF-8 text, creating the parent directory first
 */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await ensureDirectory(path.dirname(filePath));
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof FileOperationError) throw error;
    throw new FileOperationError(
      `Failed to write file: ${error instanceof Error ? error.message : String(error)}`,
      'writeTextFile',
      filePath
    );
  }
}

/**
 * Write an object to a JSON file
 */
export async function writeJsonFile(filePath: string, data: unknown, pretty: boolean = true): Promise<void> {
  try {
    await ensureDirectory(path.dirname(filePath));
    const content = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof FileOperationError) throw error;
    throw new FileOperationError(
      `Failed to write JSON file: ${error instanceof Error ? error.message : String(error)}`,
      'writeJsonFile',
      filePath
    );
  }
}
