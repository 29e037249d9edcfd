/**
 * FileReader - Read operations for file system utilities
 */

import fs from 'fs/promises';
import { TextDecoder } from 'util';
import { FileOperationError, TextReadResult } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a JSON file and parse it
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error: unknown) {
    throw new FileOperationError(
      `Failed to read JSON file: ${error instanceof Error ? error.message : String(error)}`,
      'readJsonFile',
      filePath
    );
  }
}

/**
 * Read a file as strict UTF-8. Never throws: binary content and I/O
 * failures are reported through the result.
 */
export async function readTextFile(filePath: string): Promise<TextReadResult> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error: unknown) {
    return {
      ok: false,
      reason: 'unreadable',
      message: error instanceof Error ? error.message : String(error)
    };
  }

  try {
    return { ok: true, text: utf8.decode(buffer) };
  } catch (error: unknown) {
    return {
      ok: false,
      reason: 'undecodable',
      message: error instanceof Error ? error.message : String(error)
    };
  }
}

/**
 * Check if file or directory exists
 */
export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that a path exists and is a directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
