/**
 * FileSearch - File discovery operations
 */

import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import { DirectoryEntry, FileOperationError } from './types';

/**
 * Find files matching patterns, sorted and without duplicates
 */
export async function findFiles(
  patterns: string | string[],
  options?: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    nocase?: boolean;
  }
): Promise<string[]> {
  try {
    const globPatterns = Array.isArray(patterns) ? patterns : [patterns];
    const results: string[] = [];

    for (const pattern of globPatterns) {
      const matches = await glob(pattern, {
        cwd: options?.cwd,
        ignore: options?.ignore,
        absolute: options?.absolute ?? true,
        nocase: options?.nocase,
        nodir: true
      });
      results.push(...matches);
    }

    return [...new Set(results)].sort();
  } catch (error: unknown) {
    throw new FileOperationError(
      `Failed to find files: ${error instanceof Error ? error.message : String(error)}`,
      'findFiles'
    );
  }
}

/**
 * List the immediate entries of a directory, sorted by name
 */
export async function listDirectory(dirPath: string): Promise<DirectoryEntry[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .map(entry => ({
        name: entry.name,
        path: path.join(dirPath, entry.name),
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory()
      }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error: unknown) {
    throw new FileOperationError(
      `Failed to list directory: ${error instanceof Error ? error.message : String(error)}`,
      'listDirectory',
      dirPath
    );
  }
}
