/**
 * Shared types for file utilities
 */

/**
 * File operation error class
 */
export class FileOperationError extends Error {
  constructor(message: string, public operation: string, public filePath?: string) {
    super(message);
    this.name = 'FileOperationError';
  }
}

/**
 * Immediate entry of a directory listing
 */
export interface DirectoryEntry {
  name: string;
  path: string;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Outcome of decoding a file as UTF-8 text
 */
export type TextReadResult =
  | { ok: true; text: string }
  | { ok: false; reason: 'undecodable' | 'unreadable'; message: string };
