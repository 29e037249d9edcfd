/**
 * File system utilities
 */

export * from './files/types';
export { readJsonFile, readTextFile, exists, isDirectory } from './files/FileReader';
export { ensureDirectory, writeTextFile, writeJsonFile } from './files/FileWriter';
export { findFiles, listDirectory } from './files/FileSearch';
