/**
 * MarkdownRenderer - Turning local files into wiki page bodies
 */

import path from 'path';
import { TextReadResult } from '../utils/files/types';

/** Extensions whose content is already wiki markdown */
export const TEXT_EXTENSIONS = new Set(['.md', '.txt']);

/** Fence language per source extension */
export const CODE_LANGUAGES: Readonly<Record<string, string>> = {
  '.py': 'python',
  '.ps1': 'powershell',
  '.sh': 'bash',
  '.js': 'javascript',
  '.ts': 'typescript',
  '.json': 'json',
  '.yml': 'yaml',
  '.yaml': 'yaml',
  '.xml': 'xml',
  '.cs': 'csharp'
};

function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

/**
 * Page name of a file: text files drop their extension, others keep it
 */
export function pageNameForFile(fileName: string): string {
  return TEXT_EXTENSIONS.has(extensionOf(fileName))
    ? fileName.slice(0, fileName.length - path.extname(fileName).length)
    : fileName;
}

/**
 * Wiki path of a folder page, or of a file's sub-page inside it
 */
export function pagePathFor(folderName: string, fileName?: string): string {
  return fileName === undefined
    ? `/${folderName}`
    : `/${folderName}/${pageNameForFile(fileName)}`;
}

export function unreadableNote(fileName: string): string {
  return `> Unable to display file \`${fileName}\` (binary or unreadable)`;
}

/**
 * Page body for a file: markdown and text verbatim, anything else fenced
 */
export function renderFileContent(fileName: string, read: TextReadResult): string {
  if (!read.ok) {
    return unreadableNote(fileName);
  }

  const extension = extensionOf(fileName);
  if (TEXT_EXTENSIONS.has(extension)) {
    return read.text;
  }

  const language = CODE_LANGUAGES[extension] ?? '';
  return `\`\`\`${language}\n${read.text}\n\`\`\``;
}

/**
 * Generated folder page linking every file's sub-page
 */
export function buildFolderIndex(folderName: string, fileNames: string[]): string {
  const lines = [`# ${folderName}`, '', 'Sub-pages:'];
  for (const fileName of fileNames) {
    lines.push(`- [${pageNameForFile(fileName)}](${pagePathFor(folderName, fileName)})`);
  }
  return lines.join('\n');
}
