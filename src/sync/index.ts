/**
 * Wiki export/import pipeline
 */

export { WikiExporter, selectWiki } from './WikiExporter';
export type { ExportOptions } from './WikiExporter';
export { WikiImporter, ensureWiki, isFolderAllowed } from './WikiImporter';
export type { ImportOptions } from './WikiImporter';
export { PageUpserter } from './PageUpserter';
export type { UpsertAction } from './PageUpserter';
export { LocalPathAllocator, INDEX_FILE, MARKDOWN_EXTENSION } from './LocalPathAllocator';
export {
  sanitizeSegment,
  sanitizedSegments,
  FALLBACK_SEGMENT,
  ILLEGAL_CHARACTERS,
  ROOT_PAGE_NAME
} from './PathSanitizer';
export {
  PageTrie,
  classifyPaths,
  dedupePaths,
  flattenPageListing,
  isRootPath,
  normalizePagePath,
  pathSegments
} from './PageTree';
export type { PageKind } from './PageTree';
export {
  buildFolderIndex,
  pageNameForFile,
  pagePathFor,
  renderFileContent,
  CODE_LANGUAGES,
  TEXT_EXTENSIONS
} from './MarkdownRenderer';
