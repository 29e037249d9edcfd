/**
 * WikiImporter - Push a local knowledge folder into the wiki
 *
 * Each allowed top-level folder becomes a page (its index.md, or a generated
 * list of sub-pages) and each file inside it a sub-page. Pages are
 * independent: a failed page is logged and the run moves on.
 */

import { Logger } from '../utils/logger';
import { isDirectory, readTextFile } from '../utils/files/FileReader';
import { listDirectory } from '../utils/files/FileSearch';
import { DirectoryEntry, FileOperationError } from '../utils/files/types';
import { ALL_FOLDERS } from '../utils/config/types';
import { ImportSummary, SyncOutcome, configError, runtimeError, success } from '../models/SyncModels';
import { RemoteResult, WikiApi, WikiDescriptor, describeWikiError, ok } from '../wiki/types';
import { INDEX_FILE } from './LocalPathAllocator';
import { buildFolderIndex, pagePathFor, renderFileContent } from './MarkdownRenderer';
import { PageUpserter } from './PageUpserter';

export interface ImportOptions {
  wikiName: string;
  /** Local root holding the category folders */
  root: string;
  /** Folder allow-list; '*' admits every folder */
  folders: string[];
}

/**
 * Find a wiki by name, creating a project wiki when it is missing
 */
export async function ensureWiki(api: WikiApi, wikiName: string, logger: Logger): Promise<RemoteResult<WikiDescriptor>> {
  const wikis = await api.listWikis();
  if (!wikis.ok) {
    return wikis;
  }

  const existing = wikis.value.find(w => w.name === wikiName);
  if (existing) {
    return ok(existing);
  }

  logger.info(`Creating project wiki ${wikiName}`);
  return api.createWiki(wikiName);
}

export function isFolderAllowed(folderName: string, allowList: string[]): boolean {
  return allowList.includes(ALL_FOLDERS) || allowList.includes(folderName);
}

export class WikiImporter {
  private readonly api: WikiApi;
  private readonly logger: Logger;

  constructor(api: WikiApi, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  async run(options: ImportOptions): Promise<SyncOutcome<ImportSummary>> {
    if (!(await isDirectory(options.root))) {
      return configError<ImportSummary>(`Root folder not found: ${options.root}`);
    }

    let folders: DirectoryEntry[];
    try {
      folders = (await listDirectory(options.root)).filter(
        entry => entry.isDirectory && isFolderAllowed(entry.name, options.folders)
      );
    } catch (error: unknown) {
      if (error instanceof FileOperationError) {
        return runtimeError<ImportSummary>(error.message);
      }
      throw error;
    }

    const wiki = await ensureWiki(this.api, options.wikiName, this.logger);
    if (!wiki.ok) {
      return runtimeError<ImportSummary>(`Resolving wiki ${options.wikiName} failed: ${describeWikiError(wiki.error)}`);
    }

    const summary: ImportSummary = {
      wikiId: wiki.value.id,
      folders: folders.map(f => f.name),
      created: [],
      updated: [],
      failed: []
    };

    if (folders.length === 0) {
      this.logger.info(`No folders to upload under ${options.root}`, { allowed: options.folders });
      return success(summary);
    }

    const upserter = new PageUpserter(this.api, wiki.value.id, this.logger);
    for (const folder of folders) {
      this.logger.info(`Uploading folder: ${folder.path}`);
      await this.uploadFolder(folder, upserter, summary);
    }

    if (summary.failed.length > 0) {
      return runtimeError(`${summary.failed.length} page(s) failed to upload`, summary);
    }
    return success(summary);
  }

  private async uploadFolder(folder: DirectoryEntry, upserter: PageUpserter, summary: ImportSummary): Promise<void> {
    const folderPage = pagePathFor(folder.name);

    let files: DirectoryEntry[];
    try {
      files = (await listDirectory(folder.path)).filter(entry => entry.isFile);
    } catch (error: unknown) {
      if (!(error instanceof FileOperationError)) throw error;
      this.recordFailure(summary, folderPage, error.message);
      return;
    }

    const indexEntry = files.find(entry => entry.name === INDEX_FILE);
    const pages = files.filter(entry => entry !== indexEntry);

    await this.upsert(upserter, folderPage, await this.folderBody(folder.name, indexEntry, pages), summary);

    for (const file of pages) {
      const content = renderFileContent(file.name, await readTextFile(file.path));
      await this.upsert(upserter, pagePathFor(folder.name, file.name), content, summary);
    }
  }

  private async folderBody(
    folderName: string,
    indexEntry: DirectoryEntry | undefined,
    pages: DirectoryEntry[]
  ): Promise<string> {
    if (indexEntry) {
      const read = await readTextFile(indexEntry.path);
      if (read.ok) {
        return read.text;
      }
      this.logger.warn(`Cannot read ${indexEntry.path}, generating the folder index instead`, {
        reason: read.message
      });
    }
    return buildFolderIndex(folderName, pages.map(p => p.name));
  }

  private async upsert(upserter: PageUpserter, pagePath: string, content: string, summary: ImportSummary): Promise<void> {
    const result = await upserter.upsert(pagePath, content);
    if (!result.ok) {
      this.recordFailure(summary, pagePath, describeWikiError(result.error));
      return;
    }

    if (result.value === 'created') {
      summary.created.push(pagePath);
    } else {
      summary.updated.push(pagePath);
    }
    this.logger.pageUpserted(pagePath, result.value);
  }

  private recordFailure(summary: ImportSummary, pagePath: string, reason: string): void {
    summary.failed.push({ pagePath, reason });
    this.logger.pageFailed(pagePath, reason);
  }
}
