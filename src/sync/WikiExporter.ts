/**
 * WikiExporter - Mirror every page of a wiki into a local directory tree
 *
 * Container pages become directories (plus index.md when they carry
 * content), leaf pages become <name>.md files. Any listing or fetch failure
 * aborts the run; a page without content is skipped.
 */

import path from 'path';
import { Logger } from '../utils/logger';
import { ensureDirectory, writeTextFile } from '../utils/files/FileWriter';
import { FileOperationError } from '../utils/files/types';
import { ExportSummary, SyncOutcome, configError, runtimeError, success } from '../models/SyncModels';
import { WikiApi, WikiDescriptor, describeWikiError } from '../wiki/types';
import { LocalPathAllocator } from './LocalPathAllocator';
import { PageTrie, isRootPath } from './PageTree';

export interface ExportOptions {
  /** Wiki name; when omitted the project wiki is used */
  wikiName?: string;
  outputDir: string;
}

/**
 * Pick the wiki to export: by name, else the first project wiki, else the
 * first wiki at all.
 */
export function selectWiki(wikis: WikiDescriptor[], wikiName?: string): WikiDescriptor | undefined {
  if (wikiName) {
    return wikis.find(w => w.name === wikiName);
  }
  return wikis.find(w => (w.type ?? '').toLowerCase() === 'projectwiki') ?? wikis[0];
}

/**
 * Abort signal for the export loop, carrying the message of the outcome
 */
class ExportAborted extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportAborted';
  }
}

export class WikiExporter {
  private readonly api: WikiApi;
  private readonly logger: Logger;

  constructor(api: WikiApi, logger: Logger) {
    this.api = api;
    this.logger = logger;
  }

  async run(options: ExportOptions): Promise<SyncOutcome<ExportSummary>> {
    const wikis = await this.api.listWikis();
    if (!wikis.ok) {
      return runtimeError<ExportSummary>(`List wikis failed: ${describeWikiError(wikis.error)}`);
    }

    const wiki = selectWiki(wikis.value, options.wikiName);
    if (!wiki) {
      return configError<ExportSummary>(`Wiki not found. Name=${JSON.stringify(options.wikiName ?? null)}`);
    }

    const summary: ExportSummary = {
      wikiId: wiki.id,
      outputDir: options.outputDir,
      exported: 0,
      createdDirs: 0,
      skipped: 0
    };

    try {
      await ensureDirectory(options.outputDir);

      const listing = await this.api.listPagePaths(wiki.id);
      if (!listing.ok) {
        return runtimeError(`List pages failed: ${describeWikiError(listing.error)}`, summary);
      }

      const paths = listing.value;
      if (paths.length === 0) {
        this.logger.info('No pages found to export', { wikiId: wiki.id });
        return success(summary);
      }

      this.logger.info(`Exporting ${paths.length} page(s) from ${wiki.name}`, { wikiId: wiki.id });

      const trie = new PageTrie(paths);
      const allocator = new LocalPathAllocator(this.logger);

      for (const pagePath of paths) {
        if (!isRootPath(pagePath) && trie.isContainer(pagePath)) {
          await this.exportContainer(wiki.id, pagePath, allocator, options.outputDir, summary);
        } else {
          await this.exportLeaf(wiki.id, pagePath, allocator, options.outputDir, summary);
        }
      }
    } catch (error: unknown) {
      if (error instanceof ExportAborted || error instanceof FileOperationError) {
        return runtimeError(error.message, summary);
      }
      throw error;
    }

    return success(summary);
  }

  private async exportContainer(
    wikiId: string,
    pagePath: string,
    allocator: LocalPathAllocator,
    outputDir: string,
    summary: ExportSummary
  ): Promise<void> {
    const dirPath = path.join(outputDir, ...allocator.directoryFor(pagePath));
    await ensureDirectory(dirPath);
    summary.createdDirs++;

    const content = await this.fetchContent(wikiId, pagePath);
    if (content) {
      const indexFile = path.join(outputDir, ...allocator.indexFileFor(pagePath));
      await writeTextFile(indexFile, content);
      summary.exported++;
      this.logger.pageExported(pagePath, indexFile);
    } else {
      this.logger.info(`Created folder for container page: ${pagePath} -> ${dirPath}`);
    }
  }

  private async exportLeaf(
    wikiId: string,
    pagePath: string,
    allocator: LocalPathAllocator,
    outputDir: string,
    summary: ExportSummary
  ): Promise<void> {
    const segments = allocator.leafFileFor(pagePath);
    const leafFile = path.join(outputDir, ...segments);
    await ensureDirectory(path.dirname(leafFile));

    const content = await this.fetchContent(wikiId, pagePath);
    if (content === undefined) {
      summary.skipped++;
      this.logger.info(`Skipped empty leaf: ${pagePath || '/'}`);
      return;
    }

    await writeTextFile(leafFile, content);
    summary.exported++;
    this.logger.pageExported(pagePath || '/', leafFile);
  }

  /**
   * Page content; undefined when the page has none or does not exist
   */
  private async fetchContent(wikiId: string, pagePath: string): Promise<string | undefined> {
    const page = await this.api.getPage(wikiId, pagePath || '/', { includeContent: true });
    if (page.ok) {
      return page.value.content;
    }
    if (page.error.kind === 'not-found') {
      return undefined;
    }
    throw new ExportAborted(`Fetching ${pagePath || '/'} failed: ${describeWikiError(page.error)}`);
  }
}
