/**
 * PageUpserter - Idempotent create-or-update of a wiki page
 *
 * The page's ETag is read first. With a token the page is updated under
 * If-Match, without one it is created. A conflict on either call (the page
 * appeared meanwhile, or the token went stale) is retried exactly once as an
 * update carrying a freshly read token.
 */

import { Logger } from '../utils/logger';
import { RemoteResult, WikiApi, describeWikiError, fail, ok } from '../wiki/types';

export type UpsertAction = 'created' | 'updated';

export class PageUpserter {
  private readonly api: WikiApi;
  private readonly wikiId: string;
  private readonly logger: Logger;

  constructor(api: WikiApi, wikiId: string, logger: Logger) {
    this.api = api;
    this.wikiId = wikiId;
    this.logger = logger;
  }

  async upsert(pagePath: string, content: string): Promise<RemoteResult<UpsertAction>> {
    const current = await this.readToken(pagePath);
    if (!current.ok) {
      return current;
    }

    const action: UpsertAction = current.value ? 'updated' : 'created';
    const first = current.value
      ? await this.api.updatePage(this.wikiId, pagePath, content, current.value)
      : await this.api.createPage(this.wikiId, pagePath, content);

    if (first.ok) {
      return ok(action);
    }
    if (first.error.kind !== 'conflict') {
      return first;
    }

    this.logger.warn(`Conflict on ${pagePath}, retrying once with a fresh token`, {
      event: 'page_conflict',
      pagePath,
      reason: describeWikiError(first.error)
    });

    const fresh = await this.readToken(pagePath);
    if (!fresh.ok) {
      return fresh;
    }
    if (!fresh.value) {
      return fail<UpsertAction>('conflict', `No concurrency token available for ${pagePath} after a conflict`);
    }

    const retry = await this.api.updatePage(this.wikiId, pagePath, content, fresh.value);
    return retry.ok ? ok<UpsertAction>('updated') : retry;
  }

  /**
   * Current ETag of a page; undefined when the page does not exist
   */
  private async readToken(pagePath: string): Promise<RemoteResult<string | undefined>> {
    const page = await this.api.getPage(this.wikiId, pagePath, { includeContent: false });
    if (page.ok) {
      return ok(page.value.eTag);
    }
    if (page.error.kind === 'not-found') {
      return ok(undefined);
    }
    return page;
  }
}
