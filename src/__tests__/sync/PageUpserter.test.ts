/**
 * PageUpserter unit tests against the in-memory wiki
 */

import { PageUpserter } from '../../sync/PageUpserter';
import { InMemoryWiki, createMockLogger } from '../../../tests/fakes/InMemoryWiki';

describe('PageUpserter', () => {
  let wiki: InMemoryWiki;
  let wikiId: string;
  let logger: ReturnType<typeof createMockLogger>;
  let upserter: PageUpserter;

  beforeEach(() => {
    wiki = new InMemoryWiki();
    wikiId = wiki.addWiki('ProjectWiki').id;
    logger = createMockLogger();
    upserter = new PageUpserter(wiki, wikiId, logger);
  });

  it('creates a missing page', async () => {
    const result = await upserter.upsert('/Networking/vpn', '# VPN');

    expect(result).toEqual({ ok: true, value: 'created' });
    expect(wiki.content(wikiId, '/Networking/vpn')).toBe('# VPN');
    expect(wiki.calls.createPage).toBe(1);
    expect(wiki.calls.updatePage).toBe(0);
  });

  it('updates an existing page with its current token', async () => {
    wiki.seedPage(wikiId, '/Networking/vpn', 'old');

    const result = await upserter.upsert('/Networking/vpn', 'new');

    expect(result).toEqual({ ok: true, value: 'updated' });
    expect(wiki.content(wikiId, '/Networking/vpn')).toBe('new');
    expect(wiki.calls.createPage).toBe(0);
    expect(wiki.calls.updatePage).toBe(1);
  });

  it('creates on the first run and updates on the second', async () => {
    await upserter.upsert('/DevOps', 'body');
    const second = await upserter.upsert('/DevOps', 'body');

    expect(second).toEqual({ ok: true, value: 'updated' });
    expect(wiki.pagePaths(wikiId)).toEqual(['/DevOps']);
    expect(wiki.calls.createPage).toBe(1);
    expect(wiki.calls.updatePage).toBe(1);
  });

  it('retries a create conflict once as an update', async () => {
    let raced = false;
    wiki.beforeWrite = (id, pagePath) => {
      if (!raced) {
        raced = true;
        wiki.seedPage(id, pagePath, 'written by someone else');
      }
    };

    const result = await upserter.upsert('/Security', 'mine');

    expect(result).toEqual({ ok: true, value: 'updated' });
    expect(wiki.content(wikiId, '/Security')).toBe('mine');
    expect(wiki.calls.createPage).toBe(1);
    expect(wiki.calls.updatePage).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Conflict on /Security, retrying once with a fresh token',
      expect.objectContaining({ event: 'page_conflict', pagePath: '/Security' })
    );
  });

  it('gives up after a second conflict', async () => {
    wiki.seedPage(wikiId, '/Security', 'v1');
    wiki.beforeWrite = (id, pagePath) => wiki.seedPage(id, pagePath, 'concurrent edit');

    const result = await upserter.upsert('/Security', 'mine');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('conflict');
      expect(result.error.status).toBe(412);
    }
    expect(wiki.calls.updatePage).toBe(2);
    expect(wiki.content(wikiId, '/Security')).toBe('concurrent edit');
  });

  it('does not retry other failures', async () => {
    wiki.failNext('createPage', { kind: 'unauthorized', status: 401, message: 'denied' });

    const result = await upserter.upsert('/DevOps/pipeline', 'x');

    expect(result).toEqual({ ok: false, error: { kind: 'unauthorized', status: 401, message: 'denied' } });
    expect(wiki.calls.getPage).toBe(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('stops when the token cannot be read', async () => {
    wiki.failNext('getPage', { kind: 'transport', message: 'socket hang up' });

    const result = await upserter.upsert('/DevOps/pipeline', 'x');

    expect(result).toEqual({ ok: false, error: { kind: 'transport', message: 'socket hang up' } });
    expect(wiki.calls.createPage).toBe(0);
    expect(wiki.calls.updatePage).toBe(0);
  });
});
