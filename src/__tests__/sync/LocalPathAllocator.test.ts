/**
 * LocalPathAllocator unit tests
 */

import { LocalPathAllocator } from '../../sync/LocalPathAllocator';
import { createMockLogger } from '../../../tests/fakes/InMemoryWiki';

describe('LocalPathAllocator', () => {
  it('maps leaves, containers and their index files', () => {
    const allocator = new LocalPathAllocator();
    expect(allocator.directoryFor('/A')).toEqual(['A']);
    expect(allocator.indexFileFor('/A')).toEqual(['A', 'index.md']);
    expect(allocator.leafFileFor('/A/B')).toEqual(['A', 'B.md']);
  });

  it('maps the root page to Home.md', () => {
    expect(new LocalPathAllocator().leafFileFor('/')).toEqual(['Home.md']);
  });

  it('sanitizes every segment', () => {
    expect(new LocalPathAllocator().leafFileFor('/Ops: Runbooks/Restart?')).toEqual(['Ops_ Runbooks', 'Restart_.md']);
  });

  it('returns the same answer when asked twice for one page', () => {
    const logger = createMockLogger();
    const allocator = new LocalPathAllocator(logger);
    expect(allocator.leafFileFor('/A/B')).toEqual(['A', 'B.md']);
    expect(allocator.leafFileFor('/A/B')).toEqual(['A', 'B.md']);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('suffixes a second page whose sanitized name is taken', () => {
    const logger = createMockLogger();
    const allocator = new LocalPathAllocator(logger);

    expect(allocator.leafFileFor('/a:b')).toEqual(['a_b.md']);
    expect(allocator.leafFileFor('/a_b')).toEqual(['a_b-2.md']);
    expect(allocator.leafFileFor('/a?b')).toEqual(['a_b-3.md']);

    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'Local name collision for /a_b; using a_b-2.md',
      { event: 'name_collision', pagePath: '/a_b', wanted: 'a_b.md', assigned: 'a_b-2.md' }
    );
  });

  it('compares names case-insensitively', () => {
    const allocator = new LocalPathAllocator();
    expect(allocator.directoryFor('/Docs')).toEqual(['Docs']);
    expect(allocator.directoryFor('/docs')).toEqual(['docs-2']);
    expect(allocator.leafFileFor('/docs/page')).toEqual(['docs-2', 'page.md']);
  });

  it('keeps a leaf called index apart from the container index', () => {
    const allocator = new LocalPathAllocator();
    expect(allocator.indexFileFor('/A')).toEqual(['A', 'index.md']);
    expect(allocator.leafFileFor('/A/index')).toEqual(['A', 'index-2.md']);
  });

  it('keeps a top-level Home page apart from the root page', () => {
    const allocator = new LocalPathAllocator();
    expect(allocator.leafFileFor('/')).toEqual(['Home.md']);
    expect(allocator.leafFileFor('/Home')).toEqual(['Home-2.md']);
  });

  it('lets a directory and a file share a base name', () => {
    const allocator = new LocalPathAllocator();
    expect(allocator.directoryFor('/A')).toEqual(['A']);
    expect(allocator.leafFileFor('/A')).toEqual(['A.md']);
  });
});
