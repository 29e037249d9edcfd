/**
 * Upload, download and upload again against one in-memory wiki.
 * The exported tree must re-import onto the same pages with the same content.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { WikiExporter } from '../src/sync/WikiExporter';
import { WikiImporter } from '../src/sync/WikiImporter';
import { OutcomeStatus } from '../src/models/SyncModels';
import { InMemoryWiki, createMockLogger } from './fakes/InMemoryWiki';

describe('upload / download round trip', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wiki-sync-roundtrip-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('re-imports an export without creating or changing pages', async () => {
    const root = path.join(workDir, 'kb');
    const exportDir = path.join(workDir, 'export');
    await fs.mkdir(path.join(root, 'Networking'), { recursive: true });
    await fs.mkdir(path.join(root, 'Security'), { recursive: true });
    await fs.writeFile(path.join(root, 'Networking', 'index.md'), 'Network docs');
    await fs.writeFile(path.join(root, 'Networking', 'vpn.md'), '# VPN');
    await fs.writeFile(path.join(root, 'Security', 'check.py'), 'print(1)');

    const wiki = new InMemoryWiki();
    const logger = createMockLogger();

    const upload = await new WikiImporter(wiki, logger).run({
      wikiName: 'KB',
      root,
      folders: ['Networking', 'Security']
    });
    expect(upload.status).toBe(OutcomeStatus.SUCCESS);
    const pagesAfterUpload = wiki.pagePaths('wiki-1');
    const contentAfterUpload = pagesAfterUpload.map(p => wiki.content('wiki-1', p));

    const download = await new WikiExporter(wiki, logger).run({ wikiName: 'KB', outputDir: exportDir });
    expect(download).toEqual({
      status: OutcomeStatus.SUCCESS,
      summary: { wikiId: 'wiki-1', outputDir: exportDir, exported: 4, createdDirs: 2, skipped: 0 }
    });
    expect(await fs.readFile(path.join(exportDir, 'Security', 'check.py.md'), 'utf-8')).toBe(
      '```python\nprint(1)\n```'
    );

    const reupload = await new WikiImporter(wiki, logger).run({ wikiName: 'KB', root: exportDir, folders: ['*'] });

    expect(reupload).toEqual({
      status: OutcomeStatus.SUCCESS,
      summary: {
        wikiId: 'wiki-1',
        folders: ['Networking', 'Security'],
        created: [],
        updated: ['/Networking', '/Networking/vpn', '/Security', '/Security/check.py'],
        failed: []
      }
    });
    expect(wiki.pagePaths('wiki-1')).toEqual(pagesAfterUpload);
    expect(wiki.pagePaths('wiki-1').map(p => wiki.content('wiki-1', p))).toEqual(contentAfterUpload);
  });
});
