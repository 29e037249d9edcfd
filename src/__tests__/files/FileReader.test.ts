/**
 * FileReader tests against a temporary directory
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { exists, isDirectory, readJsonFile, readTextFile } from '../../utils/files/FileReader';
import { FileOperationError } from '../../utils/files/types';

describe('FileReader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wiki-sync-reader-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('readTextFile()', () => {
    it('decodes UTF-8 text', async () => {
      const file = path.join(dir, 'a.md');
      await fs.writeFile(file, 'Grüße ✓', 'utf-8');

      expect(await readTextFile(file)).toEqual({ ok: true, text: 'Grüße ✓' });
    });

    it('reports invalid UTF-8 as undecodable', async () => {
      const file = path.join(dir, 'a.bin');
      await fs.writeFile(file, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0xff]));

      const result = await readTextFile(file);

      expect(result.ok).toBe(false);
      expect(!result.ok && result.reason).toBe('undecodable');
    });

    it('reports a missing file as unreadable', async () => {
      const result = await readTextFile(path.join(dir, 'missing.md'));

      expect(!result.ok && result.reason).toBe('unreadable');
    });
  });

  describe('readJsonFile()', () => {
    it('parses JSON', async () => {
      const file = path.join(dir, 'a.json');
      await fs.writeFile(file, '{"items":[1]}');

      expect(await readJsonFile(file)).toEqual({ items: [1] });
    });

    it('wraps parse failures', async () => {
      const file = path.join(dir, 'a.json');
      await fs.writeFile(file, '{');

      await expect(readJsonFile(file)).rejects.toBeInstanceOf(FileOperationError);
    });
  });

  describe('exists() / isDirectory()', () => {
    it('tells files and directories apart', async () => {
      const file = path.join(dir, 'a.md');
      await fs.writeFile(file, '');

      expect(await exists(file)).toBe(true);
      expect(await exists(path.join(dir, 'nope'))).toBe(false);
      expect(await isDirectory(dir)).toBe(true);
      expect(await isDirectory(file)).toBe(false);
      expect(await isDirectory(path.join(dir, 'nope'))).toBe(false);
    });
  });
});
