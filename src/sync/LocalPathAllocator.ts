/**
 * LocalPathAllocator - Collision-free local paths for wiki pages
 *
 * Sanitizing can map different page paths onto one local name ("/a:b" and
 * "/a_b" both become "a_b"). Every directory entry is claimed by the first
 * page that needs it; a later page asking for a claimed name gets a numeric
 * suffix ("a_b-2", "a_b-2.md") and a warning is logged. Claims are compared
 * case-insensitively so the mirror also works on Windows and macOS volumes.
 */

import { Logger } from '../utils/logger';
import { pathSegments } from './PageTree';
import { ROOT_PAGE_NAME, sanitizeSegment } from './PathSanitizer';

export const MARKDOWN_EXTENSION = '.md';
export const INDEX_FILE = 'index.md';

type OwnerKind = 'dir' | 'file' | 'index';

export class LocalPathAllocator {
  /** claimed entry key -> owner id */
  private readonly claims = new Map<string, string>();
  /** raw page path prefix -> local directory segments */
  private readonly directories = new Map<string, string[]>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Local directory segments for a page and its ancestors
   */
  directoryFor(pagePath: string): string[] {
    const raw = pathSegments(pagePath);
    let local: string[] = [];

    for (let i = 0; i < raw.length; i++) {
      const prefix = `/${raw.slice(0, i + 1).join('/')}`;
      const cached = this.directories.get(prefix);
      if (cached) {
        local = cached;
        continue;
      }
      const name = this.claim(local, sanitizeSegment(raw[i]), '', 'dir', prefix);
      local = [...local, name];
      this.directories.set(prefix, local);
    }

    return local;
  }

  /**
   * Parent directory segments followed by the leaf's file name
   */
  leafFileFor(pagePath: string): string[] {
    const raw = pathSegments(pagePath);
    if (raw.length === 0) {
      return [this.claim([], ROOT_PAGE_NAME, MARKDOWN_EXTENSION, 'file', '/')];
    }
    const parent = this.directoryFor(`/${raw.slice(0, -1).join('/')}`);
    const fileName = this.claim(
      parent,
      sanitizeSegment(raw[raw.length - 1]),
      MARKDOWN_EXTENSION,
      'file',
      `/${raw.join('/')}`
    );
    return [...parent, fileName];
  }

  /**
   * Directory segments of a container page followed by its index file
   */
  indexFileFor(pagePath: string): string[] {
    const directory = this.directoryFor(pagePath);
    const owner = `/${pathSegments(pagePath).join('/')}`;
    const fileName = this.claim(directory, 'index', MARKDOWN_EXTENSION, 'index', owner);
    return [...directory, fileName];
  }

  private claim(parent: string[], base: string, extension: string, kind: OwnerKind, pagePath: string): string {
    const owner = `${kind}:${pagePath}`;

    for (let n = 1; ; n++) {
      const candidate = n === 1 ? `${base}${extension}` : `${base}-${n}${extension}`;
      const key = [...parent, candidate].join('/').toLowerCase();
      const holder = this.claims.get(key);

      if (holder === undefined) {
        this.claims.set(key, owner);
        if (n > 1) {
          this.logger?.warn(`Local name collision for ${pagePath}; using ${candidate}`, {
            event: 'name_collision',
            pagePath,
            wanted: `${base}${extension}`,
            assigned: candidate
          });
        }
        return candidate;
      }
      if (holder === owner) {
        return candidate;
      }
    }
  }
}
