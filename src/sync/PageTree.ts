/**
 * PageTree - Normalizing page listings and telling container pages from leaves
 */

export type PageKind = 'container' | 'leaf';

/**
 * Trim whitespace and trailing slashes. The root ("/") normalizes to "".
 */
export function normalizePagePath(pagePath: string): string {
  return pagePath.trim().replace(/\/+$/, '');
}

/**
 * Raw (unsanitized) segments of a page path; empty segments are dropped
 */
export function pathSegments(pagePath: string): string[] {
  return normalizePagePath(pagePath).split('/').filter(segment => segment.length > 0);
}

export function isRootPath(pagePath: string): boolean {
  return pathSegments(pagePath).length === 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Flatten a full-recursion page listing into normalized, de-duplicated paths
 * in listing order.
 *
 * Two response shapes are accepted: `{ value: [{ path }, ...] }` and a page
 * tree `{ path, subPages: [{ path, subPages }, ...] }`.
 */
export function flattenPageListing(data: unknown): string[] {
  const raw: string[] = [];

  if (isRecord(data) && Array.isArray(data.value)) {
    for (const item of data.value) {
      if (isRecord(item) && typeof item.path === 'string') {
        raw.push(item.path);
      }
    }
  } else {
    const walk = (node: unknown): void => {
      if (!isRecord(node)) return;
      if (typeof node.path === 'string') {
        raw.push(node.path);
      }
      if (Array.isArray(node.subPages)) {
        for (const child of node.subPages) {
          walk(child);
        }
      }
    };
    walk(data);
  }

  return dedupePaths(raw);
}

export function dedupePaths(paths: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const pagePath of paths) {
    const normalized = normalizePagePath(pagePath);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }
  return result;
}

interface TrieNode {
  children: Map<string, TrieNode>;
}

/**
 * Trie keyed by path segments. A page is a container exactly when its node
 * has children, which matches "some other listed path starts with P + '/'"
 * in O(total path length).
 */
export class PageTrie {
  private readonly root: TrieNode = { children: new Map() };

  constructor(paths: Iterable<string> = []) {
    for (const pagePath of paths) {
      this.insert(pagePath);
    }
  }

  insert(pagePath: string): void {
    let node = this.root;
    for (const segment of pathSegments(pagePath)) {
      let next = node.children.get(segment);
      if (!next) {
        next = { children: new Map() };
        node.children.set(segment, next);
      }
      node = next;
    }
  }

  isContainer(pagePath: string): boolean {
    const node = this.find(pagePath);
    return node !== undefined && node.children.size > 0;
  }

  kindOf(pagePath: string): PageKind {
    return this.isContainer(pagePath) ? 'container' : 'leaf';
  }

  private find(pagePath: string): TrieNode | undefined {
    let node: TrieNode | undefined = this.root;
    for (const segment of pathSegments(pagePath)) {
      node = node.children.get(segment);
      if (!node) return undefined;
    }
    return node;
  }
}

/**
 * Classify every path of a listing
 */
export function classifyPaths(paths: string[]): Map<string, PageKind> {
  const normalized = dedupePaths(paths);
  const trie = new PageTrie(normalized);
  return new Map(normalized.map(pagePath => [pagePath, trie.kindOf(pagePath)]));
}
