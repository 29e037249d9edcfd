/**
 * Types for the Azure DevOps wiki REST client
 */

/**
 * Wiki as returned by the list/create wiki calls
 */
export interface WikiDescriptor {
  id: string;
  name: string;
  /** 'projectWiki' or 'codeWiki' */
  type?: string;
}

/**
 * A single page read or written through the API
 */
export interface WikiPage {
  path: string;
  /** Markdown body; only present when requested */
  content?: string;
  /** Concurrency token from the ETag response header */
  eTag?: string;
}

/**
 * Error classes a remote call can end in
 */
export type WikiErrorKind =
  | 'not-found'
  | 'conflict'
  | 'unauthorized'
  | 'http'
  | 'transport';

export interface WikiError {
  kind: WikiErrorKind;
  /** HTTP status when the server answered */
  status?: number;
  message: string;
}

/**
 * Every remote call resolves to one of these; none of them throws for HTTP failures
 */
export type RemoteResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: WikiError };

export interface GetPageOptions {
  includeContent: boolean;
}

/**
 * Remote wiki service boundary used by the exporter and importer
 */
export interface WikiApi {
  listWikis(): Promise<RemoteResult<WikiDescriptor[]>>;
  createWiki(name: string): Promise<RemoteResult<WikiDescriptor>>;
  /** Every page path of the wiki from one full-recursion listing */
  listPagePaths(wikiId: string): Promise<RemoteResult<string[]>>;
  getPage(wikiId: string, pagePath: string, options: GetPageOptions): Promise<RemoteResult<WikiPage>>;
  createPage(wikiId: string, pagePath: string, content: string): Promise<RemoteResult<WikiPage>>;
  updatePage(wikiId: string, pagePath: string, content: string, eTag: string): Promise<RemoteResult<WikiPage>>;
}

export function ok<T>(value: T): RemoteResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: WikiErrorKind, message: string, status?: number): RemoteResult<T> {
  return { ok: false, error: { kind, message, status } };
}

/**
 * Map an HTTP status to the error kind callers switch on
 */
export function errorKindForStatus(status: number): WikiErrorKind {
  if (status === 404) return 'not-found';
  // 412 is what the service answers for a stale If-Match token
  if (status === 409 || status === 412) return 'conflict';
  if (status === 401 || status === 403) return 'unauthorized';
  return 'http';
}

export function describeWikiError(error: WikiError): string {
  return error.status !== undefined
    ? `${error.kind} (HTTP ${error.status}): ${error.message}`
    : `${error.kind}: ${error.message}`;
}
