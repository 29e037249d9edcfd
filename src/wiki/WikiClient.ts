/**
 * WikiClient - Azure DevOps wiki REST calls over Axios
 *
 * Every call resolves to a RemoteResult. HTTP failures become typed errors;
 * nothing is retried here. The single conflict retry lives in PageUpserter.
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { AzureDevOpsConfig } from '../models/Config';
import { Logger } from '../utils/logger';
import { generateId } from '../utils/ids';
import { flattenPageListing } from '../sync/PageTree';
import { buildAuthHeaders, maskSensitiveHeaders } from './WikiAuth';
import {
  GetPageOptions,
  RemoteResult,
  WikiApi,
  WikiDescriptor,
  WikiError,
  WikiPage,
  errorKindForStatus,
  fail,
  ok
} from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (!isRecord(headers)) return undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name && typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

function toWikiDescriptor(value: unknown): WikiDescriptor | undefined {
  if (!isRecord(value) || typeof value.id !== 'string' || typeof value.name !== 'string') {
    return undefined;
  }
  return {
    id: value.id,
    name: value.name,
    type: typeof value.type === 'string' ? value.type : undefined
  };
}

/**
 * Turn whatever Axios threw into a WikiError
 */
export function toWikiError(error: unknown): WikiError {
  const message = error instanceof Error ? error.message : String(error);
  if (isRecord(error) && isRecord(error.response) && typeof error.response.status === 'number') {
    const status = error.response.status;
    const data = error.response.data;
    const detail = isRecord(data) && typeof data.message === 'string' ? data.message : message;
    return { kind: errorKindForStatus(status), status, message: detail };
  }
  return { kind: 'transport', message };
}

export class WikiClient implements WikiApi {
  private readonly config: AzureDevOpsConfig;
  private readonly logger: Logger;
  private readonly axiosInstance: AxiosInstance;

  constructor(config: AzureDevOpsConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.axiosInstance = axios.create({
      baseURL: `${config.orgUrl.replace(/\/+$/, '')}/${encodeURIComponent(config.project)}/_apis/wiki`,
      timeout: config.timeout,
      headers: {
        Accept: 'application/json',
        ...buildAuthHeaders(config.pat)
      }
    });
  }

  async listWikis(): Promise<RemoteResult<WikiDescriptor[]>> {
    return this.send({ method: 'get', url: '/wikis' }, response => {
      const value = isRecord(response.data) && Array.isArray(response.data.value) ? response.data.value : [];
      const wikis: WikiDescriptor[] = [];
      for (const item of value) {
        const wiki = toWikiDescriptor(item);
        if (wiki) wikis.push(wiki);
      }
      return ok(wikis);
    });
  }

  async createWiki(name: string): Promise<RemoteResult<WikiDescriptor>> {
    return this.send<WikiDescriptor>(
      { method: 'post', url: '/wikis', data: { name, type: 'projectWiki' } },
      response => {
        const wiki = toWikiDescriptor(response.data);
        return wiki ? ok(wiki) : fail<WikiDescriptor>('http', 'Create wiki response did not describe a wiki', response.status);
      }
    );
  }

  async listPagePaths(wikiId: string): Promise<RemoteResult<string[]>> {
    return this.send(
      {
        method: 'get',
        url: this.pagesUrl(wikiId),
        params: { recursionLevel: 'Full' },
        timeout: this.config.listTimeout
      },
      response => ok(flattenPageListing(response.data))
    );
  }

  async getPage(wikiId: string, pagePath: string, options: GetPageOptions): Promise<RemoteResult<WikiPage>> {
    return this.send(
      {
        method: 'get',
        url: this.pagesUrl(wikiId),
        params: { path: pagePath, includeContent: options.includeContent ? 'true' : 'false' }
      },
      response => ok(this.toPage(response, pagePath))
    );
  }

  async createPage(wikiId: string, pagePath: string, content: string): Promise<RemoteResult<WikiPage>> {
    return this.send(
      {
        method: 'put',
        url: this.pagesUrl(wikiId),
        params: { path: pagePath },
        data: { content },
        headers: { 'Content-Type': 'application/json' }
      },
      response => ok(this.toPage(response, pagePath))
    );
  }

  async updatePage(wikiId: string, pagePath: string, content: string, eTag: string): Promise<RemoteResult<WikiPage>> {
    return this.send(
      {
        method: 'put',
        url: this.pagesUrl(wikiId),
        params: { path: pagePath },
        data: { content },
        headers: { 'Content-Type': 'application/json', 'If-Match': eTag }
      },
      response => ok(this.toPage(response, pagePath))
    );
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private pagesUrl(wikiId: string): string {
    return `/wikis/${encodeURIComponent(wikiId)}/pages`;
  }

  private toPage(response: AxiosResponse<unknown>, requestedPath: string): WikiPage {
    const data = isRecord(response.data) ? response.data : {};
    return {
      path: typeof data.path === 'string' ? data.path : requestedPath,
      content: typeof data.content === 'string' ? data.content : undefined,
      eTag: readHeader(response.headers, 'etag')
    };
  }

  private async send<T>(
    request: AxiosRequestConfig,
    parse: (response: AxiosResponse<unknown>) => RemoteResult<T>
  ): Promise<RemoteResult<T>> {
    const requestId = generateId('req');
    const startTime = Date.now();
    const method = (request.method ?? 'get').toUpperCase();

    this.logger.http(`${method} ${request.url ?? ''}`, {
      requestId,
      params: request.params,
      headers: maskSensitiveHeaders(this.plainHeaders(request))
    });

    try {
      const response = await this.axiosInstance.request<unknown>({
        ...request,
        params: { ...request.params, 'api-version': this.config.apiVersion }
      });
      this.logger.debug('Request completed', {
        requestId,
        status: response.status,
        duration: Date.now() - startTime
      });
      return parse(response);
    } catch (error: unknown) {
      const wikiError = toWikiError(error);
      this.logger.debug('Request failed', {
        requestId,
        kind: wikiError.kind,
        status: wikiError.status,
        duration: Date.now() - startTime
      });
      return { ok: false, error: wikiError };
    }
  }

  private plainHeaders(request: AxiosRequestConfig): Record<string, string> {
    const headers: Record<string, string> = {};
    if (isRecord(request.headers)) {
      for (const [key, value] of Object.entries(request.headers)) {
        if (typeof value === 'string') headers[key] = value;
      }
    }
    return headers;
  }
}
