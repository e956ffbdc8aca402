/**
 * Confluence REST client
 *
 * Read-only search over the Confluence v1 REST API with basic auth.
 */

import { createServiceLogger } from '@flowkit/core';
import { describeError, fail, ok, toIntegrationError, type Result } from '../result.js';
import { readArray, readField, readNumber, readString } from '../utils/read.js';
import type {
  ConfluenceClientConfig,
  ConfluenceCurrentUser,
  ConfluenceSpace,
  FetchFn,
  SearchContentOptions,
  SearchContentResult,
  SearchResultItem,
} from './types.js';

const logger = createServiceLogger('confluence');

export const MAX_LIMIT = 200;
export const DEFAULT_EXPAND = 'space,history,body.view,metadata.labels';

/**
 * Non-2xx response from Confluence
 */
export class ConfluenceHttpError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`Confluence request failed (${status}): ${body}`);
    this.name = 'ConfluenceHttpError';
  }
}

function quoteCql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Plain text excerpt of an HTML fragment, cut back to a word boundary
 */
export function extractExcerpt(html: string, maxLength = 200): string {
  const text = html
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  if (text.length <= maxLength) return text;

  const cut = text.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace === -1 ? cut : cut.slice(0, lastSpace)}...`;
}

export class ConfluenceClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly defaultSpace: string | undefined;
  private readonly fetchFn: FetchFn;

  constructor(config: ConfluenceClientConfig, fetchFn: FetchFn = fetch) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.authorization = `Basic ${Buffer.from(`${config.email}:${config.apiToken}`).toString('base64')}`;
    this.defaultSpace = config.defaultSpace || undefined;
    this.fetchFn = fetchFn;
  }

  private async get(path: string, params?: Record<string, string | number>): Promise<unknown> {
    const query = params
      ? `?${new URLSearchParams(
          Object.entries(params).map<[string, string]>(([key, value]) => [key, String(value)])
        ).toString()}`
      : '';

    const response = await this.fetchFn(`${this.baseUrl}${path}${query}`, {
      method: 'GET',
      headers: {
        Authorization: this.authorization,
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      throw new ConfluenceHttpError(response.status, await response.text());
    }

    const body: unknown = await response.json();
    return body;
  }

  private formatItem(result: unknown): SearchResultItem {
    const space = readField(result, 'space');
    const history = readField(result, 'history');
    const createdBy = readField(history, 'createdBy');
    const webui = readString(readField(result, '_links'), 'webui');
    const view = readField(readField(result, 'body'), 'view');
    const labels = readField(readField(result, 'metadata'), 'labels');

    return {
      id: readString(result, 'id') || '',
      title: readString(result, 'title') || '',
      type: readString(result, 'type') || '',
      status: readString(result, 'status') || '',
      space: space
        ? { key: readString(space, 'key') || '', name: readString(space, 'name') || '' }
        : null,
      url: webui ? `${this.baseUrl}${webui}` : null,
      created: readString(history, 'createdDate') ?? null,
      updated: readString(readField(history, 'lastUpdated'), 'when') ?? null,
      creator: createdBy
        ? {
            name: readString(createdBy, 'displayName') || '',
            username: readString(createdBy, 'username') || '',
          }
        : null,
      excerpt: view ? extractExcerpt(readString(view, 'value') || '') : null,
      labels: readArray(labels, 'results')
        .map((label) => readString(label, 'name'))
        .filter((name): name is string => name !== undefined),
    };
  }

  /**
   * Fetch the authenticated user
   */
  async testConnection(): Promise<Result<ConfluenceCurrentUser>> {
    const op = logger.startOperation('testConnection');

    try {
      const user = await this.get('/rest/api/user/current');
      const current = {
        displayName: readString(user, 'displayName') || 'Unknown',
        accountId: readString(user, 'accountId') || '',
      };
      op.success(`Connected to Confluence as: ${current.displayName}`);
      return ok(current);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  async getSpaces(limit = 25): Promise<Result<ConfluenceSpace[]>> {
    const op = logger.startOperation('getSpaces', { limit });

    try {
      const data = await this.get('/rest/api/space', { limit: Math.min(limit, MAX_LIMIT) });
      const spaces = readArray(data, 'results').map((space) => ({
        key: readString(space, 'key') || '',
        name: readString(space, 'name') || '',
        type: readString(space, 'type') || '',
      }));
      op.success(`Found ${spaces.length} spaces`);
      return ok(spaces);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  /**
   * Assemble the CQL sent for a search
   */
  buildCql(query: string, options: Pick<SearchContentOptions, 'spaceKey' | 'contentType' | 'useDefaultSpace'> = {}): string {
    const { spaceKey, contentType, useDefaultSpace = true } = options;
    const parts = [query];

    let space = spaceKey;
    if (!space && useDefaultSpace && this.defaultSpace) {
      space = this.defaultSpace;
      logger.debug(`Using default space: ${this.defaultSpace}`);
    }
    if (space) parts.push(`space = ${quoteCql(space)}`);
    if (contentType) parts.push(`type = ${quoteCql(contentType)}`);

    return parts.join(' AND ');
  }

  async searchContent(
    query: string,
    options: SearchContentOptions = {}
  ): Promise<Result<SearchContentResult>> {
    const { limit = 25, start = 0, expand } = options;
    const cql = this.buildCql(query, options);
    const op = logger.startOperation('searchContent', { cql, limit, start });

    try {
      const data = await this.get('/rest/api/content/search', {
        cql,
        limit: Math.min(limit, MAX_LIMIT),
        start,
        expand: expand || DEFAULT_EXPAND,
      });
      const results = readArray(data, 'results').map((item) => this.formatItem(item));
      const result: SearchContentResult = {
        results,
        size: readNumber(data, 'size') ?? 0,
        limit: readNumber(data, 'limit') ?? limit,
        start: readNumber(data, 'start') ?? start,
        totalResults: results.length,
        query: cql,
      };
      op.success(`Found ${result.totalResults} results`);
      return ok(result);
    } catch (error) {
      op.failure(describeError(error), { cql });
      return fail(toIntegrationError(error));
    }
  }

  async searchInSpace(
    query: string,
    spaceKey: string,
    contentType?: string,
    limit = 25
  ): Promise<Result<SearchResultItem[]>> {
    const found = await this.searchContent(query, { spaceKey, contentType, limit });
    if (!found.success) return found;
    return ok(found.data.results);
  }

  /**
   * List content of one type from a space
   */
  async getSpaceContent(
    spaceKey: string,
    contentType = 'page',
    limit = 25,
    start = 0
  ): Promise<Result<SearchResultItem[]>> {
    const op = logger.startOperation('getSpaceContent', { spaceKey, contentType });

    try {
      const data = await this.get('/rest/api/content', {
        spaceKey,
        type: contentType,
        limit: Math.min(limit, MAX_LIMIT),
        start,
        expand: DEFAULT_EXPAND,
      });
      const items = readArray(data, 'results').map((item) => this.formatItem(item));
      op.success(`Found ${items.length} ${contentType} items in space '${spaceKey}'`);
      return ok(items);
    } catch (error) {
      op.failure(describeError(error), { spaceKey });
      return fail(toIntegrationError(error));
    }
  }
}
