/**
 * Confluence Client Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@flowkit/core', () => ({
  createServiceLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    startOperation: () => ({
      success: vi.fn(),
      failure: vi.fn(),
    }),
  }),
}));

import { ConfluenceClient, extractExcerpt } from '../src/confluence/client.js';

const BASE_URL = 'https://example.atlassian.net/wiki';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function requestedUrl(fetchFn: ReturnType<typeof vi.fn>, call = 0): URL {
  return new URL(String(fetchFn.mock.calls[call][0]));
}

const PAGE = {
  id: '123',
  title: 'Runbook',
  type: 'page',
  status: 'current',
  space: { key: 'OPS', name: 'Operations' },
  _links: { webui: '/spaces/OPS/pages/123/Runbook' },
  history: {
    createdDate: '2026-01-02T03:04:05.000Z',
    lastUpdated: { when: '2026-02-01T00:00:00.000Z' },
    createdBy: { displayName: 'Ada', username: 'ada' },
  },
  body: { view: { value: '<p>Restart the <b>service</b></p>' } },
  metadata: { labels: { results: [{ name: 'ops' }, { name: 'oncall' }] } },
};

describe('extractExcerpt', () => {
  it('should strip tags and collapse whitespace', () => {
    expect(extractExcerpt('<p>Hello\n  <em>world</em></p>')).toBe('Hello world');
  });

  it('should cut long text back to a word boundary', () => {
    expect(extractExcerpt('alpha beta gamma', 12)).toBe('alpha beta...');
  });

  it('should cut a single long word at the limit', () => {
    expect(extractExcerpt('abcdefghij', 4)).toBe('abcd...');
  });
});

describe('ConfluenceClient', () => {
  let fetchFn: ReturnType<typeof vi.fn>;
  let client: ConfluenceClient;

  beforeEach(() => {
    fetchFn = vi.fn();
    client = new ConfluenceClient(
      {
        baseUrl: `${BASE_URL}/`,
        email: 'someone@example.com',
        apiToken: 'test-token',
        defaultSpace: 'OPS',
      },
      fetchFn
    );
  });

  it('should authenticate with basic auth and return the current user', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ displayName: 'Ada', accountId: 'u1' }));

    const result = await client.testConnection();

    expect(result).toEqual({ success: true, data: { displayName: 'Ada', accountId: 'u1' } });
    expect(fetchFn).toHaveBeenCalledWith(`${BASE_URL}/rest/api/user/current`, {
      method: 'GET',
      headers: {
        Authorization: `Basic ${Buffer.from('someone@example.com:test-token').toString('base64')}`,
        Accept: 'application/json',
      },
    });
  });

  it('should report a non-2xx response as a transport error', async () => {
    fetchFn.mockResolvedValue(new Response('Unauthorized', { status: 401 }));

    const result = await client.testConnection();

    expect(result).toEqual({
      success: false,
      error: {
        kind: 'transport',
        status: 401,
        message: 'Confluence request failed (401): Unauthorized',
      },
    });
  });

  it('should list spaces', async () => {
    fetchFn.mockResolvedValue(
      jsonResponse({ results: [{ key: 'OPS', name: 'Operations', type: 'global', id: 9 }] })
    );

    const result = await client.getSpaces(10);

    expect(result).toEqual({
      success: true,
      data: [{ key: 'OPS', name: 'Operations', type: 'global' }],
    });
    expect(requestedUrl(fetchFn).searchParams.get('limit')).toBe('10');
  });

  describe('buildCql', () => {
    it('should add the default space and content type', () => {
      expect(client.buildCql('text ~ "deploy"', { contentType: 'page' })).toBe(
        'text ~ "deploy" AND space = "OPS" AND type = "page"'
      );
    });

    it('should prefer an explicit space', () => {
      expect(client.buildCql('title ~ "x"', { spaceKey: 'DEV' })).toBe(
        'title ~ "x" AND space = "DEV"'
      );
    });

    it('should skip the default space when asked', () => {
      expect(client.buildCql('title ~ "x"', { useDefaultSpace: false })).toBe('title ~ "x"');
    });

    it('should escape quotes in filter values', () => {
      expect(client.buildCql('q', { spaceKey: 'A"B', useDefaultSpace: false })).toBe(
        'q AND space = "A\\"B"'
      );
    });
  });

  describe('searchContent', () => {
    it('should send the CQL with capped limit and format results', async () => {
      fetchFn.mockResolvedValue(jsonResponse({ results: [PAGE], size: 1, limit: 200, start: 5 }));

      const result = await client.searchContent('text ~ "restart"', { limit: 500, start: 5 });

      const url = requestedUrl(fetchFn);
      expect(url.pathname).toBe('/wiki/rest/api/content/search');
      expect(url.searchParams.get('cql')).toBe('text ~ "restart" AND space = "OPS"');
      expect(url.searchParams.get('limit')).toBe('200');
      expect(url.searchParams.get('start')).toBe('5');
      expect(url.searchParams.get('expand')).toBe('space,history,body.view,metadata.labels');

      expect(result).toEqual({
        success: true,
        data: {
          results: [
            {
              id: '123',
              title: 'Runbook',
              type: 'page',
              status: 'current',
              space: { key: 'OPS', name: 'Operations' },
              url: `${BASE_URL}/spaces/OPS/pages/123/Runbook`,
              created: '2026-01-02T03:04:05.000Z',
              updated: '2026-02-01T00:00:00.000Z',
              creator: { name: 'Ada', username: 'ada' },
              excerpt: 'Restart the service',
              labels: ['ops', 'oncall'],
            },
          ],
          size: 1,
          limit: 200,
          start: 5,
          totalResults: 1,
          query: 'text ~ "restart" AND space = "OPS"',
        },
      });
    });

    it('should leave optional fields empty when not expanded', async () => {
      fetchFn.mockResolvedValue(jsonResponse({ results: [{ id: '7', title: 'Bare', type: 'page' }] }));

      const result = await client.searchContent('q', { expand: 'space' });

      expect(requestedUrl(fetchFn).searchParams.get('expand')).toBe('space');
      expect(result.success && result.data.results[0]).toEqual({
        id: '7',
        title: 'Bare',
        type: 'page',
        status: '',
        space: null,
        url: null,
        created: null,
        updated: null,
        creator: null,
        excerpt: null,
        labels: [],
      });
      expect(result.success && result.data.size).toBe(0);
    });

    it('should return only the items for a space search', async () => {
      fetchFn.mockResolvedValue(jsonResponse({ results: [PAGE], size: 1 }));

      const result = await client.searchInSpace('text ~ "restart"', 'DEV', 'blogpost', 5);

      expect(requestedUrl(fetchFn).searchParams.get('cql')).toBe(
        'text ~ "restart" AND space = "DEV" AND type = "blogpost"'
      );
      expect(result.success && result.data.map((item) => item.id)).toEqual(['123']);
    });
  });

  it('should list the content of a space', async () => {
    fetchFn.mockResolvedValue(jsonResponse({ results: [PAGE] }));

    const result = await client.getSpaceContent('OPS');

    const url = requestedUrl(fetchFn);
    expect(url.pathname).toBe('/wiki/rest/api/content');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      spaceKey: 'OPS',
      type: 'page',
      limit: '25',
      start: '0',
      expand: 'space,history,body.view,metadata.labels',
    });
    expect(result.success && result.data[0].title).toBe('Runbook');
  });
});
