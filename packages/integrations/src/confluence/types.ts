/**
 * Confluence Integration Types
 */

export interface ConfluenceClientConfig {
  /** Site base URL including the context path, e.g. https://example.atlassian.net/wiki */
  baseUrl: string;
  email: string;
  apiToken: string;
  /** Space searched when a search names none */
  defaultSpace?: string;
}

export interface ConfluenceCurrentUser {
  displayName: string;
  accountId: string;
}

export interface ConfluenceSpace {
  key: string;
  name: string;
  type: string;
}

export interface SearchResultItem {
  id: string;
  title: string;
  type: string;
  status: string;
  space: { key: string; name: string } | null;
  url: string | null;
  created: string | null;
  updated: string | null;
  creator: { name: string; username: string } | null;
  /** Plain text excerpt of the rendered body, null when no body was expanded */
  excerpt: string | null;
  labels: string[];
}

export interface SearchContentOptions {
  spaceKey?: string;
  /** page, blogpost, attachment, ... */
  contentType?: string;
  limit?: number;
  start?: number;
  expand?: string;
  useDefaultSpace?: boolean;
}

export interface SearchContentResult {
  results: SearchResultItem[];
  size: number;
  limit: number;
  start: number;
  totalResults: number;
  /** The CQL that was sent */
  query: string;
}

/** Subset of `fetch` used by the client */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
