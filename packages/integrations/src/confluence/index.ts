/**
 * Confluence Integration
 */

export type {
  ConfluenceClientConfig,
  ConfluenceCurrentUser,
  ConfluenceSpace,
  FetchFn,
  SearchContentOptions,
  SearchContentResult,
  SearchResultItem,
} from './types.js';

export {
  ConfluenceClient,
  ConfluenceHttpError,
  DEFAULT_EXPAND,
  MAX_LIMIT,
  extractExcerpt,
} from './client.js';
