/**
 * @flowkit/integrations
 *
 * Facades over Jira, Confluence, Google Sheets and Google Drive. Every
 * operation resolves to a Result; none throws.
 *
 * @example
 * import { JiraService, ConfluenceClient } from '@flowkit/integrations';
 */

export * from './result.js';
export * from './jira/index.js';
export * from './confluence/index.js';
export * from './google/index.js';
