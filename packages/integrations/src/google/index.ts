/**
 * Google Integration
 *
 * Sheets and Drive facades sharing one authorized session.
 *
 * @example
 * import { DEFAULT_GOOGLE_SCOPES } from '@flowkit/core';
 * import { GoogleSession, SheetsService } from '@flowkit/integrations';
 *
 * const session = new GoogleSession({
 *   clientSecretPath: 'credentials.json',
 *   tokenPath: 'token.json',
 *   scopes: DEFAULT_GOOGLE_SCOPES,
 *   callbackPort: 0,
 * });
 * const sheet = SheetsService.open('https://docs.google.com/spreadsheets/d/abc123/edit', session);
 */

export type {
  CellValue,
  ConfirmPrompt,
  CreatedSpreadsheet,
  DeleteSpreadsheetTarget,
  DriveFile,
  FileTypeFilter,
  SheetInfo,
} from './types.js';

export * from './credentials.js';
export * from './oauth.js';
export * from './session.js';
export * from './resource-id.js';
export * from './drive.js';
export * from './sheets.js';
