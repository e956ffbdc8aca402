/**
 * Google Services Types
 */

// =============================================================================
// Google Drive Types
// =============================================================================

export type FileTypeFilter = 'spreadsheet' | 'document' | 'presentation' | 'form' | 'folder';

export interface DriveFile {
  id: string;
  name: string;
  mimeType: string;
  webViewLink: string | null;
}

// =============================================================================
// Google Sheets Types
// =============================================================================

export interface SheetInfo {
  /** Tab title */
  name: string;
  /** Numeric sheetId of the tab */
  id: number;
  rows: number;
  columns: number;
  index: number;
}

export interface CreatedSpreadsheet {
  id: string;
  url: string;
}

/** Values accepted when writing cells */
export type CellValue = string | number | boolean;

export interface DeleteSpreadsheetTarget {
  id?: string;
  name?: string;
}

/**
 * Asks the operator to confirm a destructive action; resolves to the raw answer
 */
export type ConfirmPrompt = (question: string) => Promise<string>;
