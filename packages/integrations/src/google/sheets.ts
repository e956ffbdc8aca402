/**
 * Google Sheets Service
 *
 * Reads and writes one spreadsheet through an authenticated session.
 * Static helpers cover the operations that act on Drive files
 * (create, find by name, delete).
 */

import * as readline from 'readline';
import { sheets_v4 } from 'googleapis';
import { createServiceLogger } from '@flowkit/core';
import {
  describeError,
  errors,
  fail,
  ok,
  statusOf,
  toIntegrationError,
  type IntegrationError,
  type Result,
} from '../result.js';
import { DriveService } from './drive.js';
import { extractId, spreadsheetUrl } from './resource-id.js';
import type { GoogleClients } from './session.js';
import type {
  CellValue,
  ConfirmPrompt,
  CreatedSpreadsheet,
  DeleteSpreadsheetTarget,
  SheetInfo,
} from './types.js';

const logger = createServiceLogger('sheets-service');

export const DELETE_PROMPT = 'Are you sure you want to delete this spreadsheet? (yes/no): ';

// =============================================================================
// A1 notation helpers
// =============================================================================

/**
 * Column letters for a 1-based column number (1 -> A, 27 -> AA)
 */
export function columnLetter(column: number): string {
  if (!Number.isInteger(column) || column < 1) {
    throw new RangeError(`Invalid column number: ${column}`);
  }
  let letters = '';
  let remaining = column;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

/**
 * Qualify a range with its sheet name, quoting names that need it
 */
export function a1Range(sheetName: string, range?: string): string {
  const sheet = /^[A-Za-z0-9_]+$/.test(sheetName)
    ? sheetName
    : `'${sheetName.replace(/'/g, "''")}'`;
  return range ? `${sheet}!${range}` : sheet;
}

function toRows(values: unknown[][] | null | undefined): string[][] {
  return (values || []).map((row) => row.map((cell) => (cell == null ? '' : String(cell))));
}

function sheetError(error: unknown, what: string): IntegrationError {
  const status = statusOf(error);
  if (status === 404) {
    return errors.notFound(what, `${what} not found`);
  }
  if (status === 403) {
    return errors.transport(403, `Access denied to ${what}`);
  }
  return toIntegrationError(error);
}

/**
 * Ask a question on the terminal and resolve with the answer
 */
export function promptLine(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

// =============================================================================
// SheetsService Class
// =============================================================================

export class SheetsService {
  private constructor(
    readonly spreadsheetId: string,
    private readonly clients: GoogleClients
  ) {}

  /**
   * Bind to a spreadsheet by ID or URL
   */
  static open(reference: string, clients: GoogleClients): Result<SheetsService> {
    const spreadsheetId = extractId(reference);
    if (!spreadsheetId.success) {
      logger.error('Could not resolve spreadsheet reference', { reference });
      return spreadsheetId;
    }
    return ok(new SheetsService(spreadsheetId.data, clients));
  }

  get url(): string {
    return spreadsheetUrl(this.spreadsheetId);
  }

  /**
   * Make sure a usable credential exists before the first call
   */
  async authenticate(): Promise<Result<boolean>> {
    const sheets = await this.clients.sheets();
    if (!sheets.success) return sheets;
    return ok(true);
  }

  async getSheetList(): Promise<Result<SheetInfo[]>> {
    const op = logger.startOperation('getSheetList', { spreadsheetId: this.spreadsheetId });
    const sheets = await this.clients.sheets();
    if (!sheets.success) {
      op.failure(sheets.error.message);
      return sheets;
    }

    try {
      const response = await sheets.data.spreadsheets.get({ spreadsheetId: this.spreadsheetId });
      const list: SheetInfo[] = (response.data.sheets || []).map((sheet, index) => ({
        name: sheet.properties?.title || '',
        id: sheet.properties?.sheetId ?? 0,
        rows: sheet.properties?.gridProperties?.rowCount ?? 0,
        columns: sheet.properties?.gridProperties?.columnCount ?? 0,
        index: sheet.properties?.index ?? index,
      }));
      op.success(`Found ${list.length} sheets`, { sheets: list.map((s) => s.name) });
      return ok(list);
    } catch (error) {
      op.failure(describeError(error));
      return fail(sheetError(error, `Spreadsheet '${this.spreadsheetId}'`));
    }
  }

  /**
   * Every populated row of a sheet; an empty sheet yields []
   */
  async readAll(sheetName: string): Promise<Result<string[][]>> {
    return this.read('readAll', a1Range(sheetName), sheetName);
  }

  async readRange(sheetName: string, range: string): Promise<Result<string[][]>> {
    return this.read('readRange', a1Range(sheetName, range), sheetName);
  }

  private async read(
    operation: string,
    range: string,
    sheetName: string
  ): Promise<Result<string[][]>> {
    const op = logger.startOperation(operation, { spreadsheetId: this.spreadsheetId, range });
    const sheets = await this.clients.sheets();
    if (!sheets.success) {
      op.failure(sheets.error.message);
      return sheets;
    }

    try {
      const response = await sheets.data.spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range,
      });
      const rows = toRows(response.data.values);
      op.success(`Read ${rows.length} rows`, { range });
      return ok(rows);
    } catch (error) {
      op.failure(describeError(error), { range });
      return fail(sheetError(error, `Sheet '${sheetName}'`));
    }
  }

  /**
   * Append a row after the last populated one, or overwrite row `rowNumber`
   */
  async writeRow(
    sheetName: string,
    row: CellValue[],
    rowNumber?: number
  ): Promise<Result<boolean>> {
    if (row.length === 0) {
      return fail(errors.generic('Cannot write an empty row'));
    }

    if (rowNumber === undefined) {
      return this.mutate('appendRow', a1Range(sheetName, 'A:A'), sheetName, (sheets, range) =>
        sheets.spreadsheets.values.append({
          spreadsheetId: this.spreadsheetId,
          range,
          valueInputOption: 'USER_ENTERED',
          insertDataOption: 'INSERT_ROWS',
          requestBody: { values: [row] },
        })
      );
    }

    if (!Number.isInteger(rowNumber) || rowNumber < 1) {
      return fail(errors.generic(`Invalid row number: ${rowNumber}`));
    }

    const range = a1Range(sheetName, `A${rowNumber}:${columnLetter(row.length)}${rowNumber}`);
    return this.update('writeRow', range, sheetName, [row]);
  }

  async writeCell(sheetName: string, cell: string, value: CellValue): Promise<Result<boolean>> {
    return this.update('writeCell', a1Range(sheetName, cell), sheetName, [[value]]);
  }

  async writeRange(
    sheetName: string,
    range: string,
    data: CellValue[][]
  ): Promise<Result<boolean>> {
    return this.update('writeRange', a1Range(sheetName, range), sheetName, data);
  }

  private update(
    operation: string,
    range: string,
    sheetName: string,
    values: CellValue[][]
  ): Promise<Result<boolean>> {
    return this.mutate(operation, range, sheetName, (sheets, target) =>
      sheets.spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: target,
        valueInputOption: 'USER_ENTERED',
        requestBody: { values },
      })
    );
  }

  private async mutate(
    operation: string,
    range: string,
    sheetName: string,
    call: (sheets: sheets_v4.Sheets, range: string) => Promise<unknown>
  ): Promise<Result<boolean>> {
    const op = logger.startOperation(operation, { spreadsheetId: this.spreadsheetId, range });
    const sheets = await this.clients.sheets();
    if (!sheets.success) {
      op.failure(sheets.error.message);
      return sheets;
    }

    try {
      await call(sheets.data, range);
      op.success(`Wrote ${range}`);
      return ok(true);
    } catch (error) {
      op.failure(describeError(error), { range });
      return fail(sheetError(error, `Sheet '${sheetName}'`));
    }
  }

  /**
   * Raw spreadsheet resource (properties, sheets, named ranges)
   */
  async getSpreadsheetInfo(): Promise<Result<sheets_v4.Schema$Spreadsheet>> {
    const op = logger.startOperation('getSpreadsheetInfo', { spreadsheetId: this.spreadsheetId });
    const sheets = await this.clients.sheets();
    if (!sheets.success) {
      op.failure(sheets.error.message);
      return sheets;
    }

    try {
      const response = await sheets.data.spreadsheets.get({ spreadsheetId: this.spreadsheetId });
      op.success('Spreadsheet info retrieved', { title: response.data.properties?.title });
      return ok(response.data);
    } catch (error) {
      op.failure(describeError(error));
      return fail(sheetError(error, `Spreadsheet '${this.spreadsheetId}'`));
    }
  }

  // ===========================================================================
  // Spreadsheet files
  // ===========================================================================

  static async createSpreadsheet(
    clients: GoogleClients,
    title: string
  ): Promise<Result<CreatedSpreadsheet>> {
    const op = logger.startOperation('createSpreadsheet', { title });
    const sheets = await clients.sheets();
    if (!sheets.success) {
      op.failure(sheets.error.message);
      return sheets;
    }

    try {
      const response = await sheets.data.spreadsheets.create({
        requestBody: { properties: { title } },
        fields: 'spreadsheetId,spreadsheetUrl',
      });
      const id = response.data.spreadsheetId;
      if (!id) {
        op.failure('No spreadsheet ID in response');
        return fail(errors.generic('Spreadsheet was created without an ID'));
      }
      const created = { id, url: response.data.spreadsheetUrl || spreadsheetUrl(id) };
      op.success(`Created spreadsheet '${title}'`, { ...created });
      return ok(created);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  static async createAndOpen(
    clients: GoogleClients,
    title: string
  ): Promise<Result<SheetsService>> {
    const created = await SheetsService.createSpreadsheet(clients, title);
    if (!created.success) return created;
    return ok(new SheetsService(created.data.id, clients));
  }

  static async findSpreadsheetByName(
    clients: GoogleClients,
    name: string
  ): Promise<Result<string>> {
    return new DriveService(clients).resolveByName(name, 'spreadsheet');
  }

  /**
   * Delete a spreadsheet after interactive confirmation.
   * When both an ID and a name are given, the ID wins.
   */
  static async deleteSpreadsheet(
    clients: GoogleClients,
    target: DeleteSpreadsheetTarget,
    confirm: ConfirmPrompt = promptLine
  ): Promise<Result<boolean>> {
    const op = logger.startOperation('deleteSpreadsheet');

    let spreadsheetId: Result<string>;
    if (target.id) {
      if (target.name) {
        logger.warn('Both id and name provided, using id', { id: target.id, name: target.name });
      }
      spreadsheetId = extractId(target.id);
    } else if (target.name) {
      spreadsheetId = await SheetsService.findSpreadsheetByName(clients, target.name);
    } else {
      op.failure('No target');
      return fail(errors.generic('Either a spreadsheet id or name must be provided'));
    }

    if (!spreadsheetId.success) {
      op.failure(spreadsheetId.error.message);
      return spreadsheetId;
    }
    const fileId = spreadsheetId.data;

    const drive = await clients.drive();
    if (!drive.success) {
      op.failure(drive.error.message);
      return drive;
    }

    try {
      const file = await drive.data.files.get({ fileId, fields: 'name' });
      const name = file.data.name || fileId;

      logger.warn(`About to delete spreadsheet '${name}'`, { id: fileId });
      const answer = (await confirm(DELETE_PROMPT)).trim().toLowerCase();
      if (answer !== 'yes' && answer !== 'y') {
        op.failure('Deletion cancelled by user');
        return fail(errors.cancelled('Deletion cancelled by user'));
      }

      await drive.data.files.delete({ fileId });
      op.success(`Successfully deleted spreadsheet '${name}'`, { id: fileId });
      return ok(true);
    } catch (error) {
      op.failure(describeError(error), { id: fileId });
      return fail(sheetError(error, `Spreadsheet with ID '${fileId}'`));
    }
  }
}
