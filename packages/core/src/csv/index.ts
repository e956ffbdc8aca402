/**
 * CSV export and console tables for two-dimensional value grids.
 *
 * The first row of a grid is always treated as the header.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createServiceLogger } from '../logger/index.js';

const logger = createServiceLogger('csv');

export type Cell = string | number | boolean | null | undefined;
export type Grid = Cell[][];

const NEEDS_QUOTING = /[",\r\n]/;

function cellToString(cell: Cell): string {
  return cell === null || cell === undefined ? '' : String(cell);
}

function escapeField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize a grid as RFC 4180 CSV. Rows shorter than the header are padded
 * with empty fields.
 */
export function toCsv(rows: Grid): string {
  if (rows.length === 0) return '';
  const width = rows[0].length;

  return rows
    .map((row) => {
      const cells = row.map(cellToString);
      while (cells.length < width) cells.push('');
      return cells.map(escapeField).join(',');
    })
    .join('\n')
    .concat('\n');
}

/**
 * Parse CSV text into rows of strings. Quoted fields may contain commas,
 * doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      if (char === '\r' && text[i + 1] === '\n') i++;
    } else {
      field += char;
    }
    i++;
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field in CSV input');
  }

  // Final line without trailing newline
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * Write a grid to a CSV file. Returns false when there is nothing to write
 * or the write fails.
 */
export async function saveToCsv(rows: Grid, filename: string): Promise<boolean> {
  const op = logger.startOperation('saveToCsv', { filename });

  if (rows.length === 0) {
    logger.warn('No data to save', { filename });
    op.failure('Empty grid');
    return false;
  }

  try {
    await fs.mkdir(path.dirname(path.resolve(filename)), { recursive: true });
    await fs.writeFile(filename, toCsv(rows), 'utf-8');
    op.success(`Data saved to '${filename}'`, { rows: rows.length });
    return true;
  } catch (error) {
    op.failure(error instanceof Error ? error : String(error));
    return false;
  }
}

export async function readCsv(filename: string): Promise<string[][]> {
  const content = await fs.readFile(filename, 'utf-8');
  return parseCsv(content);
}

// =============================================================================
// Console tables
// =============================================================================

export interface TableOptions {
  /** Rows shown, header included */
  maxRows?: number;
  maxCols?: number;
}

const RULE = '-'.repeat(80);
const CELL_WIDTH = 15;

function formatCell(cell: Cell): string {
  return cellToString(cell).slice(0, CELL_WIDTH).padEnd(CELL_WIDTH);
}

/**
 * Render a grid as fixed-width text lines.
 */
export function formatTable(rows: Grid, options: TableOptions = {}): string[] {
  const { maxRows = 50, maxCols = 10 } = options;

  if (rows.length === 0) {
    return ['No data to display.'];
  }

  const headers = rows[0].slice(0, maxCols);
  const lines = [
    `Displaying data (${rows.length} rows, ${rows[0].length} columns):`,
    RULE,
    headers.map(formatCell).join(' | '),
    RULE,
  ];

  for (const row of rows.slice(1, maxRows)) {
    const cells = row.slice(0, maxCols);
    while (cells.length < headers.length) cells.push('');
    lines.push(cells.map(formatCell).join(' | '));
  }

  if (rows.length > maxRows) {
    lines.push(`... and ${rows.length - maxRows} more rows`);
  }

  return lines;
}

export function printData(rows: Grid, options?: TableOptions): void {
  console.log(formatTable(rows, options).join('\n'));
}
