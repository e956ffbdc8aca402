/**
 * Resolve a Google resource reference (raw ID or Drive/Docs URL) to its file ID.
 */

import { errors, fail, ok, type Result } from '../result.js';

const HOST_MARKERS = ['google.com', 'drive.google.com', 'docs.google.com'];

// Most specific shapes first; the generic `/d/` and `id=` forms would
// otherwise match inside compound URLs.
const ID_PATTERNS: RegExp[] = [
  /\/(?:spreadsheets|document|presentation|forms)\/d\/([a-zA-Z0-9_-]+)/,
  /\/file\/d\/([a-zA-Z0-9_-]+)/,
  /[?&]id=([a-zA-Z0-9_-]+)/,
  /\/d\/([a-zA-Z0-9_-]+)/,
  /id=([a-zA-Z0-9_-]+)/,
];

/**
 * Extract the file ID from a reference.
 *
 * A reference without any Google host marker is returned verbatim; its
 * shape is not validated.
 *
 * @example
 * extractId('https://docs.google.com/spreadsheets/d/abc123/edit') // ok('abc123')
 */
export function extractId(reference: string): Result<string> {
  if (!HOST_MARKERS.some((marker) => reference.includes(marker))) {
    return ok(reference);
  }

  for (const pattern of ID_PATTERNS) {
    const match = pattern.exec(reference);
    if (match?.[1]) {
      return ok(match[1]);
    }
  }

  return fail(errors.unrecognizedReference(reference));
}

/**
 * Browser URL for a spreadsheet ID
 */
export function spreadsheetUrl(spreadsheetId: string): string {
  return `https://docs.google.com/spreadsheets/d/${spreadsheetId}`;
}
