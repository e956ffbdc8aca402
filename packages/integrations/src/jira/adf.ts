/**
 * Atlassian Document Format helpers
 */

import { isRecord, readArray, readString } from '../utils/read.js';

const BLOCK_NODES = new Set(['paragraph', 'heading', 'bulletList', 'orderedList', 'listItem']);

/**
 * Extract plain text from an ADF document. Plain strings pass through.
 */
export function adfToPlainText(doc: unknown): string {
  if (typeof doc === 'string') return doc;
  if (!isRecord(doc)) return '';

  function extractText(nodes: unknown[]): string {
    const parts: string[] = [];

    for (const node of nodes) {
      const type = readString(node, 'type');
      const text = readString(node, 'text');
      if (type === 'text' && text) {
        parts.push(text);
      } else {
        parts.push(extractText(readArray(node, 'content')));
      }

      if (type && BLOCK_NODES.has(type)) {
        parts.push('\n');
      }
    }

    return parts.join('');
  }

  return extractText(readArray(doc, 'content')).trim();
}
