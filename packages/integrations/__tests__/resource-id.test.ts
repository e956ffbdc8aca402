/**
 * Resource reference resolution tests
 */

import { describe, it, expect } from 'vitest';
import { extractId, spreadsheetUrl } from '../src/google/resource-id.js';

describe('extractId', () => {
  it('should extract the ID from a spreadsheet URL', () => {
    expect(extractId('https://docs.google.com/spreadsheets/d/abc_123-X/edit#gid=0')).toEqual({
      success: true,
      data: 'abc_123-X',
    });
  });

  it('should extract the ID from a Drive file URL', () => {
    expect(extractId('https://drive.google.com/file/d/FILE1/view?usp=sharing')).toEqual({
      success: true,
      data: 'FILE1',
    });
  });

  it('should extract the ID from an open?id= URL', () => {
    expect(extractId('https://drive.google.com/open?id=OPEN1')).toEqual({
      success: true,
      data: 'OPEN1',
    });
  });

  it('should extract the ID from a document URL', () => {
    expect(extractId('https://docs.google.com/document/d/DOC9/edit')).toEqual({
      success: true,
      data: 'DOC9',
    });
  });

  it('should return a bare ID unchanged', () => {
    expect(extractId('1AbCdEf')).toEqual({ success: true, data: '1AbCdEf' });
  });

  it('should reject a Google URL without a file ID', () => {
    const result = extractId('https://drive.google.com/drive/my-drive');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('unrecognized_reference');
      expect(result.error.message).toBe(
        'Could not extract file ID from URL: https://drive.google.com/drive/my-drive'
      );
    }
  });
});

describe('spreadsheetUrl', () => {
  it('should build the browser URL', () => {
    expect(spreadsheetUrl('abc')).toBe('https://docs.google.com/spreadsheets/d/abc');
  });
});
