/**
 * Tests for the Drive facade and name resolver
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { drive_v3, sheets_v4 } from 'googleapis';

vi.mock('@flowkit/core', () => ({
  createServiceLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    startOperation: () => ({
      success: vi.fn(),
      failure: vi.fn(),
    }),
  }),
}));

import { buildNameQuery, DriveService, MIME_TYPES, shortType } from '../src/google/drive.js';
import { errors, fail, ok } from '../src/result.js';
import type { GoogleClients } from '../src/google/session.js';

function httpError(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}

describe('buildNameQuery', () => {
  it('should escape quotes and backslashes in the name', () => {
    expect(buildNameQuery("Bob's \\ sheet", 'spreadsheet')).toBe(
      "name='Bob\\'s \\\\ sheet' and trashed=false and mimeType='application/vnd.google-apps.spreadsheet'"
    );
  });

  it('should search all types for an unknown filter', () => {
    expect(buildNameQuery('Budget', 'video')).toBe("name='Budget' and trashed=false");
  });
});

describe('shortType', () => {
  it('should keep the last segment of a Google MIME type', () => {
    expect(shortType(MIME_TYPES.presentation)).toBe('presentation');
  });
});

describe('DriveService', () => {
  let files: {
    list: ReturnType<typeof vi.fn>;
    get: ReturnType<typeof vi.fn>;
    delete: ReturnType<typeof vi.fn>;
  };
  let clients: GoogleClients;
  let service: DriveService;

  beforeEach(() => {
    files = { list: vi.fn(), get: vi.fn(), delete: vi.fn().mockResolvedValue({ data: '' }) };
    const drive = { files } as unknown as drive_v3.Drive;
    clients = {
      sheets: async () => ok({} as sheets_v4.Sheets),
      drive: async () => ok(drive),
    };
    service = new DriveService(clients);
  });

  describe('resolveByName', () => {
    it('should resolve a unique match to its ID', async () => {
      files.list.mockResolvedValue({
        data: {
          files: [
            { id: 'id1', name: 'Budget', mimeType: MIME_TYPES.spreadsheet, webViewLink: null },
          ],
        },
      });

      const result = await service.resolveByName('Budget', 'spreadsheet');

      expect(result).toEqual({ success: true, data: 'id1' });
      expect(files.list).toHaveBeenCalledWith({
        q: "name='Budget' and trashed=false and mimeType='application/vnd.google-apps.spreadsheet'",
        fields: 'files(id, name, mimeType, webViewLink)',
      });
    });

    it('should report a missing file', async () => {
      files.list.mockResolvedValue({ data: { files: [] } });

      const result = await service.resolveByName('Budget', 'spreadsheet');

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'not_found',
          query: 'Budget',
          message: "No spreadsheet file found with name: 'Budget'",
        },
      });
    });

    it('should list every candidate when the name is ambiguous', async () => {
      files.list.mockResolvedValue({
        data: {
          files: [
            { id: 'id1', name: 'Budget', mimeType: MIME_TYPES.spreadsheet },
            { id: 'id2', name: 'Budget', mimeType: MIME_TYPES.document },
          ],
        },
      });

      const result = await service.resolveByName('Budget');

      expect(result).toEqual({
        success: false,
        error: {
          kind: 'ambiguous',
          candidates: [
            { name: 'Budget', id: 'id1', type: 'spreadsheet' },
            { name: 'Budget', id: 'id2', type: 'document' },
          ],
          message:
            "Multiple files found with name: 'Budget'. " +
            'Please use a more specific name or use the file ID directly.',
        },
      });
    });

    it('should surface transport failures', async () => {
      files.list.mockRejectedValue(httpError('Backend Error', 500));

      const result = await service.resolveByName('Budget');

      expect(result).toEqual({
        success: false,
        error: { kind: 'transport', status: 500, message: 'Backend Error' },
      });
    });

    it('should pass through session failures without calling Drive', async () => {
      const denied = errors.auth('consent_denied', 'Authorization was not granted: no');
      const failing = new DriveService({
        sheets: async () => fail(denied),
        drive: async () => fail(denied),
      });

      const result = await failing.findByName('Budget');

      expect(result).toEqual({ success: false, error: denied });
      expect(files.list).not.toHaveBeenCalled();
    });
  });

  describe('getFile', () => {
    it('should fetch metadata for a file URL', async () => {
      files.get.mockResolvedValue({
        data: {
          id: 'abc',
          name: 'Notes',
          mimeType: MIME_TYPES.document,
          webViewLink: 'https://docs.google.com/document/d/abc/edit',
        },
      });

      const result = await service.getFile('https://docs.google.com/document/d/abc/edit');

      expect(result).toEqual({
        success: true,
        data: {
          id: 'abc',
          name: 'Notes',
          mimeType: MIME_TYPES.document,
          webViewLink: 'https://docs.google.com/document/d/abc/edit',
        },
      });
      expect(files.get).toHaveBeenCalledWith({
        fileId: 'abc',
        fields: 'id, name, mimeType, webViewLink',
      });
    });

    it('should map a 404 to not_found', async () => {
      files.get.mockRejectedValue(httpError('File not found: abc.', 404));

      const result = await service.getFile('abc');

      expect(result).toEqual({
        success: false,
        error: { kind: 'not_found', query: 'abc', message: "File with ID 'abc' not found" },
      });
    });
  });

  describe('deleteFile', () => {
    it('should delete the referenced file once', async () => {
      const result = await service.deleteFile('https://drive.google.com/file/d/abc/view');

      expect(result).toEqual({ success: true, data: true });
      expect(files.delete).toHaveBeenCalledTimes(1);
      expect(files.delete).toHaveBeenCalledWith({ fileId: 'abc' });
    });

    it('should reject an unrecognized reference without calling Drive', async () => {
      const result = await service.deleteFile('https://drive.google.com/drive/my-drive');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe('unrecognized_reference');
      }
      expect(files.delete).not.toHaveBeenCalled();
    });
  });
});
