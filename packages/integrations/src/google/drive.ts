/**
 * Google Drive facade and name resolver
 */

import { createServiceLogger } from '@flowkit/core';
import {
  describeError,
  errors,
  fail,
  ok,
  toIntegrationError,
  type Candidate,
  type Result,
} from '../result.js';
import { extractId } from './resource-id.js';
import type { GoogleClients } from './session.js';
import type { DriveFile, FileTypeFilter } from './types.js';

const logger = createServiceLogger('google-drive');

export const MIME_TYPES: Record<FileTypeFilter, string> = {
  spreadsheet: 'application/vnd.google-apps.spreadsheet',
  document: 'application/vnd.google-apps.document',
  presentation: 'application/vnd.google-apps.presentation',
  form: 'application/vnd.google-apps.form',
  folder: 'application/vnd.google-apps.folder',
};

function isFileTypeFilter(value: string): value is FileTypeFilter {
  return Object.prototype.hasOwnProperty.call(MIME_TYPES, value);
}

/**
 * Escape a value for use inside a single-quoted Drive query string
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Build the `files.list` query for a name lookup. Unknown type filters
 * search all types.
 */
export function buildNameQuery(name: string, typeFilter?: string): string {
  let query = `name='${escapeQueryValue(name)}' and trashed=false`;
  if (typeFilter && isFileTypeFilter(typeFilter)) {
    query += ` and mimeType='${MIME_TYPES[typeFilter]}'`;
  }
  return query;
}

/** Short type label, e.g. "spreadsheet" for application/vnd.google-apps.spreadsheet */
export function shortType(mimeType: string): string {
  const parts = mimeType.split('.');
  return parts[parts.length - 1];
}

export class DriveService {
  constructor(private readonly clients: GoogleClients) {}

  /**
   * All non-trashed files with exactly this name
   */
  async findByName(name: string, typeFilter?: string): Promise<Result<DriveFile[]>> {
    const op = logger.startOperation('findByName', { name, typeFilter });

    if (typeFilter && !isFileTypeFilter(typeFilter)) {
      logger.warn(`Unknown file type '${typeFilter}', searching all types`, {
        allowed: Object.keys(MIME_TYPES),
      });
    }

    const drive = await this.clients.drive();
    if (!drive.success) {
      op.failure(drive.error.message);
      return drive;
    }

    try {
      const response = await drive.data.files.list({
        q: buildNameQuery(name, typeFilter),
        fields: 'files(id, name, mimeType, webViewLink)',
      });

      const files: DriveFile[] = (response.data.files || []).map((file) => ({
        id: file.id || '',
        name: file.name || '',
        mimeType: file.mimeType || '',
        webViewLink: file.webViewLink ?? null,
      }));

      op.success('Name search completed', { name, matches: files.length });
      return ok(files);
    } catch (error) {
      op.failure(describeError(error), { name });
      return fail(toIntegrationError(error));
    }
  }

  /**
   * Resolve a display name to exactly one file ID. Several matches are
   * reported as ambiguous; the resolver never picks one.
   */
  async resolveByName(name: string, typeFilter?: string): Promise<Result<string>> {
    const found = await this.findByName(name, typeFilter);
    if (!found.success) {
      return found;
    }

    const label = typeFilter && isFileTypeFilter(typeFilter) ? ` ${typeFilter}` : '';
    const files = found.data;

    if (files.length === 0) {
      logger.warn(`No${label} file found with name: '${name}'`);
      return fail(errors.notFound(name, `No${label} file found with name: '${name}'`));
    }

    if (files.length > 1) {
      const candidates: Candidate[] = files.map((file) => ({
        name: file.name,
        id: file.id,
        type: shortType(file.mimeType),
      }));
      logger.warn(`Multiple${label} files found with name: '${name}'`, { candidates });
      return fail(
        errors.ambiguous(
          candidates,
          `Multiple${label} files found with name: '${name}'. ` +
            'Please use a more specific name or use the file ID directly.'
        )
      );
    }

    const [file] = files;
    logger.info(`Found unique file: '${file.name}'`, {
      id: file.id,
      type: shortType(file.mimeType),
    });
    return ok(file.id);
  }

  /**
   * File metadata for an ID or URL
   */
  async getFile(reference: string): Promise<Result<DriveFile>> {
    const op = logger.startOperation('getFile');

    const fileId = extractId(reference);
    if (!fileId.success) {
      op.failure(fileId.error.message);
      return fileId;
    }

    const drive = await this.clients.drive();
    if (!drive.success) {
      op.failure(drive.error.message);
      return drive;
    }

    try {
      const response = await drive.data.files.get({
        fileId: fileId.data,
        fields: 'id, name, mimeType, webViewLink',
      });
      const file: DriveFile = {
        id: response.data.id || fileId.data,
        name: response.data.name || '',
        mimeType: response.data.mimeType || '',
        webViewLink: response.data.webViewLink ?? null,
      };
      op.success('File retrieved', { fileId: file.id, name: file.name });
      return ok(file);
    } catch (error) {
      op.failure(describeError(error), { fileId: fileId.data });
      const classified = toIntegrationError(error);
      if (classified.kind === 'transport' && classified.status === 404) {
        return fail(errors.notFound(fileId.data, `File with ID '${fileId.data}' not found`));
      }
      return fail(classified);
    }
  }

  /**
   * Permanently delete a file. Exactly one remote change per call.
   */
  async deleteFile(reference: string): Promise<Result<boolean>> {
    const op = logger.startOperation('deleteFile');

    const fileId = extractId(reference);
    if (!fileId.success) {
      op.failure(fileId.error.message);
      return fileId;
    }

    const drive = await this.clients.drive();
    if (!drive.success) {
      op.failure(drive.error.message);
      return drive;
    }

    try {
      await drive.data.files.delete({ fileId: fileId.data });
      op.success('File deleted', { fileId: fileId.data });
      return ok(true);
    } catch (error) {
      op.failure(describeError(error), { fileId: fileId.data });
      return fail(toIntegrationError(error));
    }
  }
}
