import { createHash } from 'crypto';
import knownMimeTypes from './mime-types.json';
import { DomainError } from '../../../utils/errors/domain-error';

// Accepted for any allowed extension
export const GENERIC_MIME_TYPE = 'application/octet-stream';

export const MAX_TITLE_LENGTH = 500;
export const MAX_TAG_LENGTH = 100;
// Width of document_versions.file_name
export const MAX_FILE_NAME_LENGTH = 255;

const MIME_TYPES_BY_EXTENSION: Record<string, string[] | undefined> =
  knownMimeTypes;

export interface IncomingFile {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

export interface FileRules {
  maxFileSizeBytes: number;
  allowedExtensions: string[];
}

export interface ClassifiedFile {
  extension: string;
  mimeType: string;
  checksum: string;
}

/**
 * Lower-case suffix after the last dot, or '' when there is none
 */
export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0 || dot === fileName.length - 1) {
    return '';
  }
  return fileName.substring(dot + 1).toLowerCase();
}

export function normalizeMimeType(mimeType: string): string {
  return mimeType.split(';')[0].trim().toLowerCase();
}

export function computeChecksum(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Validates size, name length, extension and declared MIME type of an
 * upload.
 */
export function classifyFile(
  file: IncomingFile,
  rules: FileRules,
): ClassifiedFile {
  if (file.size <= 0 || file.buffer.length === 0) {
    throw DomainError.invalidInput('File is empty');
  }
  if (file.size > rules.maxFileSizeBytes) {
    throw DomainError.invalidInput('File exceeds the maximum allowed size', {
      maxFileSizeBytes: rules.maxFileSizeBytes,
    });
  }

  if (file.originalName.length > MAX_FILE_NAME_LENGTH) {
    throw DomainError.invalidInput('File name is too long', {
      maxLength: MAX_FILE_NAME_LENGTH,
    });
  }

  const extension = fileExtension(file.originalName);
  if (!extension || !rules.allowedExtensions.includes(extension)) {
    throw DomainError.invalidInput('File type is not allowed', {
      allowedExtensions: rules.allowedExtensions,
    });
  }

  const mimeType = normalizeMimeType(file.mimeType);
  const expected = MIME_TYPES_BY_EXTENSION[extension] ?? [];
  if (mimeType !== GENERIC_MIME_TYPE && !expected.includes(mimeType)) {
    throw DomainError.invalidInput(
      'MIME type does not match the file extension',
      { extension, mimeType },
    );
  }

  return {
    extension,
    mimeType,
    checksum: computeChecksum(file.buffer),
  };
}

/**
 * Reduces a client file name to a safe final blob key segment
 */
export function sanitizeFileName(fileName: string): string {
  const baseName = fileName.split(/[\\/]/).pop() ?? '';
  const cleaned = baseName
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[._]+/, '')
    .substring(0, 200);
  return cleaned.length > 0 ? cleaned : 'file';
}

export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw DomainError.invalidInput('Title must not be empty');
  }
  if (trimmed.length > MAX_TITLE_LENGTH) {
    throw DomainError.invalidInput('Title is too long', {
      maxLength: MAX_TITLE_LENGTH,
    });
  }
  return trimmed;
}

/**
 * Trims and lower-cases tags, dropping empties and duplicates
 * (first occurrence wins).
 */
export function normalizeTags(tags: string[]): string[] {
  const normalized: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (tag.length === 0 || normalized.includes(tag)) {
      continue;
    }
    if (tag.length > MAX_TAG_LENGTH) {
      throw DomainError.invalidInput('Tag is too long', {
        maxLength: MAX_TAG_LENGTH,
      });
    }
    normalized.push(tag);
  }
  return normalized;
}
