import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { DocumentsConfig } from './documents-config.type';

export const DEFAULT_ALLOWED_EXTENSIONS = [
  'pdf',
  'doc',
  'docx',
  'txt',
  'md',
  'xls',
  'xlsx',
  'ppt',
  'pptx',
  'jpg',
  'jpeg',
  'png',
  'gif',
  'zip',
];

class EnvironmentVariablesValidator {
  @IsString()
  DOCUMENTS_STORAGE_BUCKET!: string;

  @IsString()
  @IsOptional()
  DOCUMENTS_STORAGE_KEY_PREFIX?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  DOCUMENTS_MAX_FILE_SIZE_BYTES?: number;

  @IsString()
  @IsOptional()
  DOCUMENTS_ALLOWED_EXTENSIONS?: string;

  @IsInt()
  @Min(1)
  @Max(604800) // v4 signed URLs are capped at 7 days
  @IsOptional()
  DOCUMENTS_PRESIGN_TTL_SECONDS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  DOCUMENTS_BLOB_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  DOCUMENTS_MAX_CONCURRENT_BLOB_OPERATIONS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  DOCUMENTS_DEFAULT_PAGE_SIZE?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  DOCUMENTS_MAX_PAGE_SIZE?: number;
}

function parseInteger(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

function parseExtensions(value: string | undefined): string[] {
  if (!value) {
    return DEFAULT_ALLOWED_EXTENSIONS;
  }
  return value
    .split(',')
    .map((extension) => extension.trim().replace(/^\./, '').toLowerCase())
    .filter((extension) => extension.length > 0);
}

export default registerAs<DocumentsConfig>('documents', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    maxFileSizeBytes: parseInteger(
      process.env.DOCUMENTS_MAX_FILE_SIZE_BYTES,
      100 * 1024 * 1024,
    ),
    allowedExtensions: parseExtensions(process.env.DOCUMENTS_ALLOWED_EXTENSIONS),
    presignTtlSeconds: parseInteger(
      process.env.DOCUMENTS_PRESIGN_TTL_SECONDS,
      3600,
    ),
    blobTimeoutMs: parseInteger(process.env.DOCUMENTS_BLOB_TIMEOUT_MS, 30000),
    maxConcurrentBlobOperations: parseInteger(
      process.env.DOCUMENTS_MAX_CONCURRENT_BLOB_OPERATIONS,
      32,
    ),
    defaultPageSize: parseInteger(process.env.DOCUMENTS_DEFAULT_PAGE_SIZE, 20),
    maxPageSize: parseInteger(process.env.DOCUMENTS_MAX_PAGE_SIZE, 100),
    storage: {
      bucket: validated.DOCUMENTS_STORAGE_BUCKET,
      keyPrefix: process.env.DOCUMENTS_STORAGE_KEY_PREFIX ?? 'documents/',
    },
  };
});
