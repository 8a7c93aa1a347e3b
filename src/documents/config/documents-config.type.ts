export type DocumentsConfig = {
  maxFileSizeBytes: number;
  allowedExtensions: string[]; // lower-case, without the leading dot
  presignTtlSeconds: number;
  blobTimeoutMs: number;
  maxConcurrentBlobOperations: number;
  defaultPageSize: number;
  maxPageSize: number;
  storage: {
    bucket: string;
    keyPrefix: string;
  };
};
