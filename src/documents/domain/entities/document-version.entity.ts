/**
 * Immutable snapshot of a document's content. Never updated or removed,
 * including after the document is soft-deleted.
 */
export interface DocumentVersion {
  id: string;
  documentId: string;
  versionNumber: number; // 1-based, contiguous per document
  blobKey: string;
  fileName: string;
  fileSize: number;
  mimeType: string;
  checksum: string; // SHA-256 hex of the stored bytes
  createdById: string;
  createdAt: Date;
}
