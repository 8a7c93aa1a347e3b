import { NullableType } from '../../../utils/types/nullable.type';
import { DocumentVersion } from '../entities/document-version.entity';

export type NewDocumentVersion = Omit<DocumentVersion, 'id' | 'createdAt'>;

export abstract class DocumentVersionRepository {
  /**
   * Insert a version. A duplicate (documentId, versionNumber) surfaces as
   * a Conflict DomainError.
   */
  abstract create(data: NewDocumentVersion): Promise<DocumentVersion>;

  abstract findById(
    id: DocumentVersion['id'],
  ): Promise<NullableType<DocumentVersion>>;

  abstract findByIds(ids: DocumentVersion['id'][]): Promise<DocumentVersion[]>;

  abstract findByNumber(
    documentId: string,
    versionNumber: number,
  ): Promise<NullableType<DocumentVersion>>;

  /**
   * All versions of a document, highest number first
   */
  abstract findByDocumentId(documentId: string): Promise<DocumentVersion[]>;

  /**
   * Highest allocated version number, 0 when the document has none
   */
  abstract findMaxVersionNumber(documentId: string): Promise<number>;
}
