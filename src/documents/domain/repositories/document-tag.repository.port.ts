import { DocumentTag } from '../entities/document-tag.entity';

export abstract class DocumentTagRepository {
  abstract findByDocumentIds(documentIds: string[]): Promise<DocumentTag[]>;

  /**
   * Replaces the document's whole tag set. Tags must already be normalised.
   */
  abstract replace(documentId: string, tags: string[]): Promise<void>;
}
