import { NullableType } from '../../../utils/types/nullable.type';
import { PaginationOptions } from '../../../utils/infinity-pagination';
import { Document } from '../entities/document.entity';

export type NewDocument = Pick<
  Document,
  'id' | 'title' | 'description' | 'ownerId' | 'fileType'
>;

export type DocumentPatch = Partial<
  Pick<
    Document,
    'title' | 'description' | 'currentVersionId' | 'isDeleted' | 'deletedAt'
  >
>;

export interface AccessibleDocumentsFilter {
  userId: string;
  ownerId?: string;
  title?: string; // case-insensitive substring
  tags?: string[]; // any-of
  fileType?: string;
}

export abstract class DocumentRepository {
  abstract create(data: NewDocument): Promise<Document>;

  abstract findById(id: Document['id']): Promise<NullableType<Document>>;

  /**
   * Reads the document row and holds its row lock until the surrounding
   * transaction ends. Only valid on a transaction-scoped repository.
   */
  abstract findByIdForUpdate(
    id: Document['id'],
  ): Promise<NullableType<Document>>;

  /**
   * Applies the patch and bumps updatedAt.
   */
  abstract update(id: Document['id'], patch: DocumentPatch): Promise<Document>;

  /**
   * Live documents the user owns or holds any permission on, newest first.
   */
  abstract findAccessible(
    filter: AccessibleDocumentsFilter,
    pagination: PaginationOptions,
  ): Promise<{ data: Document[]; total: number }>;
}
