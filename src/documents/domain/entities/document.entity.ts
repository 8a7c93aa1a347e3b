import { NullableType } from '../../../utils/types/nullable.type';

/**
 * A logical file owned by one user. Content lives in immutable
 * DocumentVersions; the document row only carries metadata and a pointer
 * to the current version.
 */
export interface Document {
  id: string;
  title: string;
  description: NullableType<string>;
  ownerId: string; // immutable after creation
  currentVersionId: NullableType<string>;
  fileType: string; // lower-case extension shared by every version
  isDeleted: boolean;
  deletedAt: NullableType<Date>;
  createdAt: Date;
  updatedAt: Date;
}
