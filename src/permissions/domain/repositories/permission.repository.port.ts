import { NullableType } from '../../../utils/types/nullable.type';
import { Permission } from '../entities/permission.entity';
import { PermissionRole } from '../entities/permission-role.enum';

export type NewPermission = Omit<Permission, 'id' | 'grantedAt'>;

export abstract class PermissionRepository {
  abstract findByDocumentAndUser(
    documentId: string,
    userId: string,
  ): Promise<NullableType<Permission>>;

  /**
   * Every row on the document, newest grant first
   */
  abstract findByDocumentId(documentId: string): Promise<Permission[]>;

  /**
   * Insert a grant. A second row for the same (documentId, userId) surfaces
   * as a Conflict DomainError.
   */
  abstract create(data: NewPermission): Promise<Permission>;

  abstract updateRole(
    id: Permission['id'],
    role: PermissionRole,
  ): Promise<Permission>;

  abstract delete(id: Permission['id']): Promise<void>;
}
