import { PermissionRole } from './permission-role.enum';

/**
 * Explicit grant of a role on a document to a non-owner user.
 *
 * At most one row exists per (documentId, userId). The owner never has a
 * row: ownership alone implies ADMIN.
 */
export interface Permission {
  id: string;
  documentId: string;
  userId: string;
  role: PermissionRole;
  grantedById: string;
  grantedAt: Date;
}
