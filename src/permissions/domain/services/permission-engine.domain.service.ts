import { Injectable, Logger } from '@nestjs/common';
import { PermissionRepository } from '../repositories/permission.repository.port';
import { Permission } from '../entities/permission.entity';
import { PermissionRole, roleSatisfies } from '../entities/permission-role.enum';
import { Document } from '../../../documents/domain/entities/document.entity';
import { DocumentRepository } from '../../../documents/domain/repositories/document.repository.port';
import { TransactionScope, UnitOfWork } from '../../../database/unit-of-work';
import { ActivityRecorderService } from '../../../activity/activity-recorder.service';
import { ActivityAction } from '../../../activity/domain/entities/activity-action.enum';
import { DomainError } from '../../../utils/errors/domain-error';
import { NullableType } from '../../../utils/types/nullable.type';
import { Actor } from '../../../utils/actor-extractor.util';

export interface RequireOptions {
  /**
   * Let the owner through on a soft-deleted document. Only owner/audit
   * reads set this.
   */
  allowDeletedForOwner?: boolean;
}

export interface AuthorizedDocument {
  document: Document;
  role: PermissionRole;
}

/**
 * One line of a document's access list. The owner's line is synthesised
 * (`implicit: true`) and has no backing row.
 */
export interface PermissionEntry {
  id: NullableType<string>;
  documentId: string;
  userId: string;
  role: PermissionRole;
  implicit: boolean;
  grantedById: NullableType<string>;
  grantedAt: Date;
}

/**
 * Permission Engine
 *
 * Decides who may act on a document and manages explicit grants.
 *
 * Rules:
 * - The owner always holds ADMIN; no row represents it and no grant,
 *   update or revoke can target it.
 * - Everyone else holds the role of their single Permission row, or none.
 * - Missing and soft-deleted documents are NotFound; a live document with
 *   an insufficient role is Forbidden.
 * - Grant mutations run in one transaction holding the document row lock,
 *   so they serialise with soft-delete and version uploads.
 */
@Injectable()
export class PermissionEngine {
  private readonly logger = new Logger(PermissionEngine.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly documentRepository: DocumentRepository,
    private readonly permissionRepository: PermissionRepository,
    private readonly activityRecorder: ActivityRecorderService,
  ) {}

  async effectiveRole(
    document: Document,
    userId: string,
    permissions: PermissionRepository = this.permissionRepository,
  ): Promise<PermissionRole | null> {
    if (document.ownerId === userId) {
      return PermissionRole.ADMIN;
    }

    const permission = await permissions.findByDocumentAndUser(
      document.id,
      userId,
    );
    return permission ? permission.role : null;
  }

  async require(
    documentId: string,
    userId: string,
    minimumRole: PermissionRole,
    options: RequireOptions = {},
  ): Promise<AuthorizedDocument> {
    const document = await this.documentRepository.findById(documentId);
    return this.authorize(
      document,
      userId,
      minimumRole,
      this.permissionRepository,
      options,
    );
  }

  /**
   * Same checks as `require`, made inside `scope` after taking the
   * document row lock.
   */
  async requireLocked(
    scope: TransactionScope,
    documentId: string,
    userId: string,
    minimumRole: PermissionRole,
  ): Promise<AuthorizedDocument> {
    const document = await scope.documents.findByIdForUpdate(documentId);
    return this.authorize(document, userId, minimumRole, scope.permissions);
  }

  async grant(
    documentId: string,
    grantor: Actor,
    targetUserId: string,
    role: PermissionRole,
  ): Promise<Permission> {
    const permission = await this.unitOfWork.run(async (scope) => {
      const { document } = await this.requireLocked(
        scope,
        documentId,
        grantor.id,
        PermissionRole.ADMIN,
      );

      if (targetUserId === grantor.id) {
        throw DomainError.conflict('Cannot share a document with yourself');
      }
      if (targetUserId === document.ownerId) {
        throw DomainError.conflict(
          'The document owner already holds ADMIN implicitly',
        );
      }

      const target = await scope.users.findById(targetUserId);
      if (!target || !target.isActive) {
        throw DomainError.notFound('User');
      }

      const existing = await scope.permissions.findByDocumentAndUser(
        documentId,
        targetUserId,
      );
      if (existing) {
        throw DomainError.conflict(
          'User already has a permission on this document',
        );
      }

      return scope.permissions.create({
        documentId,
        userId: targetUserId,
        role,
        grantedById: grantor.id,
      });
    });

    this.logger.log(
      `Granted ${role} on document ${documentId} to user ${targetUserId}`,
    );
    await this.activityRecorder.record(
      grantor.id,
      documentId,
      ActivityAction.GRANT,
      { targetUserId, role },
      grantor,
    );

    return permission;
  }

  async updateRole(
    documentId: string,
    actor: Actor,
    targetUserId: string,
    newRole: PermissionRole,
  ): Promise<Permission> {
    const { previousRole, permission } = await this.unitOfWork.run(
      async (scope) => {
        const { document } = await this.requireLocked(
          scope,
          documentId,
          actor.id,
          PermissionRole.ADMIN,
        );

        if (targetUserId === document.ownerId) {
          throw DomainError.forbidden("The owner's role cannot be changed");
        }

        const existing = await scope.permissions.findByDocumentAndUser(
          documentId,
          targetUserId,
        );
        if (!existing) {
          throw DomainError.notFound('Permission');
        }

        return {
          previousRole: existing.role,
          permission: await scope.permissions.updateRole(existing.id, newRole),
        };
      },
    );

    await this.activityRecorder.record(
      actor.id,
      documentId,
      ActivityAction.PERMISSION_UPDATE,
      { targetUserId, previousRole, role: newRole },
      actor,
    );

    return permission;
  }

  async revoke(
    documentId: string,
    actor: Actor,
    targetUserId: string,
  ): Promise<void> {
    const revoked = await this.unitOfWork.run(async (scope) => {
      const { document } = await this.requireLocked(
        scope,
        documentId,
        actor.id,
        PermissionRole.ADMIN,
      );

      if (targetUserId === document.ownerId) {
        throw DomainError.forbidden("The owner's access cannot be revoked");
      }

      const existing = await scope.permissions.findByDocumentAndUser(
        documentId,
        targetUserId,
      );
      if (!existing) {
        throw DomainError.notFound('Permission');
      }

      await scope.permissions.delete(existing.id);
      return existing;
    });

    this.logger.log(
      `Revoked ${revoked.role} on document ${documentId} from user ${targetUserId}`,
    );
    await this.activityRecorder.record(
      actor.id,
      documentId,
      ActivityAction.REVOKE,
      { targetUserId, role: revoked.role },
      actor,
    );
  }

  /**
   * Owner entry first, then explicit grants newest first. The owner can
   * still read the grants of a soft-deleted document.
   */
  async list(documentId: string, actor: Actor): Promise<PermissionEntry[]> {
    const { document } = await this.require(
      documentId,
      actor.id,
      PermissionRole.READ,
      { allowDeletedForOwner: true },
    );

    const permissions =
      await this.permissionRepository.findByDocumentId(documentId);

    const ownerEntry: PermissionEntry = {
      id: null,
      documentId,
      userId: document.ownerId,
      role: PermissionRole.ADMIN,
      implicit: true,
      grantedById: null,
      grantedAt: document.createdAt,
    };

    return [
      ownerEntry,
      ...permissions.map((permission) => ({
        id: permission.id,
        documentId: permission.documentId,
        userId: permission.userId,
        role: permission.role,
        implicit: false,
        grantedById: permission.grantedById,
        grantedAt: permission.grantedAt,
      })),
    ];
  }

  private async authorize(
    document: NullableType<Document>,
    userId: string,
    minimumRole: PermissionRole,
    permissions: PermissionRepository,
    options: RequireOptions = {},
  ): Promise<AuthorizedDocument> {
    if (!document) {
      throw DomainError.notFound('Document');
    }

    if (document.isDeleted) {
      const ownerRead =
        options.allowDeletedForOwner === true && document.ownerId === userId;
      if (!ownerRead) {
        throw DomainError.notFound('Document');
      }
    }

    const role = await this.effectiveRole(document, userId, permissions);
    if (role === null || !roleSatisfies(role, minimumRole)) {
      throw DomainError.forbidden(
        `${minimumRole} access to this document is required`,
      );
    }

    return { document, role };
  }
}
