import { UserRepository } from '../users/infrastructure/persistence/user.repository';
import { DocumentRepository } from '../documents/domain/repositories/document.repository.port';
import { DocumentVersionRepository } from '../documents/domain/repositories/document-version.repository.port';
import { DocumentTagRepository } from '../documents/domain/repositories/document-tag.repository.port';
import { PermissionRepository } from '../permissions/domain/repositories/permission.repository.port';

/**
 * Repositories bound to one open transaction.
 */
export interface TransactionScope {
  users: UserRepository;
  documents: DocumentRepository;
  versions: DocumentVersionRepository;
  tags: DocumentTagRepository;
  permissions: PermissionRepository;
}

/**
 * Runs `work` inside a single database transaction.
 *
 * Everything written through the scope commits together when `work`
 * resolves and rolls back when it rejects. Row locks taken through the
 * scope (findByIdForUpdate) are held until then. Driver failures reach the
 * caller as DomainErrors.
 */
export abstract class UnitOfWork {
  abstract run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T>;
}
