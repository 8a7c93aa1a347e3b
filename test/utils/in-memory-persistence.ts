import { DynamicModule, Global, Module } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { TransactionScope, UnitOfWork } from '../../src/database/unit-of-work';
import { User } from '../../src/users/domain/user';
import {
  NewUser,
  UserRepository,
} from '../../src/users/infrastructure/persistence/user.repository';
import { Document } from '../../src/documents/domain/entities/document.entity';
import { DocumentVersion } from '../../src/documents/domain/entities/document-version.entity';
import { DocumentTag } from '../../src/documents/domain/entities/document-tag.entity';
import {
  AccessibleDocumentsFilter,
  DocumentPatch,
  DocumentRepository,
  NewDocument,
} from '../../src/documents/domain/repositories/document.repository.port';
import {
  DocumentVersionRepository,
  NewDocumentVersion,
} from '../../src/documents/domain/repositories/document-version.repository.port';
import { DocumentTagRepository } from '../../src/documents/domain/repositories/document-tag.repository.port';
import { Permission } from '../../src/permissions/domain/entities/permission.entity';
import { PermissionRole } from '../../src/permissions/domain/entities/permission-role.enum';
import {
  NewPermission,
  PermissionRepository,
} from '../../src/permissions/domain/repositories/permission.repository.port';
import { ActivityLogEntry } from '../../src/activity/domain/entities/activity-log-entry.entity';
import {
  ActivityLogRepository,
  NewActivityLogEntry,
} from '../../src/activity/domain/repositories/activity-log.repository.port';
import { PaginationOptions } from '../../src/utils/infinity-pagination';
import { NullableType } from '../../src/utils/types/nullable.type';
import { DomainError, ErrorKind } from '../../src/utils/errors/domain-error';

/**
 * Per-key mutex standing in for `SELECT ... FOR UPDATE` row locks.
 */
class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}

class InMemoryTransaction {
  readonly undo: Array<() => void> = [];
  readonly releases: Array<() => void> = [];
  readonly heldLocks = new Set<string>();
}

/**
 * Process-local replacement for the PostgreSQL schema: same unique
 * constraints, row locks and rollback, no isolation beyond that.
 */
export class InMemoryStore {
  readonly users = new Map<string, User>();
  readonly documents = new Map<string, Document>();
  readonly versions = new Map<string, DocumentVersion>();
  readonly tags = new Map<string, DocumentTag>();
  readonly permissions = new Map<string, Permission>();
  readonly activity = new Map<string, ActivityLogEntry>();
  readonly locks = new KeyedMutex();

  private lastTimestamp = 0;

  // Strictly increasing, so "newest first" orderings are deterministic
  now(): Date {
    this.lastTimestamp = Math.max(Date.now(), this.lastTimestamp + 1);
    return new Date(this.lastTimestamp);
  }
}

function put<T>(
  table: Map<string, T>,
  id: string,
  row: T,
  tx: InMemoryTransaction | null,
): void {
  const previous = table.get(id);
  table.set(id, row);
  tx?.undo.push(() => {
    if (previous === undefined) {
      table.delete(id);
    } else {
      table.set(id, previous);
    }
  });
}

function remove<T>(
  table: Map<string, T>,
  id: string,
  tx: InMemoryTransaction | null,
): void {
  const previous = table.get(id);
  if (previous === undefined) {
    return;
  }
  table.delete(id);
  tx?.undo.push(() => table.set(id, previous));
}

function page<T>(rows: T[], pagination: PaginationOptions): T[] {
  const offset = (pagination.page - 1) * pagination.limit;
  return rows.slice(offset, offset + pagination.limit);
}

// Same error translateDriverError produces for a unique violation
function duplicate(constraint: string): DomainError {
  return new DomainError(ErrorKind.Conflict, 'Record already exists', {
    constraint,
  });
}

export class InMemoryUserRepository implements UserRepository {
  constructor(
    private readonly store: InMemoryStore,
    private readonly tx: InMemoryTransaction | null = null,
  ) {}

  async create(data: NewUser): Promise<User> {
    for (const user of this.store.users.values()) {
      if (user.email === data.email) {
        throw duplicate('IDX_users_email');
      }
    }
    const now = this.store.now();
    const user: User = {
      ...data,
      id: randomUUID(),
      isActive: true,
      lastLoginAt: null,
      createdAt: now,
      updatedAt: now,
    };
    put(this.store.users, user.id, user, this.tx);
    return { ...user };
  }

  async findById(id: User['id']): Promise<NullableType<User>> {
    const user = this.store.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: User['email']): Promise<NullableType<User>> {
    for (const user of this.store.users.values()) {
      if (user.email === email) {
        return { ...user };
      }
    }
    return null;
  }

  async update(
    id: User['id'],
    payload: Partial<Pick<User, 'isActive' | 'lastLoginAt'>>,
  ): Promise<NullableType<User>> {
    const existing = this.store.users.get(id);
    if (!existing) {
      return null;
    }
    const user: User = { ...existing, ...payload, updatedAt: this.store.now() };
    put(this.store.users, id, user, this.tx);
    return { ...user };
  }
}

export class InMemoryDocumentRepository implements DocumentRepository {
  constructor(
    private readonly store: InMemoryStore,
    private readonly tx: InMemoryTransaction | null = null,
  ) {}

  async create(data: NewDocument): Promise<Document> {
    if (this.store.documents.has(data.id)) {
      throw duplicate('PK_documents');
    }
    const now = this.store.now();
    const document: Document = {
      ...data,
      currentVersionId: null,
      isDeleted: false,
      deletedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    put(this.store.documents, document.id, document, this.tx);
    return { ...document };
  }

  async findById(id: Document['id']): Promise<NullableType<Document>> {
    const document = this.store.documents.get(id);
    return document ? { ...document } : null;
  }

  async findByIdForUpdate(id: Document['id']): Promise<NullableType<Document>> {
    const lockKey = `document:${id}`;
    if (this.tx && !this.tx.heldLocks.has(lockKey)) {
      const release = await this.store.locks.acquire(lockKey);
      this.tx.heldLocks.add(lockKey);
      this.tx.releases.push(release);
    }
    return this.findById(id);
  }

  async update(id: Document['id'], patch: DocumentPatch): Promise<Document> {
    const existing = this.store.documents.get(id);
    if (!existing) {
      throw DomainError.notFound('Document');
    }
    const document: Document = {
      ...existing,
      title: patch.title ?? existing.title,
      description:
        patch.description !== undefined
          ? patch.description
          : existing.description,
      currentVersionId:
        patch.currentVersionId !== undefined
          ? patch.currentVersionId
          : existing.currentVersionId,
      isDeleted: patch.isDeleted ?? existing.isDeleted,
      deletedAt:
        patch.deletedAt !== undefined ? patch.deletedAt : existing.deletedAt,
      updatedAt: this.store.now(),
    };
    put(this.store.documents, id, document, this.tx);
    return { ...document };
  }

  async findAccessible(
    filter: AccessibleDocumentsFilter,
    pagination: PaginationOptions,
  ): Promise<{ data: Document[]; total: number }> {
    const permissions = [...this.store.permissions.values()];
    const tags = [...this.store.tags.values()];
    const title = filter.title?.toLowerCase();

    const matching = [...this.store.documents.values()]
      .filter((document) => !document.isDeleted)
      .filter(
        (document) =>
          document.ownerId === filter.userId ||
          permissions.some(
            (permission) =>
              permission.documentId === document.id &&
              permission.userId === filter.userId,
          ),
      )
      .filter(
        (document) =>
          filter.ownerId === undefined || document.ownerId === filter.ownerId,
      )
      .filter(
        (document) =>
          title === undefined || document.title.toLowerCase().includes(title),
      )
      .filter(
        (document) =>
          filter.fileType === undefined ||
          document.fileType === filter.fileType,
      )
      .filter(
        (document) =>
          filter.tags === undefined ||
          tags.some(
            (tag) =>
              tag.documentId === document.id &&
              (filter.tags ?? []).includes(tag.tag),
          ),
      )
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          b.id.localeCompare(a.id),
      );

    return {
      data: page(matching, pagination).map((document) => ({ ...document })),
      total: matching.length,
    };
  }
}

export class InMemoryDocumentVersionRepository
  implements DocumentVersionRepository
{
  constructor(
    private readonly store: InMemoryStore,
    private readonly tx: InMemoryTransaction | null = null,
  ) {}

  async create(data: NewDocumentVersion): Promise<DocumentVersion> {
    for (const version of this.store.versions.values()) {
      if (
        version.documentId === data.documentId &&
        version.versionNumber === data.versionNumber
      ) {
        throw duplicate('UQ_document_versions_document_version');
      }
    }
    const version: DocumentVersion = {
      ...data,
      id: randomUUID(),
      createdAt: this.store.now(),
    };
    put(this.store.versions, version.id, version, this.tx);
    return { ...version };
  }

  async findById(
    id: DocumentVersion['id'],
  ): Promise<NullableType<DocumentVersion>> {
    const version = this.store.versions.get(id);
    return version ? { ...version } : null;
  }

  async findByIds(ids: DocumentVersion['id'][]): Promise<DocumentVersion[]> {
    return [...this.store.versions.values()]
      .filter((version) => ids.includes(version.id))
      .map((version) => ({ ...version }));
  }

  async findByNumber(
    documentId: string,
    versionNumber: number,
  ): Promise<NullableType<DocumentVersion>> {
    const version = [...this.store.versions.values()].find(
      (row) =>
        row.documentId === documentId && row.versionNumber === versionNumber,
    );
    return version ? { ...version } : null;
  }

  async findByDocumentId(documentId: string): Promise<DocumentVersion[]> {
    return [...this.store.versions.values()]
      .filter((version) => version.documentId === documentId)
      .sort((a, b) => b.versionNumber - a.versionNumber)
      .map((version) => ({ ...version }));
  }

  async findMaxVersionNumber(documentId: string): Promise<number> {
    return [...this.store.versions.values()]
      .filter((version) => version.documentId === documentId)
      .reduce((max, version) => Math.max(max, version.versionNumber), 0);
  }
}

export class InMemoryDocumentTagRepository implements DocumentTagRepository {
  constructor(
    private readonly store: InMemoryStore,
    private readonly tx: InMemoryTransaction | null = null,
  ) {}

  async findByDocumentIds(documentIds: string[]): Promise<DocumentTag[]> {
    return [...this.store.tags.values()]
      .filter((tag) => documentIds.includes(tag.documentId))
      .map((tag) => ({ ...tag }));
  }

  async replace(documentId: string, tags: string[]): Promise<void> {
    for (const [id, tag] of [...this.store.tags.entries()]) {
      if (tag.documentId === documentId) {
        remove(this.store.tags, id, this.tx);
      }
    }
    for (const value of tags) {
      const row: DocumentTag = { id: randomUUID(), documentId, tag: value };
      put(this.store.tags, row.id, row, this.tx);
    }
  }
}

export class InMemoryPermissionRepository implements PermissionRepository {
  constructor(
    private readonly store: InMemoryStore,
    private readonly tx: InMemoryTransaction | null = null,
  ) {}

  async findByDocumentAndUser(
    documentId: string,
    userId: string,
  ): Promise<NullableType<Permission>> {
    const permission = [...this.store.permissions.values()].find(
      (row) => row.documentId === documentId && row.userId === userId,
    );
    return permission ? { ...permission } : null;
  }

  async findByDocumentId(documentId: string): Promise<Permission[]> {
    return [...this.store.permissions.values()]
      .filter((permission) => permission.documentId === documentId)
      .sort((a, b) => b.grantedAt.getTime() - a.grantedAt.getTime())
      .map((permission) => ({ ...permission }));
  }

  async create(data: NewPermission): Promise<Permission> {
    if (await this.findByDocumentAndUser(data.documentId, data.userId)) {
      throw duplicate('UQ_document_permissions_document_user');
    }
    const permission: Permission = {
      ...data,
      id: randomUUID(),
      grantedAt: this.store.now(),
    };
    put(this.store.permissions, permission.id, permission, this.tx);
    return { ...permission };
  }

  async updateRole(
    id: Permission['id'],
    role: PermissionRole,
  ): Promise<Permission> {
    const existing = this.store.permissions.get(id);
    if (!existing) {
      throw DomainError.notFound('Permission');
    }
    const permission: Permission = { ...existing, role };
    put(this.store.permissions, id, permission, this.tx);
    return { ...permission };
  }

  async delete(id: Permission['id']): Promise<void> {
    remove(this.store.permissions, id, this.tx);
  }
}

export class InMemoryActivityLogRepository implements ActivityLogRepository {
  constructor(private readonly store: InMemoryStore) {}

  async create(data: NewActivityLogEntry): Promise<ActivityLogEntry> {
    const entry: ActivityLogEntry = {
      ...data,
      id: randomUUID(),
      createdAt: this.store.now(),
    };
    this.store.activity.set(entry.id, entry);
    return { ...entry };
  }

  async findByDocumentId(
    documentId: string,
    pagination: PaginationOptions,
  ): Promise<{ data: ActivityLogEntry[]; total: number }> {
    const entries = [...this.store.activity.values()]
      .filter((entry) => entry.documentId === documentId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return {
      data: page(entries, pagination).map((entry) => ({ ...entry })),
      total: entries.length,
    };
  }
}

export class InMemoryUnitOfWork implements UnitOfWork {
  constructor(private readonly store: InMemoryStore) {}

  async run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    const tx = new InMemoryTransaction();
    const scope: TransactionScope = {
      users: new InMemoryUserRepository(this.store, tx),
      documents: new InMemoryDocumentRepository(this.store, tx),
      versions: new InMemoryDocumentVersionRepository(this.store, tx),
      tags: new InMemoryDocumentTagRepository(this.store, tx),
      permissions: new InMemoryPermissionRepository(this.store, tx),
    };

    try {
      return await work(scope);
    } catch (error) {
      for (const undo of [...tx.undo].reverse()) {
        undo();
      }
      throw error;
    } finally {
      for (const release of tx.releases) {
        release();
      }
    }
  }
}

/**
 * Drop-in for RelationalPersistenceModule backed by an InMemoryStore.
 */
@Global()
@Module({})
export class InMemoryPersistenceModule {
  static forStore(store: InMemoryStore): DynamicModule {
    const providers = [
      { provide: InMemoryStore, useValue: store },
      { provide: UserRepository, useValue: new InMemoryUserRepository(store) },
      {
        provide: DocumentRepository,
        useValue: new InMemoryDocumentRepository(store),
      },
      {
        provide: DocumentVersionRepository,
        useValue: new InMemoryDocumentVersionRepository(store),
      },
      {
        provide: DocumentTagRepository,
        useValue: new InMemoryDocumentTagRepository(store),
      },
      {
        provide: PermissionRepository,
        useValue: new InMemoryPermissionRepository(store),
      },
      {
        provide: ActivityLogRepository,
        useValue: new InMemoryActivityLogRepository(store),
      },
      { provide: UnitOfWork, useValue: new InMemoryUnitOfWork(store) },
    ];

    return {
      module: InMemoryPersistenceModule,
      global: true,
      providers,
      exports: providers.map((provider) => provider.provide),
    };
  }
}
