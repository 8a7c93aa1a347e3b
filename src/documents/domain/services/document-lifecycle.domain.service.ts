import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { UnitOfWork, TransactionScope } from '../../../database/unit-of-work';
import { DocumentRepository } from '../repositories/document.repository.port';
import { DocumentVersionRepository } from '../repositories/document-version.repository.port';
import { DocumentTagRepository } from '../repositories/document-tag.repository.port';
import { BlobStorePort } from '../ports/blob-store.port';
import { Document } from '../entities/document.entity';
import { DocumentVersion } from '../entities/document-version.entity';
import { VersionAllocatorDomainService } from './version-allocator.domain.service';
import { PermissionEngine } from '../../../permissions/domain/services/permission-engine.domain.service';
import { PermissionRole } from '../../../permissions/domain/entities/permission-role.enum';
import { ActivityRecorderService } from '../../../activity/activity-recorder.service';
import { ActivityAction } from '../../../activity/domain/entities/activity-action.enum';
import {
  ClassifiedFile,
  IncomingFile,
  classifyFile,
  normalizeTags,
  normalizeTitle,
  sanitizeFileName,
} from '../utils/file-classifier.util';
import { ConcurrencyLimiter } from '../../../utils/concurrency-limiter';
import { withTimeout } from '../../../utils/with-timeout';
import { DomainError } from '../../../utils/errors/domain-error';
import { NullableType } from '../../../utils/types/nullable.type';
import { Actor } from '../../../utils/actor-extractor.util';

export interface CreateDocumentInput {
  title: string;
  description?: NullableType<string>;
  tags?: string[];
}

export interface UpdateDocumentInput {
  title?: string;
  description?: NullableType<string>;
  tags?: string[];
}

export interface DocumentListFilter {
  ownerId?: string;
  title?: string;
  tags?: string[];
  fileType?: string;
  page?: number;
  limit?: number;
}

export interface DocumentDetails {
  document: Document;
  tags: string[];
  currentVersion: NullableType<DocumentVersion>;
}

export type DocumentSummary = DocumentDetails;

export interface DocumentPage {
  data: DocumentSummary[];
  total: number;
  page: number;
  limit: number;
}

export interface DownloadTarget {
  url: string;
  expiresIn: number;
  versionNumber: number;
  fileName: string;
  mimeType: string;
  fileSize: number;
  checksum: string;
}

/**
 * Document Lifecycle
 *
 * Create, update, version, soft-delete, download and list documents.
 *
 * Uploads write the blob first and the rows second, in one transaction.
 * A failed blob write leaves no rows; a failed transaction leaves an
 * orphaned blob that is logged with its key for out-of-band cleanup.
 * Activity is recorded after commit.
 */
@Injectable()
export class DocumentLifecycleDomainService {
  private readonly logger = new Logger(DocumentLifecycleDomainService.name);
  private readonly blobLimiter: ConcurrencyLimiter;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly documentRepository: DocumentRepository,
    private readonly versionRepository: DocumentVersionRepository,
    private readonly tagRepository: DocumentTagRepository,
    private readonly blobStore: BlobStorePort,
    private readonly versionAllocator: VersionAllocatorDomainService,
    private readonly permissionEngine: PermissionEngine,
    private readonly activityRecorder: ActivityRecorderService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.blobLimiter = new ConcurrencyLimiter(
      this.configService.getOrThrow('documents.maxConcurrentBlobOperations', {
        infer: true,
      }),
      'blob',
    );
  }

  async create(
    owner: Actor,
    input: CreateDocumentInput,
    file: IncomingFile,
  ): Promise<DocumentDetails> {
    const title = normalizeTitle(input.title);
    const tags = normalizeTags(input.tags ?? []);
    const description = this.normalizeDescription(input.description);
    const classified = this.classify(file);

    const documentId = randomUUID();
    const blobKey = this.buildBlobKey(documentId, file.originalName);

    await this.putBlob(blobKey, file, classified);

    const details = await this.commitOrOrphan(blobKey, documentId, (scope) =>
      this.insertDocument(scope, {
        documentId,
        owner,
        title,
        description,
        tags,
        blobKey,
        file,
        classified,
      }),
    );

    this.logger.log(`Created document ${documentId} (version 1)`);
    await this.activityRecorder.record(
      owner.id,
      documentId,
      ActivityAction.UPLOAD,
      {
        versionNumber: 1,
        fileName: file.originalName,
        fileSize: file.size,
        fileType: classified.extension,
      },
      owner,
    );

    return details;
  }

  async updateMetadata(
    documentId: string,
    actor: Actor,
    input: UpdateDocumentInput,
  ): Promise<DocumentDetails> {
    const title =
      input.title !== undefined ? normalizeTitle(input.title) : undefined;
    const tags = input.tags !== undefined ? normalizeTags(input.tags) : undefined;
    const description =
      input.description !== undefined
        ? this.normalizeDescription(input.description)
        : undefined;

    const details = await this.unitOfWork.run(async (scope) => {
      await this.permissionEngine.requireLocked(
        scope,
        documentId,
        actor.id,
        PermissionRole.EDIT,
      );

      const document = await scope.documents.update(documentId, {
        title,
        description,
      });
      if (tags !== undefined) {
        await scope.tags.replace(documentId, tags);
      }

      return this.loadDetails(document, scope);
    });

    const changedFields = [
      title !== undefined ? 'title' : null,
      description !== undefined ? 'description' : null,
      tags !== undefined ? 'tags' : null,
    ].filter((field): field is string => field !== null);

    await this.activityRecorder.record(
      actor.id,
      documentId,
      ActivityAction.UPDATE,
      { fields: changedFields },
      actor,
    );

    return details;
  }

  async uploadNewVersion(
    documentId: string,
    actor: Actor,
    file: IncomingFile,
  ): Promise<DocumentDetails> {
    const classified = this.classify(file);

    // Checked before paying for the blob write; checked again under the lock
    const { document } = await this.permissionEngine.require(
      documentId,
      actor.id,
      PermissionRole.EDIT,
    );
    if (classified.extension !== document.fileType) {
      throw DomainError.invalidInput(
        'File type must match the document file type',
        { expected: document.fileType, received: classified.extension },
      );
    }

    const blobKey = this.buildBlobKey(documentId, file.originalName);
    await this.putBlob(blobKey, file, classified);

    const details = await this.commitOrOrphan(
      blobKey,
      documentId,
      async (scope) => {
        await this.permissionEngine.requireLocked(
          scope,
          documentId,
          actor.id,
          PermissionRole.EDIT,
        );

        const versionNumber = await this.versionAllocator.nextVersionNumber(
          scope,
          documentId,
        );
        const version = await scope.versions.create({
          documentId,
          versionNumber,
          blobKey,
          fileName: file.originalName,
          fileSize: file.size,
          mimeType: classified.mimeType,
          checksum: classified.checksum,
          createdById: actor.id,
        });
        const updated = await scope.documents.update(documentId, {
          currentVersionId: version.id,
        });
        const tags = await scope.tags.findByDocumentIds([documentId]);

        return {
          document: updated,
          tags: tags.map((tag) => tag.tag),
          currentVersion: version,
        };
      },
    );

    const versionNumber = details.currentVersion?.versionNumber;
    this.logger.log(
      `Uploaded version ${versionNumber} of document ${documentId}`,
    );
    await this.activityRecorder.record(
      actor.id,
      documentId,
      ActivityAction.UPLOAD_VERSION,
      { versionNumber, fileName: file.originalName, fileSize: file.size },
      actor,
    );

    return details;
  }

  /**
   * Marks the document deleted. Deleting twice is NotFound, not a no-op.
   * Versions and blobs are kept.
   */
  async softDelete(documentId: string, actor: Actor): Promise<void> {
    await this.unitOfWork.run(async (scope) => {
      await this.permissionEngine.requireLocked(
        scope,
        documentId,
        actor.id,
        PermissionRole.ADMIN,
      );

      await scope.documents.update(documentId, {
        isDeleted: true,
        deletedAt: new Date(),
      });
    });

    this.logger.log(`Soft-deleted document ${documentId}`);
    await this.activityRecorder.record(
      actor.id,
      documentId,
      ActivityAction.DELETE,
      {},
      actor,
    );
  }

  async getDownloadTarget(
    documentId: string,
    actor: Actor,
    versionNumber?: number,
  ): Promise<DownloadTarget> {
    const { document } = await this.permissionEngine.require(
      documentId,
      actor.id,
      PermissionRole.READ,
    );

    const version = await this.resolveVersion(document, versionNumber);
    const expiresIn = this.configService.getOrThrow(
      'documents.presignTtlSeconds',
      { infer: true },
    );

    const url = await this.blobCall('Blob presign', () =>
      this.blobStore.presign(version.blobKey, expiresIn),
    );

    return {
      url,
      expiresIn,
      versionNumber: version.versionNumber,
      fileName: version.fileName,
      mimeType: version.mimeType,
      fileSize: version.fileSize,
      checksum: version.checksum,
    };
  }

  async getDocument(documentId: string, actor: Actor): Promise<DocumentDetails> {
    const { document } = await this.permissionEngine.require(
      documentId,
      actor.id,
      PermissionRole.READ,
      { allowDeletedForOwner: true },
    );
    return this.loadDetails(document);
  }

  async listVersions(
    documentId: string,
    actor: Actor,
  ): Promise<DocumentVersion[]> {
    await this.permissionEngine.require(
      documentId,
      actor.id,
      PermissionRole.READ,
      { allowDeletedForOwner: true },
    );
    return this.versionRepository.findByDocumentId(documentId);
  }

  async list(actor: Actor, filter: DocumentListFilter): Promise<DocumentPage> {
    const defaultPageSize = this.configService.getOrThrow(
      'documents.defaultPageSize',
      { infer: true },
    );
    const maxPageSize = this.configService.getOrThrow('documents.maxPageSize', {
      infer: true,
    });

    const page = Math.max(1, filter.page ?? 1);
    const limit = Math.min(
      Math.max(1, filter.limit ?? defaultPageSize),
      maxPageSize,
    );
    const title = filter.title?.trim();
    const tags = filter.tags ? normalizeTags(filter.tags) : [];
    const fileType = filter.fileType?.trim().replace(/^\./, '').toLowerCase();

    const { data, total } = await this.documentRepository.findAccessible(
      {
        userId: actor.id,
        ownerId: filter.ownerId,
        title: title ? title : undefined,
        tags: tags.length > 0 ? tags : undefined,
        fileType: fileType ? fileType : undefined,
      },
      { page, limit },
    );

    const [tagRows, currentVersions] = await Promise.all([
      this.tagRepository.findByDocumentIds(
        data.map((document) => document.id),
      ),
      this.versionRepository.findByIds(
        data.flatMap((document) =>
          document.currentVersionId ? [document.currentVersionId] : [],
        ),
      ),
    ]);

    return {
      data: data.map((document) => ({
        document,
        tags: tagRows
          .filter((row) => row.documentId === document.id)
          .map((row) => row.tag),
        currentVersion:
          currentVersions.find(
            (version) => version.id === document.currentVersionId,
          ) ?? null,
      })),
      total,
      page,
      limit,
    };
  }

  private async insertDocument(
    scope: TransactionScope,
    params: {
      documentId: string;
      owner: Actor;
      title: string;
      description: NullableType<string>;
      tags: string[];
      blobKey: string;
      file: IncomingFile;
      classified: ClassifiedFile;
    },
  ): Promise<DocumentDetails> {
    const { documentId, owner, file, classified } = params;

    await scope.documents.create({
      id: documentId,
      title: params.title,
      description: params.description,
      ownerId: owner.id,
      fileType: classified.extension,
    });

    const versionNumber = await this.versionAllocator.nextVersionNumber(
      scope,
      documentId,
    );
    const version = await scope.versions.create({
      documentId,
      versionNumber,
      blobKey: params.blobKey,
      fileName: file.originalName,
      fileSize: file.size,
      mimeType: classified.mimeType,
      checksum: classified.checksum,
      createdById: owner.id,
    });

    const document = await scope.documents.update(documentId, {
      currentVersionId: version.id,
    });
    await scope.tags.replace(documentId, params.tags);

    return { document, tags: params.tags, currentVersion: version };
  }

  private async loadDetails(
    document: Document,
    repositories: {
      versions: DocumentVersionRepository;
      tags: DocumentTagRepository;
    } = { versions: this.versionRepository, tags: this.tagRepository },
  ): Promise<DocumentDetails> {
    const [tags, currentVersion] = await Promise.all([
      repositories.tags.findByDocumentIds([document.id]),
      document.currentVersionId
        ? repositories.versions.findById(document.currentVersionId)
        : Promise.resolve(null),
    ]);

    return {
      document,
      tags: tags.map((tag) => tag.tag),
      currentVersion,
    };
  }

  private async resolveVersion(
    document: Document,
    versionNumber?: number,
  ): Promise<DocumentVersion> {
    const version =
      versionNumber !== undefined
        ? await this.versionRepository.findByNumber(document.id, versionNumber)
        : document.currentVersionId
          ? await this.versionRepository.findById(document.currentVersionId)
          : null;

    if (!version) {
      throw DomainError.notFound('Version');
    }
    return version;
  }

  private classify(file: IncomingFile): ClassifiedFile {
    return classifyFile(file, {
      maxFileSizeBytes: this.configService.getOrThrow(
        'documents.maxFileSizeBytes',
        { infer: true },
      ),
      allowedExtensions: this.configService.getOrThrow(
        'documents.allowedExtensions',
        { infer: true },
      ),
    });
  }

  private normalizeDescription(
    description: NullableType<string> | undefined,
  ): NullableType<string> {
    const trimmed = description?.trim();
    return trimmed ? trimmed : null;
  }

  private buildBlobKey(documentId: string, fileName: string): string {
    const prefix = this.configService.getOrThrow('documents.storage.keyPrefix', {
      infer: true,
    });
    return `${prefix}${documentId}/${randomUUID()}/${sanitizeFileName(fileName)}`;
  }

  private async putBlob(
    blobKey: string,
    file: IncomingFile,
    classified: ClassifiedFile,
  ): Promise<void> {
    await this.blobCall('Blob upload', () =>
      this.blobStore.put(blobKey, file.buffer, classified.mimeType),
    );
  }

  /**
   * Runs a blob store call under the concurrency cap and the configured
   * timeout. Every failure reaches the caller as StorageUnavailable.
   */
  private async blobCall<T>(
    description: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    const timeoutMs = this.configService.getOrThrow('documents.blobTimeoutMs', {
      infer: true,
    });

    try {
      return await withTimeout(
        this.blobLimiter.run(operation),
        timeoutMs,
        description,
      );
    } catch (error) {
      if (DomainError.is(error)) {
        this.logger.warn(`${description} failed: ${error.message}`);
        throw error;
      }
      this.logger.error(
        `${description} failed`,
        error instanceof Error ? error.stack : String(error),
      );
      throw DomainError.storageUnavailable(`${description} failed`);
    }
  }

  private async commitOrOrphan<T>(
    blobKey: string,
    documentId: string,
    work: (scope: TransactionScope) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.unitOfWork.run(work);
    } catch (error) {
      this.logger.warn(
        `Orphaned blob ${blobKey}: transaction for document ${documentId} failed`,
      );
      throw error;
    }
  }
}
