import { Document } from '../../../../domain/entities/document.entity';
import { DocumentVersion } from '../../../../domain/entities/document-version.entity';
import { DocumentTag } from '../../../../domain/entities/document-tag.entity';
import { DocumentEntity } from '../entities/document.entity';
import { DocumentVersionEntity } from '../entities/document-version.entity';
import { DocumentTagEntity } from '../entities/document-tag.entity';

export class DocumentMapper {
  static toDomain(entity: DocumentEntity): Document {
    return {
      id: entity.id,
      title: entity.title,
      description: entity.description ?? null,
      ownerId: entity.ownerId,
      currentVersionId: entity.currentVersionId ?? null,
      fileType: entity.fileType,
      isDeleted: entity.isDeleted,
      deletedAt: entity.deletedAt ?? null,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static versionToDomain(entity: DocumentVersionEntity): DocumentVersion {
    return {
      id: entity.id,
      documentId: entity.documentId,
      versionNumber: entity.versionNumber,
      blobKey: entity.blobKey,
      fileName: entity.fileName,
      fileSize: entity.fileSize,
      mimeType: entity.mimeType,
      checksum: entity.checksum,
      createdById: entity.createdById,
      createdAt: entity.createdAt,
    };
  }

  static tagToDomain(entity: DocumentTagEntity): DocumentTag {
    return {
      id: entity.id,
      documentId: entity.documentId,
      tag: entity.tag,
    };
  }
}
