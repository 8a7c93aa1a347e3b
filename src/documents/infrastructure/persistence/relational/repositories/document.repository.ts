import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DocumentEntity } from '../entities/document.entity';
import { DocumentTagEntity } from '../entities/document-tag.entity';
import { DocumentMapper } from '../mappers/document.mapper';
import {
  AccessibleDocumentsFilter,
  DocumentPatch,
  DocumentRepository,
  NewDocument,
} from '../../../../domain/repositories/document.repository.port';
import { Document } from '../../../../domain/entities/document.entity';
import { PermissionEntity } from '../../../../../permissions/infrastructure/persistence/relational/entities/permission.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { PaginationOptions } from '../../../../../utils/infinity-pagination';
import { DomainError } from '../../../../../utils/errors/domain-error';
import { guardQuery } from '../../../../../database/translate-driver-error';

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (character) => `\\${character}`);
}

@Injectable()
export class DocumentRelationalRepository implements DocumentRepository {
  constructor(
    @InjectRepository(DocumentEntity)
    private readonly documentsRepository: Repository<DocumentEntity>,
  ) {}

  async create(data: NewDocument): Promise<Document> {
    return guardQuery(async () => {
      const entity = await this.documentsRepository.save(
        this.documentsRepository.create({
          ...data,
          currentVersionId: null,
          isDeleted: false,
          deletedAt: null,
        }),
      );
      return DocumentMapper.toDomain(entity);
    });
  }

  async findById(id: Document['id']): Promise<NullableType<Document>> {
    return guardQuery(async () => {
      const entity = await this.documentsRepository.findOne({ where: { id } });
      return entity ? DocumentMapper.toDomain(entity) : null;
    });
  }

  async findByIdForUpdate(id: Document['id']): Promise<NullableType<Document>> {
    return guardQuery(async () => {
      const entity = await this.documentsRepository.findOne({
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });
      return entity ? DocumentMapper.toDomain(entity) : null;
    });
  }

  async update(id: Document['id'], patch: DocumentPatch): Promise<Document> {
    return guardQuery(async () => {
      const values: DocumentPatch = {};
      if (patch.title !== undefined) values.title = patch.title;
      if (patch.description !== undefined) {
        values.description = patch.description;
      }
      if (patch.currentVersionId !== undefined) {
        values.currentVersionId = patch.currentVersionId;
      }
      if (patch.isDeleted !== undefined) values.isDeleted = patch.isDeleted;
      if (patch.deletedAt !== undefined) values.deletedAt = patch.deletedAt;

      await this.documentsRepository.update(id, {
        ...values,
        updatedAt: new Date(),
      });

      const entity = await this.documentsRepository.findOne({ where: { id } });
      if (!entity) {
        throw DomainError.notFound('Document');
      }
      return DocumentMapper.toDomain(entity);
    });
  }

  async findAccessible(
    filter: AccessibleDocumentsFilter,
    pagination: PaginationOptions,
  ): Promise<{ data: Document[]; total: number }> {
    return guardQuery(async () => {
      const query = this.documentsRepository
        .createQueryBuilder('document')
        .leftJoin(
          PermissionEntity,
          'permission',
          'permission.documentId = document.id AND permission.userId = :userId',
        )
        .where('document.isDeleted = :isDeleted', { isDeleted: false })
        .andWhere('(document.ownerId = :userId OR permission.id IS NOT NULL)')
        .setParameter('userId', filter.userId);

      if (filter.ownerId) {
        query.andWhere('document.ownerId = :ownerId', {
          ownerId: filter.ownerId,
        });
      }

      if (filter.title) {
        query.andWhere('document.title ILIKE :title', {
          title: `%${escapeLikePattern(filter.title)}%`,
        });
      }

      if (filter.fileType) {
        query.andWhere('document.fileType = :fileType', {
          fileType: filter.fileType,
        });
      }

      if (filter.tags && filter.tags.length > 0) {
        query
          .andWhere((qb) => {
            const tagged = qb
              .subQuery()
              .select('1')
              .from(DocumentTagEntity, 'tag')
              .where('tag.documentId = document.id')
              .andWhere('tag.tag IN (:...tags)')
              .getQuery();
            return `EXISTS ${tagged}`;
          })
          .setParameter('tags', filter.tags);
      }

      const [entities, total] = await query
        .orderBy('document.createdAt', 'DESC')
        .addOrderBy('document.id', 'DESC')
        .offset((pagination.page - 1) * pagination.limit)
        .limit(pagination.limit)
        .getManyAndCount();

      return {
        data: entities.map((entity) => DocumentMapper.toDomain(entity)),
        total,
      };
    });
  }
}
