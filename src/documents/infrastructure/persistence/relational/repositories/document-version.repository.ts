import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { DocumentVersionEntity } from '../entities/document-version.entity';
import { DocumentMapper } from '../mappers/document.mapper';
import {
  DocumentVersionRepository,
  NewDocumentVersion,
} from '../../../../domain/repositories/document-version.repository.port';
import { DocumentVersion } from '../../../../domain/entities/document-version.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { guardQuery } from '../../../../../database/translate-driver-error';

@Injectable()
export class DocumentVersionRelationalRepository
  implements DocumentVersionRepository
{
  constructor(
    @InjectRepository(DocumentVersionEntity)
    private readonly versionsRepository: Repository<DocumentVersionEntity>,
  ) {}

  async create(data: NewDocumentVersion): Promise<DocumentVersion> {
    return guardQuery(async () => {
      const entity = await this.versionsRepository.save(
        this.versionsRepository.create(data),
      );
      return DocumentMapper.versionToDomain(entity);
    });
  }

  async findById(
    id: DocumentVersion['id'],
  ): Promise<NullableType<DocumentVersion>> {
    return guardQuery(async () => {
      const entity = await this.versionsRepository.findOne({ where: { id } });
      return entity ? DocumentMapper.versionToDomain(entity) : null;
    });
  }

  async findByIds(ids: DocumentVersion['id'][]): Promise<DocumentVersion[]> {
    if (ids.length === 0) {
      return [];
    }
    return guardQuery(async () => {
      const entities = await this.versionsRepository.find({
        where: { id: In(ids) },
      });
      return entities.map((entity) => DocumentMapper.versionToDomain(entity));
    });
  }

  async findByNumber(
    documentId: string,
    versionNumber: number,
  ): Promise<NullableType<DocumentVersion>> {
    return guardQuery(async () => {
      const entity = await this.versionsRepository.findOne({
        where: { documentId, versionNumber },
      });
      return entity ? DocumentMapper.versionToDomain(entity) : null;
    });
  }

  async findByDocumentId(documentId: string): Promise<DocumentVersion[]> {
    return guardQuery(async () => {
      const entities = await this.versionsRepository.find({
        where: { documentId },
        order: { versionNumber: 'DESC' },
      });
      return entities.map((entity) => DocumentMapper.versionToDomain(entity));
    });
  }

  async findMaxVersionNumber(documentId: string): Promise<number> {
    return guardQuery(async () => {
      const max = await this.versionsRepository.maximum('versionNumber', {
        documentId,
      });
      return max ?? 0;
    });
  }
}
