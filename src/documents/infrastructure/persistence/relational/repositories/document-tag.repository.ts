import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { DocumentTagEntity } from '../entities/document-tag.entity';
import { DocumentMapper } from '../mappers/document.mapper';
import { DocumentTagRepository } from '../../../../domain/repositories/document-tag.repository.port';
import { DocumentTag } from '../../../../domain/entities/document-tag.entity';
import { guardQuery } from '../../../../../database/translate-driver-error';

@Injectable()
export class DocumentTagRelationalRepository implements DocumentTagRepository {
  constructor(
    @InjectRepository(DocumentTagEntity)
    private readonly tagsRepository: Repository<DocumentTagEntity>,
  ) {}

  async findByDocumentIds(documentIds: string[]): Promise<DocumentTag[]> {
    if (documentIds.length === 0) {
      return [];
    }
    return guardQuery(async () => {
      const entities = await this.tagsRepository.find({
        where: { documentId: In(documentIds) },
        order: { tag: 'ASC' },
      });
      return entities.map((entity) => DocumentMapper.tagToDomain(entity));
    });
  }

  async replace(documentId: string, tags: string[]): Promise<void> {
    await guardQuery(async () => {
      await this.tagsRepository.delete({ documentId });
      if (tags.length > 0) {
        await this.tagsRepository.insert(
          tags.map((tag) => ({ documentId, tag })),
        );
      }
    });
  }
}
