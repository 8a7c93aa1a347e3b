import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import {
  DocumentDetails,
  DocumentLifecycleDomainService,
} from './domain/services/document-lifecycle.domain.service';
import { DocumentVersion } from './domain/entities/document-version.entity';
import { IncomingFile } from './domain/utils/file-classifier.util';
import { CreateDocumentDto } from './dto/create-document.dto';
import { UpdateDocumentDto } from './dto/update-document.dto';
import { ListDocumentsQueryDto } from './dto/list-documents-query.dto';
import { DocumentResponseDto } from './dto/document-response.dto';
import { DocumentVersionResponseDto } from './dto/document-version-response.dto';
import { DownloadResponseDto } from './dto/download-response.dto';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { Actor } from '../utils/actor-extractor.util';

/**
 * Documents Service (Application Layer)
 *
 * Maps HTTP DTOs to lifecycle calls and domain results back to response
 * DTOs.
 */
@Injectable()
export class DocumentsService {
  constructor(private readonly lifecycle: DocumentLifecycleDomainService) {}

  async create(
    actor: Actor,
    dto: CreateDocumentDto,
    file: IncomingFile,
  ): Promise<DocumentResponseDto> {
    const details = await this.lifecycle.create(
      actor,
      { title: dto.title, description: dto.description, tags: dto.tags },
      file,
    );
    return this.toResponseDto(details);
  }

  async findOne(
    documentId: string,
    actor: Actor,
  ): Promise<DocumentResponseDto> {
    return this.toResponseDto(
      await this.lifecycle.getDocument(documentId, actor),
    );
  }

  async findAll(
    actor: Actor,
    query: ListDocumentsQueryDto,
  ): Promise<InfinityPaginationResponseDto<DocumentResponseDto>> {
    const page = await this.lifecycle.list(actor, {
      ownerId: query.ownerId,
      title: query.title,
      tags: query.tags,
      fileType: query.fileType,
      page: query.page,
      limit: query.limit,
    });

    return infinityPagination(
      page.data.map((summary) => this.toResponseDto(summary)),
      { page: page.page, limit: page.limit },
      page.total,
    );
  }

  async update(
    documentId: string,
    actor: Actor,
    dto: UpdateDocumentDto,
  ): Promise<DocumentResponseDto> {
    const details = await this.lifecycle.updateMetadata(documentId, actor, {
      title: dto.title,
      description: dto.description,
      tags: dto.tags,
    });
    return this.toResponseDto(details);
  }

  async remove(documentId: string, actor: Actor): Promise<void> {
    await this.lifecycle.softDelete(documentId, actor);
  }

  async uploadVersion(
    documentId: string,
    actor: Actor,
    file: IncomingFile,
  ): Promise<DocumentResponseDto> {
    const details = await this.lifecycle.uploadNewVersion(
      documentId,
      actor,
      file,
    );
    return this.toResponseDto(details);
  }

  async listVersions(
    documentId: string,
    actor: Actor,
  ): Promise<DocumentVersionResponseDto[]> {
    const versions = await this.lifecycle.listVersions(documentId, actor);
    return versions.map((version) => this.toVersionDto(version));
  }

  async download(
    documentId: string,
    actor: Actor,
    versionNumber?: number,
  ): Promise<DownloadResponseDto> {
    const target = await this.lifecycle.getDownloadTarget(
      documentId,
      actor,
      versionNumber,
    );
    return plainToClass(DownloadResponseDto, target, {
      excludeExtraneousValues: true,
    });
  }

  private toResponseDto(details: DocumentDetails): DocumentResponseDto {
    return plainToClass(
      DocumentResponseDto,
      {
        ...details.document,
        tags: details.tags,
        currentVersion: details.currentVersion,
      },
      { excludeExtraneousValues: true },
    );
  }

  private toVersionDto(version: DocumentVersion): DocumentVersionResponseDto {
    return plainToClass(DocumentVersionResponseDto, version, {
      excludeExtraneousValues: true,
    });
  }
}
