import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ActivityLogRepository } from './domain/repositories/activity-log.repository.port';
import { ActivityLogEntry } from './domain/entities/activity-log-entry.entity';
import { PermissionEngine } from '../permissions/domain/services/permission-engine.domain.service';
import { PermissionRole } from '../permissions/domain/entities/permission-role.enum';
import { AllConfigType } from '../config/config.type';
import { Actor } from '../utils/actor-extractor.util';
import { PaginationOptions } from '../utils/infinity-pagination';

export interface ActivityPage {
  data: ActivityLogEntry[];
  total: number;
  pagination: PaginationOptions;
}

/**
 * Audit reads of a document's activity. ADMIN only; the owner keeps
 * access after soft-delete.
 */
@Injectable()
export class ActivityQueryService {
  constructor(
    private readonly activityLogRepository: ActivityLogRepository,
    private readonly permissionEngine: PermissionEngine,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async listForDocument(
    documentId: string,
    actor: Actor,
    page = 1,
    limit?: number,
  ): Promise<ActivityPage> {
    await this.permissionEngine.require(
      documentId,
      actor.id,
      PermissionRole.ADMIN,
      { allowDeletedForOwner: true },
    );

    const maxPageSize = this.configService.getOrThrow('documents.maxPageSize', {
      infer: true,
    });
    const defaultPageSize = this.configService.getOrThrow(
      'documents.defaultPageSize',
      { infer: true },
    );
    const pagination = {
      page: Math.max(1, page),
      limit: Math.min(Math.max(1, limit ?? defaultPageSize), maxPageSize),
    };

    const { data, total } = await this.activityLogRepository.findByDocumentId(
      documentId,
      pagination,
    );
    return { data, total, pagination };
  }
}
