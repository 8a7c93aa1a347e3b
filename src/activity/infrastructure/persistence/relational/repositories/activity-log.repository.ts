import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ActivityLogEntity } from '../entities/activity-log.entity';
import {
  ActivityLogRepository,
  NewActivityLogEntry,
} from '../../../../domain/repositories/activity-log.repository.port';
import { ActivityLogEntry } from '../../../../domain/entities/activity-log-entry.entity';
import { PaginationOptions } from '../../../../../utils/infinity-pagination';
import { guardQuery } from '../../../../../database/translate-driver-error';

@Injectable()
export class ActivityLogRelationalRepository implements ActivityLogRepository {
  constructor(
    @InjectRepository(ActivityLogEntity)
    private readonly repository: Repository<ActivityLogEntity>,
  ) {}

  async create(data: NewActivityLogEntry): Promise<ActivityLogEntry> {
    return guardQuery(async () => {
      const saved = await this.repository.save(this.repository.create(data));
      return this.toDomain(saved);
    });
  }

  async findByDocumentId(
    documentId: string,
    pagination: PaginationOptions,
  ): Promise<{ data: ActivityLogEntry[]; total: number }> {
    return guardQuery(async () => {
      const [entities, total] = await this.repository.findAndCount({
        where: { documentId },
        order: { createdAt: 'DESC', id: 'DESC' },
        skip: (pagination.page - 1) * pagination.limit,
        take: pagination.limit,
      });
      return {
        data: entities.map((entity) => this.toDomain(entity)),
        total,
      };
    });
  }

  private toDomain(entity: ActivityLogEntity): ActivityLogEntry {
    return {
      id: entity.id,
      actorId: entity.actorId ?? null,
      documentId: entity.documentId ?? null,
      action: entity.action,
      details: entity.details ?? {},
      ipAddress: entity.ipAddress ?? null,
      userAgent: entity.userAgent ?? null,
      createdAt: entity.createdAt,
    };
  }
}
