import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PermissionEntity } from '../entities/permission.entity';
import {
  NewPermission,
  PermissionRepository,
} from '../../../../domain/repositories/permission.repository.port';
import { Permission } from '../../../../domain/entities/permission.entity';
import { PermissionRole } from '../../../../domain/entities/permission-role.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { DomainError } from '../../../../../utils/errors/domain-error';
import { guardQuery } from '../../../../../database/translate-driver-error';

@Injectable()
export class PermissionRelationalRepository implements PermissionRepository {
  constructor(
    @InjectRepository(PermissionEntity)
    private readonly repository: Repository<PermissionEntity>,
  ) {}

  async findByDocumentAndUser(
    documentId: string,
    userId: string,
  ): Promise<NullableType<Permission>> {
    return guardQuery(async () => {
      const entity = await this.repository.findOne({
        where: { documentId, userId },
      });
      return entity ? this.toDomain(entity) : null;
    });
  }

  async findByDocumentId(documentId: string): Promise<Permission[]> {
    return guardQuery(async () => {
      const entities = await this.repository.find({
        where: { documentId },
        order: { grantedAt: 'DESC', id: 'DESC' },
      });
      return entities.map((entity) => this.toDomain(entity));
    });
  }

  async create(data: NewPermission): Promise<Permission> {
    return guardQuery(async () => {
      const saved = await this.repository.save(
        this.repository.create({
          documentId: data.documentId,
          userId: data.userId,
          role: data.role,
          grantedById: data.grantedById,
        }),
      );
      return this.toDomain(saved);
    });
  }

  async updateRole(
    id: Permission['id'],
    role: PermissionRole,
  ): Promise<Permission> {
    return guardQuery(async () => {
      await this.repository.update(id, { role });
      const entity = await this.repository.findOne({ where: { id } });
      if (!entity) {
        throw DomainError.notFound('Permission');
      }
      return this.toDomain(entity);
    });
  }

  async delete(id: Permission['id']): Promise<void> {
    await guardQuery(() => this.repository.delete(id));
  }

  private toDomain(entity: PermissionEntity): Permission {
    return {
      id: entity.id,
      documentId: entity.documentId,
      userId: entity.userId,
      role: entity.role,
      grantedById: entity.grantedById,
      grantedAt: entity.grantedAt,
    };
  }
}
