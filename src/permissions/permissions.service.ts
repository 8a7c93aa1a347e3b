import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import {
  PermissionEngine,
  PermissionEntry,
} from './domain/services/permission-engine.domain.service';
import { Permission } from './domain/entities/permission.entity';
import { GrantPermissionDto } from './dto/grant-permission.dto';
import { UpdatePermissionDto } from './dto/update-permission.dto';
import { PermissionResponseDto } from './dto/permission-response.dto';
import { Actor } from '../utils/actor-extractor.util';

/**
 * Permissions Service (Application Layer)
 *
 * Thin facade over PermissionEngine that maps domain results to response
 * DTOs. Business rules live in the engine.
 */
@Injectable()
export class PermissionsService {
  constructor(private readonly permissionEngine: PermissionEngine) {}

  async grant(
    documentId: string,
    dto: GrantPermissionDto,
    actor: Actor,
  ): Promise<PermissionResponseDto> {
    const permission = await this.permissionEngine.grant(
      documentId,
      actor,
      dto.userId,
      dto.role,
    );
    return this.fromPermission(permission);
  }

  async updateRole(
    documentId: string,
    userId: string,
    dto: UpdatePermissionDto,
    actor: Actor,
  ): Promise<PermissionResponseDto> {
    const permission = await this.permissionEngine.updateRole(
      documentId,
      actor,
      userId,
      dto.role,
    );
    return this.fromPermission(permission);
  }

  async revoke(documentId: string, userId: string, actor: Actor): Promise<void> {
    await this.permissionEngine.revoke(documentId, actor, userId);
  }

  async list(
    documentId: string,
    actor: Actor,
  ): Promise<PermissionResponseDto[]> {
    const entries = await this.permissionEngine.list(documentId, actor);
    return entries.map((entry) => this.toResponseDto(entry));
  }

  private fromPermission(permission: Permission): PermissionResponseDto {
    return this.toResponseDto({ ...permission, implicit: false });
  }

  private toResponseDto(entry: PermissionEntry): PermissionResponseDto {
    return plainToClass(PermissionResponseDto, entry, {
      excludeExtraneousValues: true,
    });
  }
}
