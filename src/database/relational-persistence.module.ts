import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UnitOfWork } from './unit-of-work';
import { RelationalUnitOfWork } from './relational-unit-of-work';
import { UserEntity } from '../users/infrastructure/persistence/relational/entities/user.entity';
import { UserRepository } from '../users/infrastructure/persistence/user.repository';
import { UsersRelationalRepository } from '../users/infrastructure/persistence/relational/repositories/user.repository';
import { DocumentEntity } from '../documents/infrastructure/persistence/relational/entities/document.entity';
import { DocumentVersionEntity } from '../documents/infrastructure/persistence/relational/entities/document-version.entity';
import { DocumentTagEntity } from '../documents/infrastructure/persistence/relational/entities/document-tag.entity';
import { DocumentRepository } from '../documents/domain/repositories/document.repository.port';
import { DocumentVersionRepository } from '../documents/domain/repositories/document-version.repository.port';
import { DocumentTagRepository } from '../documents/domain/repositories/document-tag.repository.port';
import { DocumentRelationalRepository } from '../documents/infrastructure/persistence/relational/repositories/document.repository';
import { DocumentVersionRelationalRepository } from '../documents/infrastructure/persistence/relational/repositories/document-version.repository';
import { DocumentTagRelationalRepository } from '../documents/infrastructure/persistence/relational/repositories/document-tag.repository';
import { PermissionEntity } from '../permissions/infrastructure/persistence/relational/entities/permission.entity';
import { PermissionRepository } from '../permissions/domain/repositories/permission.repository.port';
import { PermissionRelationalRepository } from '../permissions/infrastructure/persistence/relational/repositories/permission.repository';
import { ActivityLogEntity } from '../activity/infrastructure/persistence/relational/entities/activity-log.entity';
import { ActivityLogRepository } from '../activity/domain/repositories/activity-log.repository.port';
import { ActivityLogRelationalRepository } from '../activity/infrastructure/persistence/relational/repositories/activity-log.repository';

/**
 * Binds every repository port and the UnitOfWork to TypeORM.
 *
 * Global so feature modules depend only on the ports; tests swap this
 * module for an in-memory one.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forFeature([
      UserEntity,
      DocumentEntity,
      DocumentVersionEntity,
      DocumentTagEntity,
      PermissionEntity,
      ActivityLogEntity,
    ]),
  ],
  providers: [
    {
      provide: UserRepository,
      useClass: UsersRelationalRepository,
    },
    {
      provide: DocumentRepository,
      useClass: DocumentRelationalRepository,
    },
    {
      provide: DocumentVersionRepository,
      useClass: DocumentVersionRelationalRepository,
    },
    {
      provide: DocumentTagRepository,
      useClass: DocumentTagRelationalRepository,
    },
    {
      provide: PermissionRepository,
      useClass: PermissionRelationalRepository,
    },
    {
      provide: ActivityLogRepository,
      useClass: ActivityLogRelationalRepository,
    },
    {
      provide: UnitOfWork,
      useClass: RelationalUnitOfWork,
    },
  ],
  exports: [
    UserRepository,
    DocumentRepository,
    DocumentVersionRepository,
    DocumentTagRepository,
    PermissionRepository,
    ActivityLogRepository,
    UnitOfWork,
  ],
})
export class RelationalPersistenceModule {}
