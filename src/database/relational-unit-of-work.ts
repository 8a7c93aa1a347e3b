import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { TransactionScope, UnitOfWork } from './unit-of-work';
import { translateDriverError } from './translate-driver-error';
import { UserEntity } from '../users/infrastructure/persistence/relational/entities/user.entity';
import { UsersRelationalRepository } from '../users/infrastructure/persistence/relational/repositories/user.repository';
import { DocumentEntity } from '../documents/infrastructure/persistence/relational/entities/document.entity';
import { DocumentVersionEntity } from '../documents/infrastructure/persistence/relational/entities/document-version.entity';
import { DocumentTagEntity } from '../documents/infrastructure/persistence/relational/entities/document-tag.entity';
import { DocumentRelationalRepository } from '../documents/infrastructure/persistence/relational/repositories/document.repository';
import { DocumentVersionRelationalRepository } from '../documents/infrastructure/persistence/relational/repositories/document-version.repository';
import { DocumentTagRelationalRepository } from '../documents/infrastructure/persistence/relational/repositories/document-tag.repository';
import { PermissionEntity } from '../permissions/infrastructure/persistence/relational/entities/permission.entity';
import { PermissionRelationalRepository } from '../permissions/infrastructure/persistence/relational/repositories/permission.repository';

@Injectable()
export class RelationalUnitOfWork implements UnitOfWork {
  constructor(private readonly dataSource: DataSource) {}

  async run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    try {
      return await this.dataSource.transaction('READ COMMITTED', (manager) =>
        work(this.scopeFor(manager)),
      );
    } catch (error) {
      throw translateDriverError(error);
    }
  }

  private scopeFor(manager: EntityManager): TransactionScope {
    return {
      users: new UsersRelationalRepository(manager.getRepository(UserEntity)),
      documents: new DocumentRelationalRepository(
        manager.getRepository(DocumentEntity),
      ),
      versions: new DocumentVersionRelationalRepository(
        manager.getRepository(DocumentVersionEntity),
      ),
      tags: new DocumentTagRelationalRepository(
        manager.getRepository(DocumentTagEntity),
      ),
      permissions: new PermissionRelationalRepository(
        manager.getRepository(PermissionEntity),
      ),
    };
  }
}
