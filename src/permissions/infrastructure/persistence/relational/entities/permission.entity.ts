import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DocumentEntity } from '../../../../../documents/infrastructure/persistence/relational/entities/document.entity';
import { UserEntity } from '../../../../../users/infrastructure/persistence/relational/entities/user.entity';
import { PermissionRole } from '../../../../domain/entities/permission-role.enum';

@Entity({
  name: 'document_permissions',
})
@Unique('UQ_document_permissions_document_user', ['documentId', 'userId'])
@Check(
  'CHK_document_permissions_role',
  `"role" IN ('READ', 'EDIT', 'ADMIN')`,
)
export class PermissionEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => DocumentEntity, { nullable: false })
  @JoinColumn({ name: 'document_id' })
  document?: DocumentEntity;

  @Column({ name: 'document_id', type: 'uuid' })
  documentId!: string;

  @ManyToOne(() => UserEntity, { nullable: false })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity;

  @Index('IDX_document_permissions_user_id')
  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @Column({ type: 'varchar', length: 10 })
  role!: PermissionRole;

  @Column({ name: 'granted_by_id', type: 'uuid' })
  grantedById!: string;

  @CreateDateColumn({ name: 'granted_at', type: 'timestamptz' })
  grantedAt!: Date;
}
