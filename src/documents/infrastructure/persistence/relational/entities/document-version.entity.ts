import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DocumentEntity } from './document.entity';

// pg returns bigint columns as strings
const bigintTransformer = {
  to: (value: number): number => value,
  from: (value: string | number): number => Number(value),
};

@Entity({
  name: 'document_versions',
})
@Unique('UQ_document_versions_document_version', [
  'documentId',
  'versionNumber',
])
@Check('CHK_document_versions_version_number', '"version_number" > 0')
@Check('CHK_document_versions_file_size', '"file_size" > 0')
export class DocumentVersionEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => DocumentEntity, { nullable: false })
  @JoinColumn({ name: 'document_id' })
  document?: DocumentEntity;

  @Column({ name: 'document_id', type: 'uuid' })
  documentId!: string;

  @Column({ name: 'version_number', type: 'integer' })
  versionNumber!: number;

  @Column({ name: 'blob_key', type: 'varchar', length: 1024 })
  blobKey!: string;

  @Column({ name: 'file_name', type: 'varchar', length: 255 })
  fileName!: string;

  @Column({
    name: 'file_size',
    type: 'bigint',
    transformer: bigintTransformer,
  })
  fileSize!: number;

  @Column({ name: 'mime_type', type: 'varchar', length: 255 })
  mimeType!: string;

  @Column({ type: 'char', length: 64 })
  checksum!: string;

  @Column({ name: 'created_by_id', type: 'uuid' })
  createdById!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
