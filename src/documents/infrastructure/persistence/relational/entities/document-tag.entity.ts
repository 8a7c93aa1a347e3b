import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DocumentEntity } from './document.entity';

@Entity({
  name: 'document_tags',
})
@Unique('UQ_document_tags_document_tag', ['documentId', 'tag'])
export class DocumentTagEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ManyToOne(() => DocumentEntity, (document) => document.tags, {
    nullable: false,
  })
  @JoinColumn({ name: 'document_id' })
  document?: DocumentEntity;

  @Column({ name: 'document_id', type: 'uuid' })
  documentId!: string;

  @Index('IDX_document_tags_tag')
  @Column({ type: 'varchar', length: 100 })
  tag!: string;
}
