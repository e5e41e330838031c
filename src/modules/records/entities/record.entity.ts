import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { SoftDeletableEntity } from 'src/core/database/entities/soft-delete.entity';
import { RecordPayload } from '../soft-delete-record';

@Entity('soft_delete_records')
@Index(['deleted', 'id'])
export class RecordEntity extends SoftDeletableEntity {
  @PrimaryColumn({ type: 'integer' })
  id!: number; // allocated by TypeOrmRecordPersistence.nextId()

  @Column({ type: 'simple-json' })
  payload!: RecordPayload;
}
