import { Column } from 'typeorm';

// core/database/entities/soft-delete.entity.ts
// Plain boolean column instead of @DeleteDateColumn: TypeORM would otherwise
// hide flagged rows globally, and every read here picks its visibility explicitly.
export abstract class SoftDeletableEntity {
  @Column({ type: 'boolean', default: false })
  deleted!: boolean;
}
