import { Entity, PrimaryColumn, Column } from 'typeorm';
import { utcTimestampTransformer } from './utc-timestamp.transformer';

/**
 * TypeORM entity for DuplicateCode
 */
@Entity('duplicate_codes')
export class DuplicateCodeEntity {
  @PrimaryColumn({ type: 'text' })
  code!: string;

  @Column({
    name: 'created_at',
    type: 'text',
    nullable: true,
    transformer: utcTimestampTransformer,
  })
  createdAt!: Date | null;
}
