import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { utcTimestampTransformer } from './utc-timestamp.transformer';

/**
 * TypeORM entity for ProcessedMessage
 */
@Entity('processed')
@Index('IDX_processed_created_at', ['createdAt'])
export class ProcessedMessageEntity {
  @PrimaryColumn({ name: 'source_id', type: 'integer' })
  sourceId!: number;

  @PrimaryColumn({ name: 'message_id', type: 'integer' })
  messageId!: number;

  @Column({
    name: 'created_at',
    type: 'text',
    nullable: true,
    transformer: utcTimestampTransformer,
  })
  createdAt!: Date | null;
}
