import { Entity, PrimaryColumn, Column } from 'typeorm';

/**
 * TypeORM entity for ChannelLabel
 */
@Entity('channels')
export class ChannelLabelEntity {
  @PrimaryColumn({ name: 'source_id', type: 'integer' })
  sourceId!: number;

  @Column({ type: 'text', nullable: true })
  name!: string | null;
}
