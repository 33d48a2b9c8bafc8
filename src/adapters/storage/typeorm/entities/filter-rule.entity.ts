import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

/**
 * TypeORM entity for FilterRule
 */
@Entity('url_filters')
@Index('IDX_url_filters_sort_order', ['sortOrder'])
export class FilterRuleEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  pattern!: string;

  @Column({ type: 'text', default: '' })
  replacement!: string;

  @Column({ name: 'sort_order', type: 'integer', default: 0 })
  sortOrder!: number;
}
