import { IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * DTO for an ad-hoc read-only query
 */
export class ExecuteQueryDto {
  @ApiProperty({
    description: 'A single read-only SQL statement',
    example: 'SELECT source_id, COUNT(*) FROM processed GROUP BY source_id',
  })
  @IsString()
  @MaxLength(10_000)
  query!: string;
}

/**
 * Response DTO for a query
 */
export class QueryResultDto {
  @ApiProperty({ type: [String], example: ['source_id', 'COUNT(*)'] })
  columns!: string[];

  @ApiProperty({
    description: 'Rows as arrays, in column order',
    example: [[-1001234567890, 42]],
  })
  rows!: unknown[][];
}
