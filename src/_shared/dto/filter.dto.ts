import { IsString, IsNotEmpty, IsOptional, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * DTO for adding a link filter rule
 */
export class CreateFilterRuleDto {
  @ApiProperty({
    description: 'Regular expression matched against the message text',
    example: 'https?://amzn\\.to/\\S+',
    maxLength: 1000,
  })
  @IsNotEmpty()
  @IsString()
  @MaxLength(1000)
  pattern!: string;

  @ApiPropertyOptional({
    description:
      "Replacement template ($1 for groups), or 'amz' to expand matched links over the network",
    example: 'amz',
    default: '',
  })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  replacement?: string;
}

/**
 * DTO for editing a link filter rule
 */
export class UpdateFilterRuleDto extends CreateFilterRuleDto {}

/**
 * Response DTO for a filter rule
 */
export class FilterRuleResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'https?://amzn\\.to/\\S+' })
  pattern!: string;

  @ApiProperty({ example: 'amz' })
  replacement!: string;

  @ApiProperty({ description: 'Position in the chain, ascending', example: 1 })
  sortOrder!: number;

  @ApiProperty({ description: 'Whether the rule expands links instead of substituting' })
  linkExpansion!: boolean;
}
