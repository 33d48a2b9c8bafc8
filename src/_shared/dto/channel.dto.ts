import { IsString, IsOptional, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

/**
 * DTO for labelling (and adding) a source chat
 */
export class UpsertChannelDto {
  @ApiPropertyOptional({
    description: 'Display name for the source chat',
    example: 'Deals channel',
    default: '',
    maxLength: 255,
  })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;
}
