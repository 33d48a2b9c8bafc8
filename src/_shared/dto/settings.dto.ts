import { IsInt, IsOptional, IsString, IsBoolean, Matches, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

/**
 * DTO for retention settings
 * Omitted fields are left unchanged, null restores the default
 */
export class UpdateRetentionSettingsDto {
  @ApiPropertyOptional({
    description: 'Days to keep processed message ids; 0 or less disables the sweep',
    example: 30,
    nullable: true,
  })
  @IsOptional()
  @IsInt()
  cleanupDays?: number | null;

  @ApiPropertyOptional({
    description: 'Local time of the daily sweep',
    example: '00:05',
    pattern: '^\\d{1,2}:\\d{2}$',
    nullable: true,
  })
  @IsOptional()
  @IsString()
  @Matches(/^\d{1,2}:\d{2}$/, { message: 'cleanupTime must use the HH:MM format' })
  cleanupTime?: string | null;

  @ApiPropertyOptional({
    description: 'Clear the duplicate-code cache even when the sweep is disabled',
    example: true,
    nullable: true,
  })
  @IsOptional()
  @IsBoolean()
  clearCodesWhenDisabled?: boolean | null;
}

/**
 * DTO for the duplicate-code pattern
 */
export class UpdateDuplicateCodePatternDto {
  @ApiPropertyOptional({
    description: 'Regular expression; group 1 is the code when present. Empty restores the default',
    example: '\\bcode:\\s*([A-Z0-9]{6,})',
    nullable: true,
  })
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  regex?: string | null;
}
