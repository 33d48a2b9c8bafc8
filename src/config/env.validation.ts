import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Static environment, read once at bootstrap
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  TELEGRAM_BOT_TOKEN!: string;

  @IsString()
  @IsNotEmpty()
  DEST_CHAT!: string;

  @IsString()
  @Matches(/^\s*-?\d+\s*(,\s*-?\d+\s*)*,?\s*$/, {
    message: 'SOURCE_CHATS must be a comma separated list of chat ids',
  })
  SOURCE_CHATS!: string;

  @IsString()
  @IsNotEmpty()
  ADMIN_PASSWORD!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @IsOptional()
  @IsString()
  DATA_DIR: string = 'data';

  @IsOptional()
  @IsString()
  CONFIG_PATH: string = 'config/.env';

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(100)
  LINK_EXPANSION_TIMEOUT_MS: number = 10_000;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(50)
  TELEGRAM_POLL_TIMEOUT_S: number = 30;

  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  DB_LOGGING: boolean = false;
}

/**
 * Validate raw environment values; throws listing every violation
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return validated;
}
