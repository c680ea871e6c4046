import { plainToInstance } from 'class-transformer';
import { IsInt, IsOptional, IsString, Length, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(16)
  KGRAM_SIZE?: number;

  @IsOptional()
  @IsString()
  @Length(1, 1)
  KGRAM_BOUNDARY?: string;

  @IsOptional()
  @IsString()
  DEFAULT_ANALYZER?: string;

  @IsOptional()
  @IsString()
  CORPUS_DIR?: string;

  @IsOptional()
  @IsString()
  CORPUS_EXTENSION?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  SUGGEST_MAX_DISTANCE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  SUGGEST_LIMIT?: number;
}

/**
 * Validates the process environment for `ConfigModule.forRoot`; throws with
 * every failing variable listed.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
