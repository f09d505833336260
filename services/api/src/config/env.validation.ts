import { plainToInstance } from 'class-transformer';
import { API } from '@courtside/shared';
import { IsBooleanString, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = API.DEFAULT_PORT;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  FANOUT_CHANNEL?: string;

  @IsOptional()
  @IsBooleanString()
  REMINDERS_ENABLED?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  REMINDER_INTERVAL_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  REMINDER_SEND_TIMEOUT_MS?: number;

  @IsOptional()
  @IsString()
  BREVO_API_KEY?: string;

  @IsOptional()
  @IsString()
  MAIL_FROM_EMAIL?: string;

  @IsOptional()
  @IsString()
  MAIL_FROM_NAME?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  MAIL_RETRY_DELAY_MS?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  WEB_APP_URL?: string;
}

/**
 * Validates process environment at startup. Numeric values are converted.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}
