import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Max, Min, validateSync } from 'class-validator';
import {
  DEFAULT_HASH_ROUNDS,
  DEFAULT_LABEL_LENGTH,
  MAX_LABEL_LENGTH,
  MIN_LABEL_LENGTH,
  MIN_SALT_BYTES,
} from '../anonymization/anonymization.constants';

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  DB_HOST: string = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT: number = 3306;

  @IsString()
  @IsNotEmpty()
  DB_USERNAME!: string;

  @IsString()
  DB_PASSWORD!: string;

  @IsString()
  @IsNotEmpty()
  DB_DATABASE!: string;

  // Anonymization
  @IsInt()
  @Min(0)
  ANONYMIZATION_HASH_ROUNDS: number = DEFAULT_HASH_ROUNDS;

  @IsInt()
  @Min(MIN_LABEL_LENGTH)
  @Max(MAX_LABEL_LENGTH)
  ANONYMIZATION_LABEL_LENGTH: number = DEFAULT_LABEL_LENGTH;

  @IsInt()
  @Min(MIN_SALT_BYTES)
  ANONYMIZATION_SALT_BYTES: number = MIN_SALT_BYTES;
}

/**
 * ConfigModule `validate` hook: converts the raw env strings and fails bootstrap
 * on the first invalid value.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid environment configuration:\n${errors.map(error => error.toString()).join('')}`);
  }

  return validatedConfig;
}
