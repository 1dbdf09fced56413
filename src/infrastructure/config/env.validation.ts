import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString, Min, validateSync } from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

const toInt = ({ value }: { value: unknown }) => (typeof value === 'string' ? parseInt(value, 10) : value);

const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.toLowerCase() !== 'false';
  return true;
};

export class EnvironmentVariables {
  // Application
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  PORT: number = 3000;

  // Database
  @IsString()
  @IsOptional()
  DATABASE_PATH: string = './data/circles.sqlite';

  @IsBoolean()
  @IsOptional()
  @Transform(toBoolean)
  TYPEORM_LOGGING: boolean = true;

  // Rate Limiting
  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  RATE_LIMIT_TTL: number = 60;

  @IsInt()
  @Min(1)
  @IsOptional()
  @Transform(toInt)
  RATE_LIMIT_MAX: number = 100;
}

/**
 * Validates raw environment variables for ConfigModule.
 * @throws Error listing every invalid variable
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config);

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => {
        const constraints = error.constraints ? Object.values(error.constraints).join(', ') : 'unknown error';
        return `${error.property}: ${constraints}`;
      })
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return validatedConfig;
}
