import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsIn, IsNumber, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

export enum DatabaseType {
  Postgres = 'postgres',
  Sqlite = 'better-sqlite3',
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsNumber()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  // Database
  @IsEnum(DatabaseType)
  DB_TYPE: DatabaseType = DatabaseType.Postgres;

  @IsString()
  DB_HOST: string = 'localhost';

  @IsNumber()
  @Min(1)
  @Max(65535)
  DB_PORT: number = 5432;

  @IsString()
  DB_USERNAME: string = 'showtime_user';

  @IsString()
  DB_PASSWORD: string = 'showtime_pass';

  /** Database name, or the file path (`:memory:` included) for SQLite. */
  @IsString()
  DB_DATABASE: string = 'showtime_catalog';

  // implicit conversion would turn the string "false" into true
  @IsOptional()
  @Transform(({ obj, key }: { obj: Record<string, unknown>; key: string }) => {
    const raw = obj[key];
    return typeof raw === 'string' ? raw.toLowerCase() === 'true' : raw;
  })
  @IsBoolean()
  DB_SYNCHRONIZE?: boolean;

  // Logging
  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevel = 'info';

  // Application
  @IsNumber()
  @Min(1)
  @Max(1000)
  RATE_LIMIT_TTL: number = 60;

  @IsNumber()
  @Min(1)
  @Max(100000)
  RATE_LIMIT_MAX: number = 100;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  return validatedConfig;
}
