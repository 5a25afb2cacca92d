import { registerAs } from '@nestjs/config';
import { DataSourceOptions } from 'typeorm';
import { DatabaseType, Environment, EnvironmentVariables, validate } from './env.validation';
import { ENTITIES } from '../entities';

export interface DatabaseConfig {
  type: DatabaseType;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
  dropSchema: boolean;
}

export function databaseConfigFromEnv(env: EnvironmentVariables): DatabaseConfig {
  const nodeEnv = env.NODE_ENV;
  const isDevOrTest = nodeEnv === Environment.Development || nodeEnv === Environment.Test;

  return {
    type: env.DB_TYPE,
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    database: env.DB_DATABASE,
    synchronize: env.DB_SYNCHRONIZE ?? isDevOrTest,
    logging: nodeEnv === Environment.Development,
    dropSchema: nodeEnv === Environment.Test,
  };
}

/**
 * Maps the validated database settings onto TypeORM options for either driver.
 * SQLite gets foreign keys switched on by the driver itself, which the cascade rules depend on.
 */
export function buildDataSourceOptions(config: DatabaseConfig): DataSourceOptions {
  const common = {
    entities: ENTITIES,
    synchronize: config.synchronize,
    logging: config.logging,
    dropSchema: config.dropSchema,
  };

  if (config.type === DatabaseType.Sqlite) {
    return {
      ...common,
      type: 'better-sqlite3',
      database: config.database,
    };
  }

  return {
    ...common,
    type: 'postgres',
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.database,
  };
}

export default registerAs('database', () => databaseConfigFromEnv(validate(process.env)));
