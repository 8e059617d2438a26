import { registerAs } from '@nestjs/config';
import { SequelizeModuleOptions } from '@nestjs/sequelize';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const SSL_MODES = [
  'disable',
  'allow',
  'prefer',
  'require',
  'verify-ca',
  'verify-full',
] as const;

export type SslMode = (typeof SSL_MODES)[number];

/**
 * Database settings after defaults are applied. Durations are in seconds.
 */
export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  poolSize: number;
  maxOverflow: number;
  poolTimeout: number;
  poolRecycle: number;
  sslMode: SslMode;
  connectTimeout: number;
  synchronize: boolean;
}

/**
 * Shape of the environment variables read at boot.
 */
export class DatabaseEnvironment {
  @IsOptional()
  @IsString()
  DB_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT?: number;

  @IsOptional()
  @IsString()
  DB_NAME?: string;

  @IsOptional()
  @IsString()
  DB_USER?: string;

  @IsOptional()
  @IsString()
  DB_PASSWORD?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  DB_POOL_SIZE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  DB_MAX_OVERFLOW?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  DB_POOL_TIMEOUT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  DB_POOL_RECYCLE?: number;

  @IsOptional()
  @IsIn(SSL_MODES)
  DB_SSL_MODE?: SslMode;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  DB_CONNECT_TIMEOUT?: number;

  @IsOptional()
  @IsBooleanString()
  DB_SYNCHRONIZE?: string;
}

/**
 * Reads and validates the database settings from an environment map.
 *
 * @throws Error listing every invalid variable.
 */
export function parseDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const source = plainToInstance(DatabaseEnvironment, env);
  const errors = validateSync(source);

  if (errors.length > 0) {
    const details = errors.map(
      (error) =>
        `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`,
    );
    throw new Error(`Invalid database configuration: ${details.join('; ')}`);
  }

  return {
    host: source.DB_HOST ?? 'localhost',
    port: source.DB_PORT ?? 5432,
    database: source.DB_NAME ?? 'project_db',
    username: source.DB_USER ?? 'postgres',
    password: source.DB_PASSWORD ?? '',
    poolSize: source.DB_POOL_SIZE ?? 10,
    maxOverflow: source.DB_MAX_OVERFLOW ?? 20,
    poolTimeout: source.DB_POOL_TIMEOUT ?? 30,
    poolRecycle: source.DB_POOL_RECYCLE ?? 3600,
    sslMode: source.DB_SSL_MODE ?? 'prefer',
    connectTimeout: source.DB_CONNECT_TIMEOUT ?? 10,
    synchronize:
      source.DB_SYNCHRONIZE === 'true' || source.DB_SYNCHRONIZE === '1',
  };
}

/**
 * node-postgres has no opportunistic TLS, so `allow` and `prefer` connect
 * in plain text.
 */
function sslOptions(mode: SslMode): false | { rejectUnauthorized: boolean } {
  switch (mode) {
    case 'require':
      return { rejectUnauthorized: false };
    case 'verify-ca':
    case 'verify-full':
      return { rejectUnauthorized: true };
    default:
      return false;
  }
}

/**
 * Maps the settings onto the options `SequelizeModule` expects.
 *
 * @remarks
 * The pool may grow to `poolSize + maxOverflow` connections. Waiting for a
 * free one gives up after `poolTimeout` seconds with a
 * `ConnectionAcquireTimeoutError`, and idle connections are recycled after
 * `poolRecycle` seconds. Models registered through `forFeature` are loaded
 * automatically; the schema is only synchronized when `synchronize` is set.
 */
export function toSequelizeOptions(
  config: DatabaseConfig,
): SequelizeModuleOptions {
  return {
    dialect: 'postgres',
    host: config.host,
    port: config.port,
    database: config.database,
    username: config.username,
    password: config.password,
    autoLoadModels: true,
    synchronize: config.synchronize,
    logging: false,
    pool: {
      max: config.poolSize + config.maxOverflow,
      min: 0,
      acquire: config.poolTimeout * 1000,
      idle: config.poolRecycle * 1000,
    },
    dialectOptions: {
      ssl: sslOptions(config.sslMode),
      connectionTimeoutMillis: config.connectTimeout * 1000,
    },
  };
}

export const databaseConfig = registerAs(
  'database',
  (): DatabaseConfig => parseDatabaseConfig(process.env),
);
