import { z } from 'zod';
import { ConfigError } from './errors';

const databaseEnvSchema = z
  .object({
    PERSONAL_DATA_DB_PASSWORD: z.string().default(''),
    PERSONAL_DATA_DB_USERNAME: z.string().default('root'),
    PERSONAL_DATA_DB_HOST: z.string().default('localhost'),
    PERSONAL_DATA_DB_NAME: z.string({ required_error: 'PERSONAL_DATA_DB_NAME is required' }).min(1),
    PERSONAL_DATA_DB_PORT: z.coerce.number().int().positive().max(65535).default(3306)
  })
  .passthrough();

const envSchema = z
  .object({
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    PERSONAL_DATA_REDACT_ROWS: z.enum(['true', 'false']).default('false')
  })
  .passthrough();

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface AppConfig {
  logLevel: string;
  redactRows: boolean;
  database: DatabaseConfig;
}

function toDatabaseConfig(data: z.infer<typeof databaseEnvSchema>): DatabaseConfig {
  return {
    host: data.PERSONAL_DATA_DB_HOST,
    port: data.PERSONAL_DATA_DB_PORT,
    user: data.PERSONAL_DATA_DB_USERNAME,
    password: data.PERSONAL_DATA_DB_PASSWORD,
    database: data.PERSONAL_DATA_DB_NAME
  };
}

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsedEnv = databaseEnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError('Invalid database configuration', parsedEnv.error.flatten());
  }

  return toDatabaseConfig(parsedEnv.data);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const database = loadDatabaseConfig(env);
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError('Invalid environment configuration', parsedEnv.error.flatten());
  }

  return {
    logLevel: parsedEnv.data.LOG_LEVEL,
    redactRows: parsedEnv.data.PERSONAL_DATA_REDACT_ROWS === 'true',
    database
  };
}
