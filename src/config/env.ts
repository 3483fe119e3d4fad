import dotenv from 'dotenv';
import Joi from 'joi';

export type NodeEnv = 'development' | 'production' | 'test';
export type StoreDriver = 'postgres' | 'memory';

export interface AppConfig {
  nodeEnv: NodeEnv;
  port: number;
  storeDriver: StoreDriver;
  databaseUrl?: string;
  databaseName?: string;
  corsOrigin: string;
  requestTimeoutMs: number;
  shutdownTimeoutMs: number;
}

interface RawEnv {
  NODE_ENV: NodeEnv;
  PORT: number;
  DOCUMENT_STORE: StoreDriver;
  DATABASE_URL?: string;
  DATABASE_NAME?: string;
  CORS_ORIGIN: string;
  REQUEST_TIMEOUT: number;
  SHUTDOWN_TIMEOUT: number;
}

const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().integer().min(0).max(65535).default(8000),
  DOCUMENT_STORE: Joi.string().valid('postgres', 'memory').default('postgres'),
  DATABASE_URL: Joi.string()
    .uri({ scheme: ['postgres', 'postgresql'] })
    .when('DOCUMENT_STORE', { is: 'postgres', then: Joi.required() }),
  DATABASE_NAME: Joi.string().max(63),
  CORS_ORIGIN: Joi.string().default('*'),
  REQUEST_TIMEOUT: Joi.number().integer().positive().default(30000),
  SHUTDOWN_TIMEOUT: Joi.number().integer().positive().default(10000)
}).unknown(true);

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid environment configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validates the given environment (process.env by default) and returns the
 * typed configuration. Every problem is reported at once.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings in .env files mean "unset"
  const present = Object.entries(source).filter(([, v]) => v !== undefined && v !== '');
  const { error, value } = envSchema.validate(Object.fromEntries(present), {
    abortEarly: false,
    convert: true
  });

  if (error) {
    throw new ConfigError(error.details.map(detail => detail.message));
  }

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    storeDriver: value.DOCUMENT_STORE,
    databaseUrl: value.DATABASE_URL,
    databaseName: value.DATABASE_NAME,
    corsOrigin: value.CORS_ORIGIN,
    requestTimeoutMs: value.REQUEST_TIMEOUT,
    shutdownTimeoutMs: value.SHUTDOWN_TIMEOUT
  };
}

/** Loads `.env` into process.env, then validates it. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
