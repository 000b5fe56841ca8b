/**
 * App configuration.
 *
 * Built once from the environment at process start, frozen, and passed to
 * whatever needs it. Nothing else in the service reads `process.env`.
 */
import { z } from 'zod';

export const JWT_ALGORITHMS = [
  'HS256', 'HS384', 'HS512',
  'RS256', 'RS384', 'RS512',
  'ES256', 'ES384', 'ES512',
  'PS256', 'PS384', 'PS512',
] as const;

export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  JWT_SECRET_KEY: z.string().min(1, 'JWT_SECRET_KEY is required'),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  SHOP_SERVICE_URL: z.string().url().default('http://127.0.0.1:8001/api/shops/'),
  SHOP_SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DATABASE_PATH: z.string().min(1).default('./data/catalog.sqlite'),
  UPLOAD_PATH: z.string().min(1).default('./uploads'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(20),
  DEFAULT_RADIUS_KM: z.coerce.number().nonnegative().default(5.0),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface AppConfig {
  readonly port: number;
  readonly nodeEnv: 'development' | 'production' | 'test';
  readonly jwt: {
    readonly secretKey: string;
    readonly algorithm: JwtAlgorithm;
  };
  readonly shopService: {
    readonly url: string;
    readonly timeoutMs: number;
  };
  readonly databasePath: string;
  readonly uploads: {
    readonly path: string;
    readonly maxFileSize: number;
  };
  readonly requestTimeoutMs: number;
  readonly pageSize: number;
  readonly defaultRadiusKm: number;
  readonly corsOrigins: readonly string[];
  readonly logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validates the environment and returns a frozen config.
 * Throws {@link ConfigError} listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }

  const values = result.data;

  return Object.freeze({
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    jwt: Object.freeze({
      secretKey: values.JWT_SECRET_KEY,
      algorithm: values.JWT_ALGORITHM,
    }),
    shopService: Object.freeze({
      url: values.SHOP_SERVICE_URL,
      timeoutMs: values.SHOP_SERVICE_TIMEOUT_MS,
    }),
    databasePath: values.DATABASE_PATH,
    uploads: Object.freeze({
      path: values.UPLOAD_PATH,
      maxFileSize: values.MAX_FILE_SIZE,
    }),
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    pageSize: values.PAGE_SIZE,
    defaultRadiusKm: values.DEFAULT_RADIUS_KM,
    corsOrigins: Object.freeze(
      values.CORS_ORIGIN.split(',').map((o) => o.trim()).filter((o) => o.length > 0),
    ),
    logLevel: values.LOG_LEVEL,
  });
}
