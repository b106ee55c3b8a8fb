/**
 * Deployment configuration: read once from the environment and validated.
 *
 * Business logic never reads `process.env`; it receives these values through
 * `openRecordStore()` and `createQueueService()`.
 */
import { z } from 'zod';
import { parseInput } from '@queueline/shared';
import type { StorageDriver } from '../storage/types';
import type { FallbackPolicy } from '../storage/fallback-record-store';

export interface DeploymentConfig {
  isProduction: boolean;
  storage: {
    driver: StorageDriver;
    fallbackPolicy: FallbackPolicy;
    localDataFile: string;
  };
  database: {
    url?: string;
    poolSize: number;
  };
  queue: {
    publicBaseUrl: string;
    retryAttempts: number;
    retryBaseDelayMs: number;
    minutesPerVisitor: number;
  };
}

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .optional();

const envSchema = z
  .object({
    NODE_ENV: optionalString,
    QUEUE_STORAGE_DRIVER: z.enum(['remote', 'local']).optional(),
    QUEUE_FALLBACK_POLICY: z.enum(['fail', 'fallback']).default('fail'),
    QUEUE_LOCAL_DATA_FILE: z.string().min(1).default('./data/queue-data.db'),
    DATABASE_URL: optionalString,
    DB_POOL_MAX: z.coerce.number().int().min(1).max(50).default(2),
    QUEUE_PUBLIC_BASE_URL: z.string().url().default('http://localhost:3000'),
    QUEUE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
    QUEUE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).max(5_000).default(10),
    QUEUE_MINUTES_PER_VISITOR: z.coerce.number().min(0).max(240).default(5),
  })
  .superRefine((env, ctx) => {
    const driver = env.QUEUE_STORAGE_DRIVER ?? (env.DATABASE_URL ? 'remote' : 'local');
    if (driver === 'remote' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when QUEUE_STORAGE_DRIVER=remote',
      });
    }
  });

let _config: DeploymentConfig | null = null;

/** Builds a config from an explicit environment map. Throws ValidationError. */
export function loadDeploymentConfig(env: NodeJS.ProcessEnv = process.env): DeploymentConfig {
  const parsed = parseInput(envSchema, env, 'Invalid queue configuration');
  return {
    isProduction: parsed.NODE_ENV === 'production',
    storage: {
      driver: parsed.QUEUE_STORAGE_DRIVER ?? (parsed.DATABASE_URL ? 'remote' : 'local'),
      fallbackPolicy: parsed.QUEUE_FALLBACK_POLICY,
      localDataFile: parsed.QUEUE_LOCAL_DATA_FILE,
    },
    database: {
      url: parsed.DATABASE_URL,
      poolSize: parsed.DB_POOL_MAX,
    },
    queue: {
      publicBaseUrl: parsed.QUEUE_PUBLIC_BASE_URL,
      retryAttempts: parsed.QUEUE_RETRY_ATTEMPTS,
      retryBaseDelayMs: parsed.QUEUE_RETRY_BASE_DELAY_MS,
      minutesPerVisitor: parsed.QUEUE_MINUTES_PER_VISITOR,
    },
  };
}

export function getDeploymentConfig(): DeploymentConfig {
  if (_config) return _config;
  _config = loadDeploymentConfig();
  return _config;
}

/** Reset cached config (for testing) */
export function resetDeploymentConfig(): void {
  _config = null;
}
