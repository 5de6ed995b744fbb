import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_FAILURE_RATE,
  DEFAULT_RECORDS_PER_DAY,
} from '../common/constants';
import { ConfigurationError } from '../common/errors';
import { RetryPolicy } from '../common/retry';

export interface DelayThresholds {
  /** processing_time below this is "fast" */
  fastBelowSeconds: number;
  /** processing_time below this (and not fast) is "medium"; otherwise "slow" */
  mediumBelowSeconds: number;
}

export interface PipelineConfig {
  dataDir: string;
  recordsPerDay: number;
  failureRate: number;
  /** Fixed generator seed; when absent each date seeds itself */
  generatorSeed: number | null;
  delayThresholds: DelayThresholds;
  /** Fraction of records (0–1) above which dropping becomes fatal; null = only when nothing survives */
  dropRateFatalThreshold: number | null;
  concurrency: number;
  retry: {
    generate: RetryPolicy;
    transform: RetryPolicy;
    load: RetryPolicy;
  };
}

const optionalNumber = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? Number(v) : undefined))
  .pipe(z.number().finite().optional());

const envSchema = z
  .object({
    DATA_DIR: z.string().trim().min(1).default('./data'),
    RECORDS_PER_DAY: z.coerce.number().int().positive().default(DEFAULT_RECORDS_PER_DAY),
    FAILURE_RATE: z.coerce.number().min(0).max(1).default(DEFAULT_FAILURE_RATE),
    GENERATOR_SEED: optionalNumber.pipe(z.number().int().optional()),
    DELAY_FAST_BELOW_SECONDS: z.coerce.number().positive().default(2),
    DELAY_MEDIUM_BELOW_SECONDS: z.coerce.number().positive().default(5),
    DROP_RATE_FATAL_THRESHOLD: optionalNumber.pipe(z.number().min(0).max(1).optional()),
    PIPELINE_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
    GENERATE_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
    GENERATE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
    TRANSFORM_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
    TRANSFORM_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
    LOAD_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(4),
    LOAD_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  })
  .refine((env) => env.DELAY_FAST_BELOW_SECONDS < env.DELAY_MEDIUM_BELOW_SECONDS, {
    message: 'DELAY_FAST_BELOW_SECONDS must be lower than DELAY_MEDIUM_BELOW_SECONDS',
    path: ['DELAY_FAST_BELOW_SECONDS'],
  });

/** Builds the typed pipeline settings from environment variables */
export function buildPipelineConfig(env: Record<string, string | undefined>): PipelineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid pipeline configuration — ${issues.join('; ')}`);
  }
  const e = result.data;

  return {
    dataDir: e.DATA_DIR,
    recordsPerDay: e.RECORDS_PER_DAY,
    failureRate: e.FAILURE_RATE,
    generatorSeed: e.GENERATOR_SEED ?? null,
    delayThresholds: {
      fastBelowSeconds: e.DELAY_FAST_BELOW_SECONDS,
      mediumBelowSeconds: e.DELAY_MEDIUM_BELOW_SECONDS,
    },
    dropRateFatalThreshold: e.DROP_RATE_FATAL_THRESHOLD ?? null,
    concurrency: e.PIPELINE_CONCURRENCY,
    retry: {
      generate: { attempts: e.GENERATE_RETRY_ATTEMPTS, delayMs: e.GENERATE_RETRY_DELAY_MS, backoff: 'fixed' },
      transform: { attempts: e.TRANSFORM_RETRY_ATTEMPTS, delayMs: e.TRANSFORM_RETRY_DELAY_MS, backoff: 'fixed' },
      load: { attempts: e.LOAD_RETRY_ATTEMPTS, delayMs: e.LOAD_RETRY_DELAY_MS, backoff: 'linear' },
    },
  };
}

export default registerAs('pipeline', () => buildPipelineConfig(process.env));
