import { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';

// Most to least severe; each setting enables itself and everything before it
const LEVELS = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'] as const satisfies readonly LogLevel[];

const levelSchema = z.enum(LEVELS).default('log');

/** Nest logger levels enabled by LOG_LEVEL */
export function logLevelsFor(value: string | undefined): LogLevel[] {
  const parsed = levelSchema.safeParse(value?.trim().toLowerCase() || undefined);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid LOG_LEVEL "${value}": expected one of ${LEVELS.join(', ')}`);
  }
  return LEVELS.slice(0, LEVELS.indexOf(parsed.data) + 1);
}
