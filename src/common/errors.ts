export type PipelineErrorKind =
  | 'transient'
  | 'data_quality'
  | 'integrity'
  | 'configuration'
  | 'missing_input'
  | 'cancelled'
  | 'unknown';

/**
 * Base class for every failure the pipeline knows how to classify.
 * The runner reports `kind` alongside the failing stage.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Store or connection temporarily unavailable; safe to retry */
export class TransientIoError extends PipelineError {
  readonly kind = 'transient' as const;
}

/** Bad records beyond what the cleaner is allowed to drop */
export class DataQualityError extends PipelineError {
  readonly kind = 'data_quality' as const;
}

/** Key collisions and constraint violations — retrying cannot fix these */
export class IntegrityError extends PipelineError {
  readonly kind = 'integrity' as const;

  constructor(
    message: string,
    readonly details: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Missing or invalid parameters, raised before any stage runs */
export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration' as const;
}

/** The upstream partition a stage depends on has not been published */
export class PartitionMissingError extends PipelineError {
  readonly kind = 'missing_input' as const;
}

export class PipelineCancelledError extends PipelineError {
  readonly kind = 'cancelled' as const;
}

export function errorKind(err: unknown): PipelineErrorKind {
  return err instanceof PipelineError ? err.kind : 'unknown';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** errno / SQLSTATE carried by Node and driver errors */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' ? code : undefined;
}

// errno codes of a store that may recover on retry
const TRANSIENT_FS_CODES = new Set([
  'EAGAIN',
  'EBUSY',
  'EIO',
  'EMFILE',
  'ENFILE',
  'ETIMEDOUT',
  'ESTALE',
  'ENOTCONN',
  'ENOSPC',
]);

/** Wraps a file-system failure: transient errno codes become retryable */
export function classifyFsError(err: unknown, action: string): Error {
  if (err instanceof PipelineError) return err;
  const code = errorCode(err);
  if (code && TRANSIENT_FS_CODES.has(code)) {
    return new TransientIoError(`${action} failed (${code}): ${errorMessage(err)}`, { cause: err });
  }
  return err instanceof Error ? err : new Error(`${action} failed: ${String(err)}`);
}
