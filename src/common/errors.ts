/**
 * Error taxonomy for the migration run.
 *
 * Data-quality problems and classification misses are never errors; they
 * are routed through the quality gate and the classifier. What remains is
 * transient I/O (retried), per-entity failures (isolated) and fatal errors
 * (abort with the last good checkpoint left in place).
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * The recorder database is missing tables the pipeline reads from.
 */
export class RecorderSchemaError extends MigrationError {
  constructor(message: string) {
    super(message);
    this.name = 'RecorderSchemaError';
  }
}

/**
 * A retried operation failed on every attempt.
 */
export class RetryExhaustedError extends MigrationError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    lastError: unknown,
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${describeError(lastError)}`,
      lastError,
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * A batch write to the sink was rejected.
 */
export class SinkWriteError extends MigrationError {
  constructor(
    public readonly bucket: string,
    public readonly pointCount: number,
    public readonly statusCode: number | null,
    originalError: unknown,
  ) {
    super(
      `Failed to write ${pointCount} point(s) to bucket '${bucket}': ${describeError(originalError)}`,
      originalError,
    );
    this.name = 'SinkWriteError';
  }

  /** 401/403 will not heal by retrying. */
  get isAuthFailure(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

/**
 * The sink is unreachable, unhealthy or not set up for this run.
 */
export class SinkUnavailableError extends MigrationError {
  constructor(message: string, originalError?: unknown) {
    super(message, originalError);
    this.name = 'SinkUnavailableError';
  }
}

/**
 * The checkpoint file exists but cannot be read at all.
 */
export class CheckpointCorruptError extends MigrationError {
  constructor(
    public readonly filePath: string,
    message: string,
    originalError?: unknown,
  ) {
    super(`[${filePath}] ${message}`, originalError);
    this.name = 'CheckpointCorruptError';
  }
}

/**
 * Aborts the run. The checkpoint on disk is the last consistent snapshot.
 */
export class FatalMigrationError extends MigrationError {
  constructor(
    message: string,
    public readonly resumeHint: string,
    originalError?: unknown,
  ) {
    super(message, originalError);
    this.name = 'FatalMigrationError';
  }
}

/**
 * Raised between batches once the run's abort signal fires.
 */
export class MigrationInterruptedError extends MigrationError {
  constructor(public readonly resumeHint: string) {
    super('Migration interrupted');
    this.name = 'MigrationInterruptedError';
  }
}

/**
 * Format error message from unknown error type
 */
export function describeError(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}
