import { LogLevel } from '@nestjs/common';
import { ClassificationRules } from '../classification/entity-classifier';
import { compileExclusionPattern } from '../classification/exclusion-pattern';
import { RetryPolicy } from '../common/retry';
import { SeriesTier } from '../source/dto/recorder.dto';
import {
  DEFAULT_CATEGORY_BOUNDS,
  DEFAULT_UNIT_BOUNDS,
  QualityRules,
} from '../quality/quality-bounds';
import { Environment } from './environment';

/**
 * Per-invocation switches from the command line.
 */
export interface RunOptions {
  dryRun: boolean;
  /** Delete the checkpoint before starting */
  reset: boolean;
  /** Case-insensitive substring an entity id must contain */
  entityFilter: string | null;
  /** Cancels the run between batches */
  signal?: AbortSignal;
}

/**
 * Everything one migration run needs, resolved once at startup and passed
 * explicitly to every stage. Nothing here changes during the run.
 */
export interface RunContext {
  readonly runId: string;
  readonly startedAt: Date;
  readonly dryRun: boolean;
  readonly reset: boolean;
  /** False discards an existing checkpoint instead of resuming from it */
  readonly resume: boolean;
  readonly entityFilter: string | null;

  readonly metadataPageSize: number;
  readonly recordBatchSize: number;
  readonly checkpointFile: string;
  /** Target bucket per tier */
  readonly buckets: Readonly<Record<SeriesTier, string>>;

  readonly classification: ClassificationRules;
  readonly quality: QualityRules;
  readonly retry: RetryPolicy;
  readonly signal: AbortSignal;
}

const MAX_RETRY_DELAY_MS = 60_000;

export function buildRunContext(
  env: Environment,
  options: RunOptions,
  now: Date = new Date(),
): RunContext {
  const specialSources = new Set(env.INCLUDE_SOURCES);

  return {
    runId: formatRunId(now),
    startedAt: now,
    dryRun: options.dryRun,
    reset: options.reset,
    resume: env.RESUME_ENABLED,
    entityFilter: options.entityFilter?.trim() || null,

    metadataPageSize: env.METADATA_BATCH_SIZE,
    recordBatchSize: env.BATCH_SIZE,
    checkpointFile: env.CHECKPOINT_FILE,
    buckets: {
      short_term: env.INFLUX_BUCKET_RECENT,
      long_term: env.INFLUX_BUCKET_HISTORICAL,
    },

    classification: {
      allowedDomains: new Set([...env.INCLUDE_DOMAINS, ...specialSources]),
      specialSources,
      allowedUnits: new Set(env.INCLUDE_UNITS),
      exclusionPatterns: env.EXCLUDE_PATTERNS.map(compileExclusionPattern),
    },
    quality: {
      autoCorrect: env.AUTO_CORRECT,
      categoryBounds: {
        ...DEFAULT_CATEGORY_BOUNDS,
        ...env.QUALITY_BOUNDS?.categories,
      },
      unitBounds: { ...DEFAULT_UNIT_BOUNDS, ...env.QUALITY_BOUNDS?.units },
    },
    retry: {
      maxRetries: env.MAX_RETRIES,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: MAX_RETRY_DELAY_MS,
    },
    signal: options.signal ?? new AbortController().signal,
  };
}

/**
 * `YYYYMMDD_HHMMSS` in UTC, used in archive file names
 */
export function formatRunId(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '')}_${iso
    .slice(11, 19)
    .replaceAll(':', '')}`;
}

const LOG_LEVEL_ORDER: LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

/**
 * Nest enables levels individually; expand a threshold into the list.
 */
export function logLevelsFor(threshold: LogLevel, verbose = false): LogLevel[] {
  const effective = verbose ? 'verbose' : threshold;
  return LOG_LEVEL_ORDER.slice(0, LOG_LEVEL_ORDER.indexOf(effective) + 1);
}
