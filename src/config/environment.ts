import { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import { CATEGORIES } from '../classification/categories';

const LOG_LEVEL_ALIASES: Readonly<Partial<Record<string, LogLevel>>> = {
  error: 'error',
  warn: 'warn',
  warning: 'warn',
  info: 'log',
  log: 'log',
  debug: 'debug',
  verbose: 'verbose',
};

/**
 * Comma separated list, blanks removed
 */
const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const flag = (fallback: boolean) =>
  z
    .string()
    .default(String(fallback))
    .transform((value) =>
      ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase()),
    );

const boundSchema = z
  .object({
    min: z.number().nullable(),
    max: z.number().nullable(),
  })
  .refine(
    (bound) => bound.min === null || bound.max === null || bound.min <= bound.max,
    { message: 'min must not exceed max' },
  );

const qualityBoundsSchema = z.object({
  categories: z.record(z.enum(CATEGORIES), boundSchema).optional(),
  units: z.record(z.string(), boundSchema).optional(),
});

/**
 * Environment variables consumed by the migrator.
 * Values are coerced here; everything downstream works with typed config.
 */
export const environmentSchema = z.object({
  RECORDER_DB_PATH: z.string().min(1).default('./home-assistant_v2.db'),

  INFLUX_URL: z.string().url().default('http://localhost:8086'),
  // Not needed for --dry-run and --plan; checked before the first write
  INFLUX_TOKEN: z.string().default(''),
  INFLUX_ORG: z.string().default(''),
  INFLUX_BUCKET_RECENT: z.string().min(1).default('homeassistant-recent'),
  INFLUX_BUCKET_HISTORICAL: z
    .string()
    .min(1)
    .default('homeassistant-historical'),
  INFLUX_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  BATCH_SIZE: z.coerce.number().int().positive().default(1000),
  METADATA_BATCH_SIZE: z.coerce.number().int().positive().default(5000),
  CHECKPOINT_FILE: z.string().min(1).default('./export_checkpoint.json'),
  RESUME_ENABLED: flag(true),

  INCLUDE_DOMAINS: list('sensor,counter,weather,climate,utility_meter'),
  INCLUDE_UNITS: list(
    'kWh,W,°C,°F,kB/s,GB,MB,A,V,hPa,bar,mbar,lux,ppm,dB,rpm',
  ),
  INCLUDE_SOURCES: list('tibber'),
  EXCLUDE_PATTERNS: list(
    '%availability%,%status%,%signal%,%connected%,%online%,%rssi%',
  ),

  AUTO_CORRECT: flag(true),
  QUALITY_BOUNDS: z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === '') {
        return null;
      }
      try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `QUALITY_BOUNDS is not valid JSON: ${String(error)}`,
        });
        return z.NEVER;
      }
    })
    .pipe(qualityBoundsSchema.nullable()),

  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  LOG_LEVEL: z
    .string()
    .default('log')
    .transform((value, ctx) => {
      const level = LOG_LEVEL_ALIASES[value.trim().toLowerCase()];
      if (!level) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown log level '${value}'`,
        });
        return z.NEVER;
      }
      return level;
    }),
});

export type Environment = z.infer<typeof environmentSchema>;

export type QualityBoundsOverride = z.infer<typeof qualityBoundsSchema>;

/**
 * `validate` hook for ConfigModule.forRoot.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(config: Record<string, unknown>): Environment {
  const result = environmentSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
