import { Injectable, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from './environment';
import { buildRunContext, logLevelsFor, RunContext, RunOptions } from './run-context';

/**
 * Turns the validated environment plus CLI switches into a RunContext.
 */
@Injectable()
export class RunContextFactory {
  constructor(
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  create(options: RunOptions, now?: Date): RunContext {
    return buildRunContext(this.environment(), options, now);
  }

  logLevels(verbose: boolean): LogLevel[] {
    return logLevelsFor(
      this.configService.get('LOG_LEVEL', { infer: true }),
      verbose,
    );
  }

  private environment(): Environment {
    const config = this.configService;
    return {
      RECORDER_DB_PATH: config.get('RECORDER_DB_PATH', { infer: true }),
      INFLUX_URL: config.get('INFLUX_URL', { infer: true }),
      INFLUX_TOKEN: config.get('INFLUX_TOKEN', { infer: true }),
      INFLUX_ORG: config.get('INFLUX_ORG', { infer: true }),
      INFLUX_BUCKET_RECENT: config.get('INFLUX_BUCKET_RECENT', { infer: true }),
      INFLUX_BUCKET_HISTORICAL: config.get('INFLUX_BUCKET_HISTORICAL', {
        infer: true,
      }),
      INFLUX_TIMEOUT_MS: config.get('INFLUX_TIMEOUT_MS', { infer: true }),
      BATCH_SIZE: config.get('BATCH_SIZE', { infer: true }),
      METADATA_BATCH_SIZE: config.get('METADATA_BATCH_SIZE', { infer: true }),
      CHECKPOINT_FILE: config.get('CHECKPOINT_FILE', { infer: true }),
      RESUME_ENABLED: config.get('RESUME_ENABLED', { infer: true }),
      INCLUDE_DOMAINS: config.get('INCLUDE_DOMAINS', { infer: true }),
      INCLUDE_UNITS: config.get('INCLUDE_UNITS', { infer: true }),
      INCLUDE_SOURCES: config.get('INCLUDE_SOURCES', { infer: true }),
      EXCLUDE_PATTERNS: config.get('EXCLUDE_PATTERNS', { infer: true }),
      AUTO_CORRECT: config.get('AUTO_CORRECT', { infer: true }),
      QUALITY_BOUNDS: config.get('QUALITY_BOUNDS', { infer: true }),
      MAX_RETRIES: config.get('MAX_RETRIES', { infer: true }),
      RETRY_BASE_DELAY_MS: config.get('RETRY_BASE_DELAY_MS', { infer: true }),
      LOG_LEVEL: config.get('LOG_LEVEL', { infer: true }),
    };
  }
}
