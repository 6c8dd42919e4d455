#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { parseArgs } from 'node:util';
import { AppModule } from './app.module';
import {
  describeError,
  FatalMigrationError,
  MigrationInterruptedError,
} from './common/errors';
import { RunContextFactory } from './config/run-context.factory';
import { CheckpointedPipeline } from './pipeline/checkpointed-pipeline.service';
import { formatPlan, formatSummary } from './pipeline/migration-summary';

enum ExitCode {
  Success = 0,
  Fatal = 1,
  EntityFailures = 2,
  Interrupted = 130,
}

const USAGE = `Usage: recorder-migrate [options]

Migrate recorder statistics into InfluxDB 2. Re-running resumes from the
checkpoint file.

Options:
  --dry-run            Read, classify and validate without writing
  --reset              Delete the checkpoint and start over
  --entities <text>    Only entities whose id contains <text>
  --plan               Show the classification breakdown and exit
  --env-file <path>    Load variables from <path> instead of .env
  -v, --verbose        Debug logging
  -h, --help           Show this help
`;

async function bootstrap(): Promise<ExitCode> {
  const { values } = parseArgs({
    options: {
      'dry-run': { type: 'boolean', default: false },
      reset: { type: 'boolean', default: false },
      entities: { type: 'string' },
      plan: { type: 'boolean', default: false },
      'env-file': { type: 'string' },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return ExitCode.Success;
  }

  const app = await NestFactory.createApplicationContext(
    AppModule.register({ envFilePath: values['env-file'] }),
    { bufferLogs: true, abortOnError: false },
  );
  const logger = new Logger('RecorderMigrate');
  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`${signal} received, stopping after the current batch`);
    abort.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const contextFactory = app.get(RunContextFactory);
    app.useLogger(contextFactory.logLevels(values.verbose ?? false));
    app.flushLogs();

    const context = contextFactory.create({
      dryRun: values['dry-run'] ?? false,
      reset: values.reset ?? false,
      entityFilter: values.entities ?? null,
      signal: abort.signal,
    });
    const pipeline = app.get(CheckpointedPipeline);

    if (values.plan) {
      const plan = await pipeline.plan(context);
      formatPlan(plan).forEach((line) => logger.log(line));
      return ExitCode.Success;
    }

    logger.log(
      `Starting run ${context.runId}${context.dryRun ? ' (dry run)' : ''}`,
    );
    const summary = await pipeline.run(context);
    formatSummary(summary).forEach((line) => logger.log(line));
    return summary.failures.length > 0
      ? ExitCode.EntityFailures
      : ExitCode.Success;
  } catch (error) {
    if (error instanceof MigrationInterruptedError) {
      logger.warn(`${error.message}. ${error.resumeHint}`);
      return ExitCode.Interrupted;
    }
    if (error instanceof FatalMigrationError) {
      logger.error(`Migration aborted: ${error.message}`);
      logger.error(error.resumeHint);
      return ExitCode.Fatal;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await app.close();
  }
}

void (async () => {
  try {
    process.exit(await bootstrap());
  } catch (error) {
    new Logger('RecorderMigrate').error(
      describeError(error),
      error instanceof Error ? error.stack : undefined,
    );
    process.exit(ExitCode.Fatal);
  }
})();
