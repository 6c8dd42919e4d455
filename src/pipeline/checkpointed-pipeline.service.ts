import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ClassificationSummary,
  ClassifiedEntity,
  EntityClassifier,
  emptySummary,
  mergeSummaries,
} from '../classification/entity-classifier';
import {
  describeError,
  FatalMigrationError,
  MigrationInterruptedError,
  SinkWriteError,
} from '../common/errors';
import { prefetchOne } from '../common/prefetch';
import { withRetry } from '../common/retry';
import { RunContext } from '../config/run-context';
import { QualityGate } from '../quality/quality-gate';
import { QualityReport } from '../quality/quality-report';
import { SERIES_TIERS, SeriesTier, RawRecord } from '../source/dto/recorder.dto';
import {
  POINT_SINK,
  PointSink,
} from '../sink/interfaces/point-sink.interface';
import { buildSinkPoint, SinkPoint } from '../sink/point.builder';
import { MetadataPage, MetadataStream } from '../streams/metadata.stream';
import { RecordStream } from '../streams/record.stream';
import { CheckpointState, CheckpointStore } from './checkpoint.store';
import {
  CheckpointOutcome,
  FailedEntity,
  MigrationSummary,
  PlanSummary,
} from './migration-summary';
import {
  emptyCounters,
  ProgressCounters,
  ProgressListener,
  progressPercent,
  ProgressReporter,
} from './progress.reporter';

const PLAN_SAMPLE_SIZE = 10;

/**
 * Mutable bookkeeping for one invocation of `run`
 */
interface RunProgress {
  readonly context: RunContext;
  readonly state: CheckpointState;
  readonly report: QualityReport;
  readonly counters: ProgressCounters;
  readonly recordsByTier: Record<SeriesTier, number>;
  readonly failures: Map<string, string>;
  readonly listener?: ProgressListener;
  estimatedTotal: number;
  /** 1-based metadata position of the entity being exported */
  position: number;
  classification: ClassificationSummary;
  skipped: number;
  filtered: number;
}

/**
 * CheckpointedPipeline
 *
 * Drives one migration run: metadata pages are classified, then every
 * accepted entity is exported tier by tier, one record batch at a time.
 *
 * Per batch: validate -> build points -> write -> advance checkpoint ->
 * persist. The checkpoint only moves after the sink confirmed the write,
 * so an interruption loses at most the batch in flight and a resume may
 * re-send at most one batch (overwritten on the sink).
 *
 * Failures:
 * - entity-level (its statistics cannot be read): entity marked failed,
 *   run continues
 * - sink, checkpoint and metadata failures: FatalMigrationError, the last
 *   persisted checkpoint stays in place
 * - abort signal: MigrationInterruptedError between batches
 */
@Injectable()
export class CheckpointedPipeline {
  private readonly logger = new Logger(CheckpointedPipeline.name);

  constructor(
    private readonly metadataStream: MetadataStream,
    private readonly classifier: EntityClassifier,
    private readonly recordStream: RecordStream,
    private readonly qualityGate: QualityGate,
    private readonly checkpointStore: CheckpointStore,
    private readonly progressReporter: ProgressReporter,
    @Inject(POINT_SINK) private readonly sink: PointSink,
  ) {}

  async run(
    context: RunContext,
    listener?: ProgressListener,
  ): Promise<MigrationSummary> {
    const startTime = Date.now();

    try {
      const state = await this.initializeState(context);
      if (!context.dryRun) {
        await this.sink.verify(
          SERIES_TIERS.map((tier) => context.buckets[tier]),
        );
      }

      const progress: RunProgress = {
        context,
        state,
        report: new QualityReport(),
        counters: emptyCounters(),
        recordsByTier: { short_term: 0, long_term: 0 },
        failures: new Map(),
        listener,
        estimatedTotal: await this.metadataStream.estimateCount(),
        position: state.metadataCursor,
        classification: emptySummary(),
        skipped: 0,
        filtered: 0,
      };
      progress.counters.entitiesScanned = state.metadataCursor;

      for await (const page of this.metadataStream.pages(
        context,
        state.metadataCursor,
      )) {
        this.throwIfAborted(context);
        await this.processPage(progress, page);
        state.metadataCursor = page.nextOffset;
        await this.persist(context, state);
      }

      return await this.finish(progress, startTime);
    } catch (error) {
      throw this.toFatal(context, error);
    }
  }

  private async processPage(
    progress: RunProgress,
    page: MetadataPage,
  ): Promise<void> {
    const { context, state, counters } = progress;
    const { accepted, summary } = this.classifier.classifyPage(
      page.entities,
      context.classification,
    );
    progress.classification = mergeSummaries(progress.classification, summary);
    counters.entitiesScanned = page.nextOffset;
    counters.entitiesAccepted += accepted.length;
    this.progressReporter.emit(
      {
        kind: 'metadata_page',
        offset: page.offset,
        pageSize: page.entities.length,
        counters,
        percent: progressPercent(page.nextOffset, progress.estimatedTotal),
      },
      progress.listener,
    );

    for (const entity of accepted) {
      const { externalId } = entity.descriptor;
      if (!matchesEntityFilter(externalId, context.entityFilter)) {
        progress.filtered++;
        continue;
      }
      if (state.isCompleted(externalId)) {
        progress.skipped++;
        continue;
      }
      this.throwIfAborted(context);
      progress.position =
        page.offset + page.entities.indexOf(entity.descriptor) + 1;
      await this.exportEntity(progress, entity);
    }
  }

  /**
   * Classification only: scans all metadata, reads no statistics and
   * leaves the checkpoint alone.
   */
  async plan(context: RunContext): Promise<PlanSummary> {
    let classification = emptySummary();
    const selectedByUnit: Record<string, number> = {};
    const sample: string[] = [];
    let selected = 0;

    for await (const page of this.metadataStream.pages(context)) {
      const { accepted, summary } = this.classifier.classifyPage(
        page.entities,
        context.classification,
      );
      classification = mergeSummaries(classification, summary);

      for (const { descriptor } of accepted) {
        if (!matchesEntityFilter(descriptor.externalId, context.entityFilter)) {
          continue;
        }
        selected++;
        const unit = descriptor.unit ?? '(none)';
        selectedByUnit[unit] = (selectedByUnit[unit] ?? 0) + 1;
        if (sample.length < PLAN_SAMPLE_SIZE) {
          sample.push(descriptor.externalId);
        }
      }
    }

    return { classification, selected, selectedByUnit, sample };
  }

  private async initializeState(context: RunContext): Promise<CheckpointState> {
    const file = context.checkpointFile;

    if (context.reset && !context.dryRun) {
      const removed = await this.checkpointStore.remove(file);
      if (removed) {
        this.logger.log(`Checkpoint ${file} deleted (--reset)`);
      }
    }

    if (context.reset || !context.resume) {
      return CheckpointState.fresh(context.runId, context.startedAt);
    }

    const snapshot = await this.checkpointStore.load(file, {
      quarantine: !context.dryRun,
    });
    if (!snapshot) {
      return CheckpointState.fresh(context.runId, context.startedAt);
    }

    this.logger.log(
      `Resuming run ${snapshot.runId}: ${snapshot.entitiesCompleted.length} entities completed, metadata cursor ${snapshot.metadataCursor}` +
        (snapshot.inProgress
          ? `, continuing ${snapshot.inProgress.externalId}`
          : ''),
    );
    return CheckpointState.fromSnapshot(snapshot);
  }

  /**
   * Export both tiers of one entity. Source failures are isolated to the
   * entity; fatal errors and interrupts propagate.
   */
  private async exportEntity(
    progress: RunProgress,
    entity: ClassifiedEntity,
  ): Promise<void> {
    const { context, state, counters } = progress;
    const { externalId, entityKey } = entity.descriptor;
    const resumeFrom = {
      short_term: state.resumeAfter(externalId, 'short_term'),
      long_term: state.resumeAfter(externalId, 'long_term'),
    };
    state.begin(externalId);

    try {
      for (const tier of SERIES_TIERS) {
        const batches = this.recordStream.batches(
          context,
          [entityKey],
          tier,
          resumeFrom[tier],
        );
        for await (const records of prefetchOne(batches)) {
          this.throwIfAborted(context);
          await this.processBatch(progress, entity, tier, records);
        }
      }
    } catch (error) {
      if (
        error instanceof FatalMigrationError ||
        error instanceof MigrationInterruptedError
      ) {
        throw error;
      }

      const message = describeError(error);
      this.logger.error(`Entity ${externalId} failed, continuing: ${message}`);
      state.fail(externalId);
      progress.failures.set(externalId, message);
      counters.entitiesFailed++;
      await this.persist(context, state);
      return;
    }

    state.complete(externalId);
    counters.entitiesCompleted++;
    await this.persist(context, state);
  }

  private async processBatch(
    progress: RunProgress,
    entity: ClassifiedEntity,
    tier: SeriesTier,
    records: RawRecord[],
  ): Promise<void> {
    const { context, state, counters } = progress;
    const { externalId } = entity.descriptor;

    const screened = this.qualityGate.screen(
      records,
      entity,
      context.quality,
      progress.report,
    );
    const points = screened.records.map((record) =>
      buildSinkPoint(record, entity),
    );

    if (!context.dryRun && points.length > 0) {
      await this.writeBatch(context, context.buckets[tier], points);
    }

    // Batches are timestamp ordered per entity
    const lastTimestamp = records[records.length - 1].timestamp;
    state.advance(externalId, tier, lastTimestamp);
    state.addTotals({
      recordsRead: records.length,
      pointsWritten: points.length,
      recordsCorrected: screened.corrected,
      recordsDropped: screened.dropped,
    });
    await this.persist(context, state);

    counters.recordsRead += records.length;
    counters.recordsCorrected += screened.corrected;
    counters.recordsDropped += screened.dropped;
    counters.pointsWritten += points.length;
    progress.recordsByTier[tier] += records.length;

    this.progressReporter.emit(
      {
        kind: 'record_batch',
        externalId,
        tier,
        batchSize: records.length,
        lastTimestamp,
        counters,
        percent: progressPercent(progress.position, progress.estimatedTotal),
      },
      progress.listener,
    );
  }

  /**
   * Transient write failures are retried; authentication failures and
   * exhausted retries abort the run.
   */
  private async writeBatch(
    context: RunContext,
    bucket: string,
    points: readonly SinkPoint[],
  ): Promise<void> {
    try {
      await withRetry(() => this.sink.write(bucket, points), context.retry, {
        label: `Writing ${points.length} points to '${bucket}'`,
        logger: this.logger,
        shouldRetry: (error) =>
          !(error instanceof SinkWriteError && error.isAuthFailure),
      });
    } catch (error) {
      throw new FatalMigrationError(
        `Sink write failed: ${describeError(error)}`,
        resumeHint(context),
        error,
      );
    }
  }

  private async persist(
    context: RunContext,
    state: CheckpointState,
  ): Promise<void> {
    if (context.dryRun) {
      return;
    }
    try {
      await this.checkpointStore.save(context.checkpointFile, state.toSnapshot());
    } catch (error) {
      throw new FatalMigrationError(
        `Cannot persist checkpoint ${context.checkpointFile}: ${describeError(error)}`,
        resumeHint(context),
        error,
      );
    }
  }

  private async finish(
    progress: RunProgress,
    startTime: number,
  ): Promise<MigrationSummary> {
    const { context, state, counters, report } = progress;
    const failures: FailedEntity[] = state.failedEntities.map((externalId) => ({
      externalId,
      error: progress.failures.get(externalId) ?? null,
    }));

    let checkpoint: CheckpointOutcome = 'untouched';
    let checkpointPath: string | null = null;
    let hint: string | null = null;

    if (!context.dryRun && failures.length === 0 && context.entityFilter === null) {
      checkpointPath = await this.checkpointStore.archive(
        context.checkpointFile,
        state.runId,
      );
      checkpoint = 'archived';
    } else if (!context.dryRun) {
      // A filtered run leaves the rest of the export open. Either way the
      // next run rescans all metadata and skips what is already completed.
      state.metadataCursor = 0;
      await this.persist(context, state);
      checkpoint = 'kept';
      checkpointPath = context.checkpointFile;
      if (failures.length > 0) {
        hint = `${failures.length} entities failed. ${resumeHint(context)}`;
      }
    }

    const durationMs = Date.now() - startTime;
    const totals = report.totals();
    return {
      runId: context.runId,
      dryRun: context.dryRun,
      durationMs,
      entitiesScanned: counters.entitiesScanned,
      entitiesAccepted: counters.entitiesAccepted,
      entitiesCompleted: counters.entitiesCompleted,
      entitiesSkipped: progress.skipped,
      entitiesFiltered: progress.filtered,
      failures,
      recordsRead: { ...progress.recordsByTier },
      pointsWritten: counters.pointsWritten,
      recordsCorrected: counters.recordsCorrected,
      recordsDropped: counters.recordsDropped,
      dropReasons: totals.dropReasons,
      recordsPerSecond:
        durationMs > 0 ? (counters.recordsRead / durationMs) * 1000 : 0,
      classification: progress.classification,
      qualityFlagged: report.flagged(),
      checkpoint,
      checkpointPath,
      resumeHint: hint,
    };
  }

  private throwIfAborted(context: RunContext): void {
    if (context.signal.aborted) {
      throw new MigrationInterruptedError(resumeHint(context));
    }
  }

  private toFatal(
    context: RunContext,
    error: unknown,
  ): FatalMigrationError | MigrationInterruptedError {
    if (
      error instanceof FatalMigrationError ||
      error instanceof MigrationInterruptedError
    ) {
      return error;
    }
    return new FatalMigrationError(
      describeError(error),
      resumeHint(context),
      error,
    );
  }
}

function matchesEntityFilter(externalId: string, filter: string | null): boolean {
  return filter === null || externalId.toLowerCase().includes(filter.toLowerCase());
}

function resumeHint(context: RunContext): string {
  if (context.dryRun) {
    return 'Dry run: nothing was written. Re-run the same command to try again.';
  }
  return `Re-run the same command to resume from ${context.checkpointFile}, or pass --reset to start over.`;
}
