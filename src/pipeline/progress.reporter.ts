import { Injectable, Logger } from '@nestjs/common';
import { SeriesTier } from '../source/dto/recorder.dto';

/**
 * Running counts for the current invocation
 */
export interface ProgressCounters {
  entitiesScanned: number;
  entitiesAccepted: number;
  entitiesCompleted: number;
  entitiesFailed: number;
  recordsRead: number;
  recordsCorrected: number;
  recordsDropped: number;
  /** Points confirmed by the sink, or that would be written in a dry run */
  pointsWritten: number;
}

export type ProgressEvent =
  | {
      kind: 'metadata_page';
      offset: number;
      pageSize: number;
      counters: ProgressCounters;
      /** Share of the estimated entity count scanned; null without estimate */
      percent: number | null;
    }
  | {
      kind: 'record_batch';
      externalId: string;
      tier: SeriesTier;
      batchSize: number;
      lastTimestamp: number;
      counters: ProgressCounters;
      percent: number | null;
    };

export type ProgressListener = (event: ProgressEvent) => void;

export function emptyCounters(): ProgressCounters {
  return {
    entitiesScanned: 0,
    entitiesAccepted: 0,
    entitiesCompleted: 0,
    entitiesFailed: 0,
    recordsRead: 0,
    recordsCorrected: 0,
    recordsDropped: 0,
    pointsWritten: 0,
  };
}

/**
 * The estimate may be below the real count, so this is capped at 100.
 */
export function progressPercent(
  scanned: number,
  estimatedTotal: number,
): number | null {
  if (estimatedTotal <= 0) {
    return null;
  }
  return Math.min(100, Math.round((scanned / estimatedTotal) * 1000) / 10);
}

/**
 * ProgressReporter
 *
 * Fans progress events out to the caller's listener and the log. Metadata
 * pages log at `log`, record batches at `debug`.
 */
@Injectable()
export class ProgressReporter {
  private readonly logger = new Logger(ProgressReporter.name);

  emit(event: ProgressEvent, listener?: ProgressListener): void {
    // Listener gets its own copy; counters keep changing after emit
    const snapshot: ProgressEvent = { ...event, counters: { ...event.counters } };
    listener?.(snapshot);

    const { counters } = event;
    const percent = event.percent === null ? '' : ` (${event.percent}%)`;

    if (event.kind === 'metadata_page') {
      this.logger.log(
        `Scanned ${counters.entitiesScanned} entities${percent}: ${counters.entitiesAccepted} accepted, ${counters.entitiesCompleted} completed, ${counters.entitiesFailed} failed, ${counters.pointsWritten} points written`,
      );
      return;
    }

    this.logger.debug(
      `${event.externalId} [${event.tier}] +${event.batchSize} records up to ${event.lastTimestamp}${percent}: read=${counters.recordsRead} corrected=${counters.recordsCorrected} dropped=${counters.recordsDropped} written=${counters.pointsWritten}`,
    );
  }
}
