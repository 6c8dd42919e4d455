import { Inject, Injectable, Logger } from '@nestjs/common';
import { withRetry } from '../common/retry';
import { RunContext } from '../config/run-context';
import { RawRecord, SeriesTier } from '../source/dto/recorder.dto';
import {
  RECORDER_SOURCE,
  RecorderSource,
  StatisticsCursor,
} from '../source/interfaces/recorder-source.interface';

/**
 * SQLite's default limit on bound parameters in one statement
 */
export const MAX_PUSHDOWN_KEYS = 999;

/**
 * RecordStream
 *
 * Keyset-paginated iteration over statistics rows for a set of entities,
 * ordered by (entityKey, timestamp). Up to MAX_PUSHDOWN_KEYS keys are pushed
 * into the query as an IN list; larger sets scan unfiltered and test
 * membership client-side.
 */
@Injectable()
export class RecordStream {
  private readonly logger = new Logger(RecordStream.name);

  constructor(
    @Inject(RECORDER_SOURCE) private readonly source: RecorderSource,
  ) {}

  /**
   * Yields non-empty batches of at most `context.recordBatchSize` records
   * with `timestamp > resumeAfter`.
   *
   * @throws RetryExhaustedError when a page keeps failing
   */
  async *batches(
    context: RunContext,
    entityKeys: readonly number[],
    tier: SeriesTier,
    resumeAfter: number | null = null,
  ): AsyncGenerator<RawRecord[]> {
    if (entityKeys.length === 0) {
      return;
    }

    const pushdown = entityKeys.length <= MAX_PUSHDOWN_KEYS;
    const members = pushdown ? null : new Set(entityKeys);
    const limit = context.recordBatchSize;
    let after: StatisticsCursor | null = null;

    while (true) {
      const cursor: StatisticsCursor | null = after;
      const page: RawRecord[] = await withRetry(
        () =>
          this.source.fetchStatisticsPage({
            tier,
            entityKeys: pushdown ? entityKeys : null,
            resumeAfter,
            after: cursor,
            limit,
          }),
        context.retry,
        { label: `Fetching ${tier} statistics`, logger: this.logger },
      );
      if (page.length === 0) {
        return;
      }

      const last = page[page.length - 1];
      after = { entityKey: last.entityKey, timestamp: last.timestamp };

      const batch = members
        ? page.filter((record) => members.has(record.entityKey))
        : page;
      if (batch.length > 0) {
        yield batch;
      }

      if (page.length < limit) {
        return;
      }
    }
  }
}
