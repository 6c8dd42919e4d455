import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError, RecorderSchemaError } from '../common/errors';
import { withRetry } from '../common/retry';
import { RunContext } from '../config/run-context';
import { EntityDescriptor } from '../source/dto/recorder.dto';
import {
  RECORDER_SOURCE,
  RecorderSource,
} from '../source/interfaces/recorder-source.interface';

export interface MetadataPage {
  /** Offset this page was fetched at */
  offset: number;
  /** Offset of the following page; persisted as the metadata cursor */
  nextOffset: number;
  entities: EntityDescriptor[];
}

/**
 * MetadataStream
 *
 * Offset-paginated iteration over entity metadata in `entityKey` order.
 * Finite and not restartable mid-page: a new sequence always starts from an
 * explicit offset.
 */
@Injectable()
export class MetadataStream {
  private readonly logger = new Logger(MetadataStream.name);

  constructor(
    @Inject(RECORDER_SOURCE) private readonly source: RecorderSource,
  ) {}

  /**
   * Approximate entity total for progress percentages. Never authoritative;
   * 0 when the estimate is unavailable.
   */
  async estimateCount(): Promise<number> {
    try {
      return await this.source.estimateEntityCount();
    } catch (error) {
      this.logger.warn(`Entity count estimate unavailable: ${describeError(error)}`);
      return 0;
    }
  }

  /**
   * @throws RetryExhaustedError when a page keeps failing
   * @throws RecorderSchemaError when the database is not a recorder database
   */
  async *pages(
    context: RunContext,
    fromOffset = 0,
  ): AsyncGenerator<MetadataPage> {
    const pageSize = context.metadataPageSize;
    let offset: number = fromOffset;

    while (true) {
      const entities: EntityDescriptor[] = await withRetry(
        () => this.source.fetchEntityPage(offset, pageSize),
        context.retry,
        {
          label: `Metadata page at offset ${offset}`,
          logger: this.logger,
          shouldRetry: (error) => !(error instanceof RecorderSchemaError),
        },
      );
      if (entities.length === 0) {
        return;
      }

      const nextOffset = offset + entities.length;
      yield { offset, nextOffset, entities };

      if (entities.length < pageSize) {
        return;
      }
      offset = nextOffset;
    }
  }
}
