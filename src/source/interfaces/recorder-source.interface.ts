import { EntityDescriptor, RawRecord, SeriesTier } from '../dto/recorder.dto';

/**
 * Injection token for the active RecorderSource implementation.
 */
export const RECORDER_SOURCE = Symbol('RECORDER_SOURCE');

/**
 * Keyset position inside a `(metadata_id, start_ts)` ordered scan.
 */
export interface StatisticsCursor {
  entityKey: number;
  timestamp: number;
}

export interface StatisticsPageQuery {
  tier: SeriesTier;
  /** Pushed down as `metadata_id IN (...)`; null scans every entity */
  entityKeys: readonly number[] | null;
  /** Only rows with `start_ts` strictly greater than this */
  resumeAfter: number | null;
  /** Continue strictly after this position; null starts at the beginning */
  after: StatisticsCursor | null;
  limit: number;
}

export interface RecorderSchemaInfo {
  tables: string[];
  /** False on recorder schemas that predate `states_meta` */
  hasEntityRegistry: boolean;
}

/**
 * RecorderSource Interface
 *
 * Read-only access to a recorder database. Implementations only run
 * queries; batching, retries and filtering decisions belong to the streams.
 */
export interface RecorderSource {
  /**
   * Verify the required tables exist and detect optional ones.
   * @throws RecorderSchemaError if a statistics table is missing
   */
  inspectSchema(): Promise<RecorderSchemaInfo>;

  /**
   * Fast approximate number of entities. Progress display only.
   */
  estimateEntityCount(): Promise<number>;

  /**
   * One page of entity metadata ordered by `entityKey`, with the attributes
   * join already reduced to at most one row per entity.
   */
  fetchEntityPage(offset: number, limit: number): Promise<EntityDescriptor[]>;

  /**
   * One page of statistics rows ordered by `(entityKey, timestamp)`.
   * Rows for entities outside `entityKeys` are returned when it is null.
   */
  fetchStatisticsPage(query: StatisticsPageQuery): Promise<RawRecord[]>;
}
