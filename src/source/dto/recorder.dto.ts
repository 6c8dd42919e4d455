/**
 * The two statistics granularities kept by the recorder.
 *
 * - short_term: 5-minute rows from `statistics_short_term` (recent, detailed)
 * - long_term: hourly rows from `statistics` (compressed, unlimited history)
 */
export const SERIES_TIERS = ['short_term', 'long_term'] as const;

export type SeriesTier = (typeof SERIES_TIERS)[number];

/**
 * EntityDescriptor
 *
 * One monitored entity as resolved from `statistics_meta` joined with the
 * entity registry and its most recent attributes. Built fresh for every
 * metadata page and never persisted.
 */
export interface EntityDescriptor {
  /** `statistics_meta.id`, the source-internal key rows reference */
  readonly entityKey: number;

  /**
   * Stable namespaced identifier.
   * Examples: "sensor.outdoor_temperature", "tibber:energy_consumption_home"
   */
  readonly externalId: string;

  /** Category namespace: the part of `externalId` before the first `.` or `:` */
  readonly domain: string;

  readonly unit: string | null;

  /**
   * Attribute `friendly_name`, else the statistic's own name, else the
   * object id with underscores turned into spaces.
   */
  readonly friendlyName: string;

  readonly deviceClass: string | null;

  /** `"timestamp"` makes the entity permanently ineligible */
  readonly stateClass: string | null;
}

/**
 * One statistics row. `value` is the row's `state`, falling back to `mean`.
 */
export interface RawRecord {
  readonly entityKey: number;
  /** Seconds since epoch (UTC), taken verbatim from `start_ts` */
  readonly timestamp: number;
  readonly value: number | null;
  readonly tier: SeriesTier;
}
