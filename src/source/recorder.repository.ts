import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { RecorderSchemaError } from '../common/errors';
import { EntityDescriptor, RawRecord, SeriesTier } from './dto/recorder.dto';
import { deriveFriendlyName, splitEntityId } from './entity-id';
import {
  RecorderSchemaInfo,
  RecorderSource,
  StatisticsPageQuery,
} from './interfaces/recorder-source.interface';

/**
 * Row structure of the entity metadata page query
 */
interface EntityRow {
  entityKey: number;
  externalId: string;
  unit: string | null;
  name: string | null;
  friendlyName: unknown;
  deviceClass: unknown;
  stateClass: unknown;
}

/**
 * Row structure of the statistics page query
 */
interface StatisticRow {
  entityKey: number;
  timestamp: number;
  state: number | null;
  mean: number | null;
}

/**
 * Entity metadata with the best-effort attributes join.
 *
 * `states` holds every historical state change, so joining it directly fans
 * each entity out into thousands of rows. The `latest` subquery reduces it to
 * one row per `metadata_id` first: with a single MAX() aggregate, SQLite
 * takes the bare `attributes_id` column from the row holding the maximum, so
 * the subquery yields exactly the newest attributes reference per entity.
 * The paginated relation is then proportional to the entity count.
 */
const ENTITY_PAGE_SQL = `
  SELECT sm.id AS entityKey,
         sm.statistic_id AS externalId,
         sm.unit_of_measurement AS unit,
         sm.name AS name,
         json_extract(sa.shared_attrs, '$.friendly_name') AS friendlyName,
         json_extract(sa.shared_attrs, '$.device_class') AS deviceClass,
         json_extract(sa.shared_attrs, '$.state_class') AS stateClass
  FROM statistics_meta sm
  LEFT JOIN states_meta stm ON stm.entity_id = sm.statistic_id
  LEFT JOIN (
    SELECT metadata_id, attributes_id, MAX(last_updated_ts) AS last_updated_ts
    FROM states
    WHERE attributes_id IS NOT NULL
    GROUP BY metadata_id
  ) latest ON latest.metadata_id = stm.metadata_id
  LEFT JOIN state_attributes sa ON sa.attributes_id = latest.attributes_id
  ORDER BY sm.id
  LIMIT ? OFFSET ?`;

/**
 * Older recorder schemas have no entity registry table; names then come
 * from `statistics_meta` alone.
 */
const ENTITY_PAGE_WITHOUT_REGISTRY_SQL = `
  SELECT id AS entityKey,
         statistic_id AS externalId,
         unit_of_measurement AS unit,
         name AS name,
         NULL AS friendlyName,
         NULL AS deviceClass,
         NULL AS stateClass
  FROM statistics_meta
  ORDER BY id
  LIMIT ? OFFSET ?`;

/**
 * RecorderRepository
 *
 * Read-only queries against a recorder SQLite database, opened through the
 * TypeORM `better-sqlite3` driver.
 *
 * Tables read:
 * - statistics_meta: one row per statistic (id, statistic_id, unit, name)
 * - statistics / statistics_short_term: rows keyed by (metadata_id, start_ts)
 * - states_meta, states, state_attributes: latest attributes per entity
 */
@Injectable()
export class RecorderRepository implements RecorderSource {
  private readonly logger = new Logger(RecorderRepository.name);

  private static readonly REQUIRED_TABLES = [
    'statistics_meta',
    'statistics',
    'statistics_short_term',
  ];

  private static readonly REGISTRY_TABLES = [
    'states_meta',
    'states',
    'state_attributes',
  ];

  private static readonly TIER_TABLES: Record<SeriesTier, string> = {
    short_term: 'statistics_short_term',
    long_term: 'statistics',
  };

  private schema: RecorderSchemaInfo | null = null;

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async inspectSchema(): Promise<RecorderSchemaInfo> {
    if (this.schema) {
      return this.schema;
    }

    const rows: { name: string }[] = await this.dataSource.query(
      "SELECT name FROM sqlite_master WHERE type = 'table'",
    );
    const tables = rows.map((row) => row.name);

    const missing = RecorderRepository.REQUIRED_TABLES.filter(
      (table) => !tables.includes(table),
    );
    if (missing.length > 0) {
      throw new RecorderSchemaError(
        `Required tables missing: ${missing.join(', ')}`,
      );
    }

    const hasEntityRegistry = RecorderRepository.REGISTRY_TABLES.every(
      (table) => tables.includes(table),
    );
    if (!hasEntityRegistry) {
      this.logger.warn(
        'states_meta not found, friendly names fall back to statistic names',
      );
    }

    this.schema = { tables, hasEntityRegistry };
    return this.schema;
  }

  /**
   * MAX(rowid) reads one index entry instead of counting rows. Deleted
   * statistics leave gaps, so this overestimates; good enough for a
   * progress percentage.
   */
  async estimateEntityCount(): Promise<number> {
    const rows: { approximate: number | null }[] = await this.dataSource.query(
      'SELECT MAX(rowid) AS approximate FROM statistics_meta',
    );
    return rows[0]?.approximate ?? 0;
  }

  async fetchEntityPage(
    offset: number,
    limit: number,
  ): Promise<EntityDescriptor[]> {
    const { hasEntityRegistry } = await this.inspectSchema();
    const sql = hasEntityRegistry
      ? ENTITY_PAGE_SQL
      : ENTITY_PAGE_WITHOUT_REGISTRY_SQL;

    const rows: EntityRow[] = await this.dataSource.query(sql, [
      limit,
      offset,
    ]);
    this.logger.debug(
      `Retrieved ${rows.length} entity rows (offset: ${offset})`,
    );

    return rows.map((row) => this.toDescriptor(row));
  }

  async fetchStatisticsPage(query: StatisticsPageQuery): Promise<RawRecord[]> {
    const table = RecorderRepository.TIER_TABLES[query.tier];
    const conditions: string[] = [];
    const params: number[] = [];

    if (query.entityKeys) {
      conditions.push(
        `metadata_id IN (${query.entityKeys.map(() => '?').join(', ')})`,
      );
      params.push(...query.entityKeys);
    }

    if (query.resumeAfter !== null) {
      conditions.push('start_ts > ?');
      params.push(query.resumeAfter);
    }

    if (query.after) {
      conditions.push('(metadata_id > ? OR (metadata_id = ? AND start_ts > ?))');
      params.push(
        query.after.entityKey,
        query.after.entityKey,
        query.after.timestamp,
      );
    }

    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(query.limit);

    const rows: StatisticRow[] = await this.dataSource.query(
      `SELECT metadata_id AS entityKey, start_ts AS timestamp, state, mean
       FROM ${table}
       ${whereClause}
       ORDER BY metadata_id, start_ts
       LIMIT ?`,
      params,
    );

    return rows.map((row) => ({
      entityKey: row.entityKey,
      timestamp: row.timestamp,
      value: row.state ?? row.mean,
      tier: query.tier,
    }));
  }

  private toDescriptor(row: EntityRow): EntityDescriptor {
    const { domain } = splitEntityId(row.externalId);
    return {
      entityKey: row.entityKey,
      externalId: row.externalId,
      domain,
      unit: row.unit ?? null,
      friendlyName:
        asText(row.friendlyName) ??
        asText(row.name) ??
        deriveFriendlyName(row.externalId),
      deviceClass: asText(row.deviceClass),
      stateClass: asText(row.stateClass),
    };
  }
}

/**
 * Attribute values come out of JSON and may be any JSON type.
 */
function asText(value: unknown): string | null {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value;
  }
  return null;
}
