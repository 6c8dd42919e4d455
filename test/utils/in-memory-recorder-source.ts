import { EntityDescriptor, RawRecord } from '../../src/source/dto/recorder.dto';
import { splitEntityId } from '../../src/source/entity-id';
import {
  RecorderSchemaInfo,
  RecorderSource,
  StatisticsPageQuery,
} from '../../src/source/interfaces/recorder-source.interface';

/**
 * Array-backed RecorderSource with the same ordering and filtering
 * contract as the SQLite repository. Records every query it serves.
 */
export class InMemoryRecorderSource implements RecorderSource {
  readonly entityPageCalls: Array<{ offset: number; limit: number }> = [];
  readonly statisticsQueries: StatisticsPageQuery[] = [];
  /** Largest page handed out by fetchStatisticsPage */
  maxPageLength = 0;

  private readonly entities: EntityDescriptor[] = [];
  private readonly records: RawRecord[] = [];

  addEntity(
    entity: Partial<EntityDescriptor> & { entityKey: number; externalId: string },
  ): EntityDescriptor {
    const descriptor: EntityDescriptor = {
      domain: splitEntityId(entity.externalId).domain,
      unit: null,
      friendlyName: splitEntityId(entity.externalId).objectId,
      deviceClass: null,
      stateClass: null,
      ...entity,
    };
    this.entities.push(descriptor);
    this.entities.sort((a, b) => a.entityKey - b.entityKey);
    return descriptor;
  }

  addRecords(records: RawRecord[]): void {
    this.records.push(...records);
    this.records.sort(
      (a, b) => a.entityKey - b.entityKey || a.timestamp - b.timestamp,
    );
  }

  inspectSchema(): Promise<RecorderSchemaInfo> {
    return Promise.resolve({ tables: [], hasEntityRegistry: true });
  }

  estimateEntityCount(): Promise<number> {
    return Promise.resolve(this.entities.length);
  }

  fetchEntityPage(offset: number, limit: number): Promise<EntityDescriptor[]> {
    this.entityPageCalls.push({ offset, limit });
    return Promise.resolve(this.entities.slice(offset, offset + limit));
  }

  fetchStatisticsPage(query: StatisticsPageQuery): Promise<RawRecord[]> {
    this.statisticsQueries.push(query);
    const keys = query.entityKeys ? new Set(query.entityKeys) : null;
    const { after, resumeAfter } = query;

    const page = this.records
      .filter(
        (record) =>
          record.tier === query.tier &&
          (keys === null || keys.has(record.entityKey)) &&
          (resumeAfter === null || record.timestamp > resumeAfter) &&
          (after === null ||
            record.entityKey > after.entityKey ||
            (record.entityKey === after.entityKey &&
              record.timestamp > after.timestamp)),
      )
      .slice(0, query.limit);

    this.maxPageLength = Math.max(this.maxPageLength, page.length);
    return Promise.resolve(page);
  }
}

export function records(
  entityKey: number,
  tier: RawRecord['tier'],
  rows: Array<[number, number | null]>,
): RawRecord[] {
  return rows.map(([timestamp, value]) => ({ entityKey, timestamp, value, tier }));
}
