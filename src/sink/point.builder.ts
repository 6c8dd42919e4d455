import { ClassifiedEntity } from '../classification/entity-classifier';
import { ValidatedRecord } from '../quality/quality-gate';
import { splitEntityId } from '../source/entity-id';

/**
 * One point as handed to the sink. Identity on the sink is
 * (measurement, tags, timestamp); writing it twice overwrites.
 */
export interface SinkPoint {
  measurement: string;
  tags: Record<string, string>;
  fields: { value: number };
  /** Seconds since epoch, copied from the record */
  timestamp: number;
}

export const MIGRATION_SOURCE_TAG = 'migration';

/**
 * Measurement is the physical unit so migrated series line up with live
 * ones; entities without a unit use `<domain>_data`.
 */
export function buildSinkPoint(
  record: ValidatedRecord,
  entity: ClassifiedEntity,
): SinkPoint {
  const { descriptor, classification } = entity;

  const tags: Record<string, string> = {
    entity_id: splitEntityId(descriptor.externalId).objectId,
    domain: descriptor.domain,
    category: classification.category,
    source: MIGRATION_SOURCE_TAG,
    friendly_name: descriptor.friendlyName,
  };
  if (descriptor.unit) {
    tags.unit = descriptor.unit;
  }
  if (descriptor.deviceClass) {
    tags.device_class = descriptor.deviceClass;
  }

  return {
    measurement: descriptor.unit || `${descriptor.domain}_data`,
    tags,
    fields: { value: record.value },
    timestamp: record.timestamp,
  };
}
