/**
 * Split a statistic id into its domain and object id.
 *
 * Recorder entities use `domain.object_id` ("sensor.kitchen_temp"); external
 * statistics imported by integrations use `source:object_id`
 * ("tibber:energy_consumption_home"). Ids with neither separator have an
 * empty domain, which no allow-list matches.
 */
export function splitEntityId(externalId: string): {
  domain: string;
  objectId: string;
} {
  const separator = /[.:]/.exec(externalId);
  if (!separator) {
    return { domain: '', objectId: externalId };
  }
  return {
    domain: externalId.slice(0, separator.index),
    objectId: externalId.slice(separator.index + 1),
  };
}

/**
 * Fallback display name: "sensor.living_room_temp" -> "living room temp"
 */
export function deriveFriendlyName(externalId: string): string {
  return splitEntityId(externalId).objectId.replaceAll('_', ' ');
}
