import { ClassifiedEntity } from '../classification/entity-classifier';
import { buildSinkPoint } from './point.builder';

const classified = (
  externalId: string,
  domain: string,
  unit: string | null,
  deviceClass: string | null,
): ClassifiedEntity => ({
  descriptor: {
    entityKey: 7,
    externalId,
    domain,
    unit,
    friendlyName: 'Living room',
    deviceClass,
    stateClass: 'measurement',
  },
  classification: {
    accepted: true,
    category: unit ? 'temperature' : 'special-source',
    aggregationHint: unit ? 'mean' : 'last',
    reason: null,
  },
});

describe('buildSinkPoint', () => {
  it('should use the unit as measurement and tag the point with its origin', () => {
    const point = buildSinkPoint(
      { entityKey: 7, timestamp: 1_700_000_000, value: 21.5, tier: 'long_term' },
      classified('sensor.living_room_temp', 'sensor', '°C', 'temperature'),
    );

    expect(point).toEqual({
      measurement: '°C',
      tags: {
        entity_id: 'living_room_temp',
        domain: 'sensor',
        category: 'temperature',
        source: 'migration',
        friendly_name: 'Living room',
        unit: '°C',
        device_class: 'temperature',
      },
      fields: { value: 21.5 },
      timestamp: 1_700_000_000,
    });
  });

  it('should fall back to a per-domain measurement and omit empty tags', () => {
    const point = buildSinkPoint(
      { entityKey: 7, timestamp: 1_700_003_600, value: 2, tier: 'short_term' },
      classified('tibber:price_level', 'tibber', null, null),
    );

    expect(point.measurement).toBe('tibber_data');
    expect(point.tags).toEqual({
      entity_id: 'price_level',
      domain: 'tibber',
      category: 'special-source',
      source: 'migration',
      friendly_name: 'Living room',
    });
  });

  it('should give the same record the same point', () => {
    const record = { entityKey: 7, timestamp: 1_700_000_000, value: 3, tier: 'long_term' as const };
    const entity = classified('sensor.living_room_temp', 'sensor', '°C', null);

    expect(buildSinkPoint(record, entity)).toEqual(buildSinkPoint(record, entity));
  });
});
