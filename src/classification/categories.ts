/**
 * Semantic categories driving both filtering and the sink-side rollup.
 *
 * Closed set: every table keyed by Category below is a full Record, so
 * adding a category fails to compile until each table handles it.
 */
export const CATEGORIES = [
  'energy',
  'power',
  'temperature',
  'environmental',
  'network',
  'electrical',
  'light',
  'air-quality',
  'sound',
  'rotational',
  'special-source',
  'other-numeric',
] as const;

export type Category = (typeof CATEGORIES)[number];

/** Rollup function associated with a category on the sink side */
export type AggregationHint = 'last' | 'mean' | 'max';

/**
 * Units recognised by name. An allow-listed unit missing here is accepted
 * as `other-numeric`.
 */
export const UNIT_CATEGORIES: Readonly<Partial<Record<string, Category>>> = {
  Wh: 'energy',
  kWh: 'energy',
  MWh: 'energy',
  W: 'power',
  kW: 'power',
  '°C': 'temperature',
  '°F': 'temperature',
  '%': 'environmental',
  hPa: 'environmental',
  mbar: 'environmental',
  bar: 'environmental',
  'kB/s': 'network',
  'MB/s': 'network',
  'Mbit/s': 'network',
  kB: 'network',
  MB: 'network',
  GB: 'network',
  TB: 'network',
  A: 'electrical',
  mA: 'electrical',
  V: 'electrical',
  lx: 'light',
  lux: 'light',
  ppm: 'air-quality',
  ppb: 'air-quality',
  'µg/m³': 'air-quality',
  dB: 'sound',
  dBA: 'sound',
  rpm: 'rotational',
};

const CATEGORY_AGGREGATION: Readonly<Record<Category, AggregationHint>> = {
  // Cumulative meters: the last reading in a window is the reading
  energy: 'last',
  power: 'mean',
  temperature: 'mean',
  environmental: 'mean',
  // Rates; data volumes are refined below
  network: 'mean',
  electrical: 'mean',
  light: 'mean',
  'air-quality': 'mean',
  sound: 'mean',
  rotational: 'mean',
  'special-source': 'last',
  'other-numeric': 'mean',
};

/** Totals rather than rates: keep the last value like energy */
const DATA_VOLUME_UNITS: ReadonlySet<string> = new Set(['kB', 'MB', 'GB', 'TB']);

/**
 * Rollup function for an accepted entity.
 *
 * Counters are monotonic within a window, so their maximum is the count;
 * data-volume units behave like energy meters.
 */
export function aggregationHintFor(
  category: Category,
  unit: string | null,
  domain: string,
): AggregationHint {
  if (domain === 'counter') {
    return 'max';
  }
  if (unit !== null && DATA_VOLUME_UNITS.has(unit)) {
    return 'last';
  }
  return CATEGORY_AGGREGATION[category];
}
