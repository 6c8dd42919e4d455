import { Category } from '../classification/categories';

/**
 * Inclusive value range. A null side is unbounded.
 */
export interface Bound {
  min: number | null;
  max: number | null;
}

export interface QualityRules {
  autoCorrect: boolean;
  categoryBounds: Readonly<Partial<Record<Category, Bound>>>;
  /** Takes precedence over the category bound for the same entity */
  unitBounds: Readonly<Partial<Record<string, Bound>>>;
}

export const DEFAULT_CATEGORY_BOUNDS: Readonly<Partial<Record<Category, Bound>>> =
  {
    temperature: { min: -50, max: 80 },
    energy: { min: 0, max: null },
    power: { min: 0, max: 50000 },
    electrical: { min: 0, max: 1000 },
    environmental: { min: 0, max: 1200 },
  };

export const DEFAULT_UNIT_BOUNDS: Readonly<Partial<Record<string, Bound>>> = {
  '°F': { min: -58, max: 176 },
  '%': { min: 0, max: 100 },
  V: { min: 0, max: 500 },
  kB: { min: 0, max: null },
  MB: { min: 0, max: null },
  GB: { min: 0, max: null },
  TB: { min: 0, max: null },
};

export function resolveBound(
  rules: QualityRules,
  category: Category,
  unit: string | null,
): Bound | null {
  if (unit !== null) {
    const unitBound = rules.unitBounds[unit];
    if (unitBound) {
      return unitBound;
    }
  }
  return rules.categoryBounds[category] ?? null;
}
