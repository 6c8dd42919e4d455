import { Injectable } from '@nestjs/common';
import { EntityDescriptor } from '../source/dto/recorder.dto';
import {
  AggregationHint,
  aggregationHintFor,
  CATEGORIES,
  Category,
  UNIT_CATEGORIES,
} from './categories';
import { ExclusionPattern, matchesAny } from './exclusion-pattern';

export const REJECT_REASONS = [
  'domain',
  'timestamp_only',
  'status_pattern',
  'no_matching_unit',
] as const;

export type RejectReason = (typeof REJECT_REASONS)[number];

export type ClassificationResult =
  | {
      accepted: true;
      category: Category;
      aggregationHint: AggregationHint;
      reason: null;
    }
  | {
      accepted: false;
      category: 'none';
      aggregationHint: null;
      reason: RejectReason;
    };

export type AcceptedClassification = Extract<
  ClassificationResult,
  { accepted: true }
>;

/**
 * Filter configuration, compiled once per run.
 */
export interface ClassificationRules {
  /** Domains eligible at all (configured domains plus special sources) */
  readonly allowedDomains: ReadonlySet<string>;
  /** Integrations accepted regardless of unit */
  readonly specialSources: ReadonlySet<string>;
  readonly allowedUnits: ReadonlySet<string>;
  readonly exclusionPatterns: readonly ExclusionPattern[];
}

export interface ClassifiedEntity {
  readonly descriptor: EntityDescriptor;
  readonly classification: AcceptedClassification;
}

export interface ClassificationSummary {
  total: number;
  accepted: number;
  rejected: number;
  byCategory: Partial<Record<Category, number>>;
  byReason: Partial<Record<RejectReason, number>>;
}

/**
 * Result of classifying one metadata page.
 */
export interface ClassifiedPage {
  accepted: ClassifiedEntity[];
  summary: ClassificationSummary;
}

/**
 * Decide whether an entity is exported and under which category.
 *
 * Pure and total: the same descriptor and rules always produce the same
 * result, and every input produces one. First matching rule wins:
 * 1. domain not allowed                      -> reject `domain`
 * 2. state_class "timestamp"                 -> reject `timestamp_only`
 * 3. id or name matches an exclusion pattern -> reject `status_pattern`
 * 4. special source, or allow-listed unit    -> accept
 * 5. otherwise                               -> reject `no_matching_unit`
 */
export function classifyEntity(
  entity: EntityDescriptor,
  rules: ClassificationRules,
): ClassificationResult {
  if (!rules.allowedDomains.has(entity.domain)) {
    return reject('domain');
  }

  if (entity.stateClass === 'timestamp') {
    return reject('timestamp_only');
  }

  if (
    matchesAny(rules.exclusionPatterns, entity.externalId, entity.friendlyName)
  ) {
    return reject('status_pattern');
  }

  if (rules.specialSources.has(entity.domain)) {
    return accept('special-source', entity);
  }

  if (entity.unit !== null && rules.allowedUnits.has(entity.unit)) {
    return accept(UNIT_CATEGORIES[entity.unit] ?? 'other-numeric', entity);
  }

  return reject('no_matching_unit');
}

export function emptySummary(): ClassificationSummary {
  return { total: 0, accepted: 0, rejected: 0, byCategory: {}, byReason: {} };
}

/**
 * Combine per-page summaries into a run total.
 */
export function mergeSummaries(
  left: ClassificationSummary,
  right: ClassificationSummary,
): ClassificationSummary {
  return {
    total: left.total + right.total,
    accepted: left.accepted + right.accepted,
    rejected: left.rejected + right.rejected,
    byCategory: mergeCounts(CATEGORIES, left.byCategory, right.byCategory),
    byReason: mergeCounts(REJECT_REASONS, left.byReason, right.byReason),
  };
}

/**
 * EntityClassifier
 *
 * Applies `classifyEntity` to metadata pages. The accepted entities and the
 * statistics about the page are returned as separate named outputs.
 */
@Injectable()
export class EntityClassifier {
  classify(
    entity: EntityDescriptor,
    rules: ClassificationRules,
  ): ClassificationResult {
    return classifyEntity(entity, rules);
  }

  classifyPage(
    entities: readonly EntityDescriptor[],
    rules: ClassificationRules,
  ): ClassifiedPage {
    const accepted: ClassifiedEntity[] = [];
    const summary = emptySummary();

    for (const descriptor of entities) {
      const classification = classifyEntity(descriptor, rules);
      summary.total++;

      if (classification.accepted) {
        accepted.push({ descriptor, classification });
        summary.accepted++;
        increment(summary.byCategory, classification.category);
      } else {
        summary.rejected++;
        increment(summary.byReason, classification.reason);
      }
    }

    return { accepted, summary };
  }
}

function accept(
  category: Category,
  entity: EntityDescriptor,
): AcceptedClassification {
  return {
    accepted: true,
    category,
    aggregationHint: aggregationHintFor(category, entity.unit, entity.domain),
    reason: null,
  };
}

function reject(reason: RejectReason): ClassificationResult {
  return { accepted: false, category: 'none', aggregationHint: null, reason };
}

function increment<K extends string>(
  counts: Partial<Record<K, number>>,
  key: K,
): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function mergeCounts<K extends string>(
  keys: readonly K[],
  left: Partial<Record<K, number>>,
  right: Partial<Record<K, number>>,
): Partial<Record<K, number>> {
  const merged: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const count = (left[key] ?? 0) + (right[key] ?? 0);
    if (count > 0) {
      merged[key] = count;
    }
  }
  return merged;
}
