import { Injectable } from '@nestjs/common';
import { Category } from '../classification/categories';
import { ClassifiedEntity } from '../classification/entity-classifier';
import { RawRecord } from '../source/dto/recorder.dto';
import { QualityRules, resolveBound } from './quality-bounds';
import { QualityReport } from './quality-report';

export const DROP_REASONS = ['missing', 'non_finite', 'out_of_range'] as const;

export type DropReason = (typeof DROP_REASONS)[number];

export type QualityOutcome =
  | { kind: 'pass'; value: number }
  | { kind: 'corrected'; value: number; original: number }
  | { kind: 'drop'; reason: DropReason };

/**
 * A record that survived the gate. Dropped records have no representation.
 */
export interface ValidatedRecord extends RawRecord {
  readonly value: number;
}

export interface ScreenedBatch {
  records: ValidatedRecord[];
  corrected: number;
  dropped: number;
}

/**
 * QualityGate
 *
 * Per-record validation before a value may become a point. Data-quality
 * problems are outcomes, never exceptions. Gaps are dropped, not filled.
 */
@Injectable()
export class QualityGate {
  /**
   * Rules, first match wins:
   * 1. no value               -> drop `missing`
   * 2. NaN or +/-Infinity      -> drop `non_finite`
   * 3. outside the entity bound -> clamp to the nearest bound when
   *    auto-correct is on, else drop `out_of_range`
   * 4. otherwise pass unchanged
   */
  validate(
    value: number | null,
    category: Category,
    unit: string | null,
    rules: QualityRules,
  ): QualityOutcome {
    if (value === null) {
      return { kind: 'drop', reason: 'missing' };
    }
    if (!Number.isFinite(value)) {
      return { kind: 'drop', reason: 'non_finite' };
    }

    const bound = resolveBound(rules, category, unit);
    if (bound) {
      let limit: number | null = null;
      if (bound.min !== null && value < bound.min) {
        limit = bound.min;
      } else if (bound.max !== null && value > bound.max) {
        limit = bound.max;
      }

      if (limit !== null) {
        return rules.autoCorrect
          ? { kind: 'corrected', value: limit, original: value }
          : { kind: 'drop', reason: 'out_of_range' };
      }
    }

    return { kind: 'pass', value };
  }

  /**
   * Run one entity's batch through `validate`, tallying every outcome.
   * Surviving records keep their input order.
   */
  screen(
    records: readonly RawRecord[],
    entity: ClassifiedEntity,
    rules: QualityRules,
    report: QualityReport,
  ): ScreenedBatch {
    const { category } = entity.classification;
    const { unit, externalId } = entity.descriptor;
    const screened: ScreenedBatch = { records: [], corrected: 0, dropped: 0 };

    for (const record of records) {
      const outcome = this.validate(record.value, category, unit, rules);
      report.record(externalId, outcome);

      if (outcome.kind === 'drop') {
        screened.dropped++;
        continue;
      }
      if (outcome.kind === 'corrected') {
        screened.corrected++;
      }
      screened.records.push({ ...record, value: outcome.value });
    }

    return screened;
  }
}
