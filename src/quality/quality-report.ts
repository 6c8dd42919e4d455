import { DROP_REASONS, DropReason, QualityOutcome } from './quality-gate';

export interface EntityQualityTally {
  passed: number;
  corrected: number;
  dropped: number;
  dropReasons: Partial<Record<DropReason, number>>;
}

/**
 * Per-entity pass/correct/drop counts for the end-of-run report.
 */
export class QualityReport {
  private readonly tallies = new Map<string, EntityQualityTally>();

  record(externalId: string, outcome: QualityOutcome): void {
    const tally = this.tallyFor(externalId);
    switch (outcome.kind) {
      case 'pass':
        tally.passed++;
        break;
      case 'corrected':
        tally.corrected++;
        break;
      case 'drop':
        tally.dropped++;
        tally.dropReasons[outcome.reason] =
          (tally.dropReasons[outcome.reason] ?? 0) + 1;
        break;
    }
  }

  get(externalId: string): EntityQualityTally | undefined {
    return this.tallies.get(externalId);
  }

  totals(): EntityQualityTally {
    const totals: EntityQualityTally = {
      passed: 0,
      corrected: 0,
      dropped: 0,
      dropReasons: {},
    };
    for (const tally of this.tallies.values()) {
      totals.passed += tally.passed;
      totals.corrected += tally.corrected;
      totals.dropped += tally.dropped;
      for (const reason of DROP_REASONS) {
        const count = tally.dropReasons[reason];
        if (count) {
          totals.dropReasons[reason] = (totals.dropReasons[reason] ?? 0) + count;
        }
      }
    }
    return totals;
  }

  /**
   * Entities with at least one correction or drop, worst first.
   */
  flagged(limit = 10): Array<{ externalId: string } & EntityQualityTally> {
    return [...this.tallies.entries()]
      .filter(([, tally]) => tally.corrected + tally.dropped > 0)
      .sort(
        ([, a], [, b]) => b.corrected + b.dropped - (a.corrected + a.dropped),
      )
      .slice(0, limit)
      .map(([externalId, tally]) => ({ externalId, ...tally }));
  }

  private tallyFor(externalId: string): EntityQualityTally {
    let tally = this.tallies.get(externalId);
    if (!tally) {
      tally = { passed: 0, corrected: 0, dropped: 0, dropReasons: {} };
      this.tallies.set(externalId, tally);
    }
    return tally;
  }
}
