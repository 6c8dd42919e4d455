import { ClassificationSummary } from '../classification/entity-classifier';
import { DropReason } from '../quality/quality-gate';
import { EntityQualityTally } from '../quality/quality-report';
import { SeriesTier } from '../source/dto/recorder.dto';

export interface FailedEntity {
  externalId: string;
  /** Null for failures carried over from an earlier run */
  error: string | null;
}

export type CheckpointOutcome = 'archived' | 'kept' | 'untouched';

/**
 * End-of-run report
 */
export interface MigrationSummary {
  runId: string;
  dryRun: boolean;
  durationMs: number;
  entitiesScanned: number;
  entitiesAccepted: number;
  /** Completed by this invocation */
  entitiesCompleted: number;
  /** Already completed by an earlier invocation */
  entitiesSkipped: number;
  /** Excluded by the entity filter */
  entitiesFiltered: number;
  failures: FailedEntity[];
  recordsRead: Record<SeriesTier, number>;
  pointsWritten: number;
  recordsCorrected: number;
  recordsDropped: number;
  dropReasons: Partial<Record<DropReason, number>>;
  recordsPerSecond: number;
  classification: ClassificationSummary;
  qualityFlagged: Array<{ externalId: string } & EntityQualityTally>;
  checkpoint: CheckpointOutcome;
  checkpointPath: string | null;
  resumeHint: string | null;
}

/**
 * Result of `--plan`: classification only, nothing read beyond metadata
 */
export interface PlanSummary {
  classification: ClassificationSummary;
  /** Accepted entities remaining after the entity filter */
  selected: number;
  selectedByUnit: Record<string, number>;
  sample: string[];
}

export function formatSummary(summary: MigrationSummary): string[] {
  const seconds = (summary.durationMs / 1000).toFixed(1);
  const written = summary.dryRun ? 'Points (would write)' : 'Points written';
  const lines = [
    `Run ${summary.runId}${summary.dryRun ? ' (dry run)' : ''} finished in ${seconds}s`,
    `Entities: ${summary.entitiesScanned} scanned, ${summary.entitiesAccepted} accepted, ${summary.entitiesCompleted} completed, ${summary.entitiesSkipped} already done, ${summary.failures.length} failed`,
    `Records: ${summary.recordsRead.short_term} short-term, ${summary.recordsRead.long_term} long-term (${summary.recordsPerSecond.toFixed(0)} records/s)`,
    `${written}: ${summary.pointsWritten}`,
    `Quality: ${summary.recordsCorrected} corrected, ${summary.recordsDropped} dropped${formatCounts(summary.dropReasons)}`,
  ];

  if (summary.entitiesFiltered > 0) {
    lines.push(`Entity filter excluded ${summary.entitiesFiltered} accepted entities`);
  }
  if (Object.keys(summary.classification.byReason).length > 0) {
    lines.push(`Rejected:${formatCounts(summary.classification.byReason)}`);
  }
  for (const flagged of summary.qualityFlagged) {
    lines.push(
      `  ${flagged.externalId}: ${flagged.corrected} corrected, ${flagged.dropped} dropped`,
    );
  }
  for (const failure of summary.failures) {
    lines.push(
      `  FAILED ${failure.externalId}${failure.error ? `: ${failure.error}` : ''}`,
    );
  }

  switch (summary.checkpoint) {
    case 'archived':
      lines.push(`Checkpoint archived to ${summary.checkpointPath ?? '(none)'}`);
      break;
    case 'kept':
      lines.push(`Checkpoint kept at ${summary.checkpointPath ?? '(none)'}`);
      break;
    case 'untouched':
      break;
  }
  if (summary.resumeHint) {
    lines.push(summary.resumeHint);
  }
  return lines;
}

export function formatPlan(plan: PlanSummary): string[] {
  const { classification } = plan;
  const lines = [
    `Entities: ${classification.total} scanned, ${classification.accepted} accepted, ${classification.rejected} rejected`,
    `Accepted by category:${formatCounts(classification.byCategory)}`,
    `Rejected by reason:${formatCounts(classification.byReason)}`,
    `Selected for export: ${plan.selected}`,
  ];
  for (const [unit, count] of Object.entries(plan.selectedByUnit).sort(
    ([, a], [, b]) => b - a,
  )) {
    lines.push(`  ${unit.padEnd(15)} ${String(count).padStart(6)}`);
  }
  if (plan.sample.length > 0) {
    lines.push(`Sample: ${plan.sample.join(', ')}`);
  }
  return lines;
}

function formatCounts(counts: Partial<Record<string, number>>): string {
  const entries = Object.entries(counts);
  if (entries.length === 0) {
    return '';
  }
  return ` ${entries.map(([key, count]) => `${key}=${count ?? 0}`).join(', ')}`;
}
