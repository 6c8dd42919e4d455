import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { CheckpointCorruptError, describeError } from '../common/errors';
import { SeriesTier } from '../source/dto/recorder.dto';

export const CHECKPOINT_VERSION = 1;

const timestamp = z.number().finite();

const checkpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  runId: z.string().min(1),
  startedAt: z.string(),
  updatedAt: z.string(),
  metadataCursor: z.number().int().min(0),
  entitiesCompleted: z.array(z.string()),
  entitiesFailed: z.array(z.string()),
  inProgress: z
    .object({
      externalId: z.string(),
      tiers: z.object({
        short_term: timestamp.optional(),
        long_term: timestamp.optional(),
      }),
    })
    .nullable(),
  totals: z.object({
    recordsRead: z.number().int().min(0),
    pointsWritten: z.number().int().min(0),
    recordsCorrected: z.number().int().min(0),
    recordsDropped: z.number().int().min(0),
  }),
});

/**
 * On-disk checkpoint format
 */
export type CheckpointSnapshot = z.infer<typeof checkpointSchema>;

export type CheckpointTotals = CheckpointSnapshot['totals'];

export interface InProgressEntity {
  externalId: string;
  /** Last written timestamp per tier */
  tiers: Partial<Record<SeriesTier, number>>;
}

/**
 * CheckpointState
 *
 * In-memory progress of a run. Mutated only by the pipeline after a
 * confirmed write, and serialized whole on every persist.
 */
export class CheckpointState {
  metadataCursor: number;
  inProgress: InProgressEntity | null;

  private constructor(
    readonly runId: string,
    readonly startedAt: string,
    private readonly completed: Set<string>,
    private readonly failed: Set<string>,
    inProgress: InProgressEntity | null,
    metadataCursor: number,
    readonly totals: CheckpointTotals,
  ) {
    this.inProgress = inProgress;
    this.metadataCursor = metadataCursor;
  }

  static fresh(runId: string, startedAt: Date): CheckpointState {
    return new CheckpointState(
      runId,
      startedAt.toISOString(),
      new Set(),
      new Set(),
      null,
      0,
      { recordsRead: 0, pointsWritten: 0, recordsCorrected: 0, recordsDropped: 0 },
    );
  }

  static fromSnapshot(snapshot: CheckpointSnapshot): CheckpointState {
    return new CheckpointState(
      snapshot.runId,
      snapshot.startedAt,
      new Set(snapshot.entitiesCompleted),
      new Set(snapshot.entitiesFailed),
      snapshot.inProgress,
      snapshot.metadataCursor,
      { ...snapshot.totals },
    );
  }

  get completedCount(): number {
    return this.completed.size;
  }

  get failedEntities(): string[] {
    return [...this.failed];
  }

  isCompleted(externalId: string): boolean {
    return this.completed.has(externalId);
  }

  /**
   * Timestamp to resume a tier after; null means from the beginning.
   */
  resumeAfter(externalId: string, tier: SeriesTier): number | null {
    if (this.inProgress?.externalId !== externalId) {
      return null;
    }
    return this.inProgress.tiers[tier] ?? null;
  }

  begin(externalId: string): void {
    if (this.inProgress?.externalId !== externalId) {
      this.inProgress = { externalId, tiers: {} };
    }
  }

  advance(externalId: string, tier: SeriesTier, lastTimestamp: number): void {
    this.begin(externalId);
    if (this.inProgress) {
      this.inProgress.tiers[tier] = lastTimestamp;
    }
  }

  complete(externalId: string): void {
    this.completed.add(externalId);
    this.failed.delete(externalId);
    this.inProgress = null;
  }

  fail(externalId: string): void {
    this.failed.add(externalId);
    this.inProgress = null;
  }

  addTotals(delta: CheckpointTotals): void {
    this.totals.recordsRead += delta.recordsRead;
    this.totals.pointsWritten += delta.pointsWritten;
    this.totals.recordsCorrected += delta.recordsCorrected;
    this.totals.recordsDropped += delta.recordsDropped;
  }

  toSnapshot(now: Date = new Date()): CheckpointSnapshot {
    return {
      version: CHECKPOINT_VERSION,
      runId: this.runId,
      startedAt: this.startedAt,
      updatedAt: now.toISOString(),
      metadataCursor: this.metadataCursor,
      entitiesCompleted: [...this.completed],
      entitiesFailed: [...this.failed],
      inProgress: this.inProgress
        ? {
            externalId: this.inProgress.externalId,
            tiers: { ...this.inProgress.tiers },
          }
        : null,
      totals: { ...this.totals },
    };
  }
}

export interface LoadOptions {
  /** Move an unreadable file aside instead of leaving it in place */
  quarantine: boolean;
}

/**
 * CheckpointStore
 *
 * JSON checkpoint file handling. Writes go to a sibling temp file that is
 * renamed over the target, so a crash leaves either the old or the new
 * snapshot, never a partial one.
 */
@Injectable()
export class CheckpointStore {
  private readonly logger = new Logger(CheckpointStore.name);

  /**
   * Absent or malformed files yield null (start fresh).
   *
   * @throws CheckpointCorruptError if the file exists but cannot be read,
   * or a malformed file cannot be moved aside
   */
  async load(
    filePath: string,
    options: LoadOptions = { quarantine: true },
  ): Promise<CheckpointSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return null;
      }
      throw new CheckpointCorruptError(
        filePath,
        `Cannot read checkpoint: ${describeError(error)}`,
        error,
      );
    }

    const parsed = parseSnapshot(raw);
    if (parsed.ok) {
      return parsed.snapshot;
    }

    this.logger.warn(
      `Ignoring malformed checkpoint ${filePath}: ${parsed.reason}`,
    );
    if (options.quarantine) {
      const aside = `${filePath}.corrupt-${Date.now()}`;
      try {
        await fs.rename(filePath, aside);
      } catch (error) {
        throw new CheckpointCorruptError(
          filePath,
          `Malformed checkpoint could not be moved aside: ${describeError(error)}`,
          error,
        );
      }
      this.logger.warn(`Malformed checkpoint moved to ${aside}`);
    }
    return null;
  }

  async save(filePath: string, snapshot: CheckpointSnapshot): Promise<void> {
    const temporary = `${filePath}.tmp`;
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const handle = await fs.open(temporary, 'w');
    try {
      await handle.writeFile(JSON.stringify(snapshot, null, 2), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(temporary, filePath);
  }

  /**
   * Rename to `<file>.done-<runId>`. Returns the new path, or null when
   * there was no checkpoint file.
   */
  async archive(filePath: string, runId: string): Promise<string | null> {
    const archived = `${filePath}.done-${runId}`;
    try {
      await fs.rename(filePath, archived);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
    return archived;
  }

  /**
   * @returns whether a file was deleted
   */
  async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }
}

function parseSnapshot(
  raw: string,
):
  | { ok: true; snapshot: CheckpointSnapshot }
  | { ok: false; reason: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { ok: false, reason: `invalid JSON (${describeError(error)})` };
  }

  const result = checkpointSchema.safeParse(json);
  if (!result.success) {
    return {
      ok: false,
      reason: result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }
  return { ok: true, snapshot: result.data };
}

function isErrno(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
