import { SinkWriteError } from '../../src/common/errors';
import { PointSink } from '../../src/sink/interfaces/point-sink.interface';
import { SinkPoint } from '../../src/sink/point.builder';

export interface RecordedWrite {
  bucket: string;
  points: SinkPoint[];
}

/**
 * In-process PointSink that keeps every accepted batch.
 *
 * `failAfter(k)` rejects every write after the k-th with a 401, which the
 * pipeline treats as fatal; this simulates a run killed after batch k.
 */
export class FakePointSink implements PointSink {
  readonly writes: RecordedWrite[] = [];
  readonly verified: string[][] = [];
  private remainingWrites: number | null = null;

  failAfter(writes: number): this {
    this.remainingWrites = writes;
    return this;
  }

  heal(): this {
    this.remainingWrites = null;
    return this;
  }

  verify(buckets: readonly string[]): Promise<void> {
    this.verified.push([...buckets]);
    return Promise.resolve();
  }

  write(bucket: string, points: readonly SinkPoint[]): Promise<number> {
    if (this.remainingWrites !== null) {
      if (this.remainingWrites === 0) {
        return Promise.reject(
          new SinkWriteError(bucket, points.length, 401, new Error('unauthorized')),
        );
      }
      this.remainingWrites--;
    }
    this.writes.push({ bucket, points: [...points] });
    return Promise.resolve(points.length);
  }

  get points(): SinkPoint[] {
    return this.writes.flatMap((write) => write.points);
  }

  /**
   * Identity of every stored point as the sink sees it; re-sent points
   * collapse into one key.
   */
  pointKeys(): Set<string> {
    return new Set(this.writes.flatMap((write) => write.points.map((point) => pointKey(write.bucket, point))));
  }
}

export function pointKey(bucket: string, point: SinkPoint): string {
  const tags = Object.keys(point.tags)
    .sort()
    .map((key) => `${key}=${point.tags[key]}`)
    .join(',');
  return `${bucket}|${point.measurement}|${tags}|${point.timestamp}|${point.fields.value}`;
}
