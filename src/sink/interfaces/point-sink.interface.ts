import { SinkPoint } from '../point.builder';

/**
 * Injection token for the active PointSink implementation.
 */
export const POINT_SINK = Symbol('POINT_SINK');

/**
 * PointSink Interface
 *
 * Batched point writes keyed by (measurement, tags, timestamp) with
 * overwrite-on-duplicate semantics. Bucket lifecycle is not its concern.
 */
export interface PointSink {
  /**
   * Check the sink is reachable and every bucket exists.
   * @throws SinkUnavailableError otherwise
   */
  verify(buckets: readonly string[]): Promise<void>;

  /**
   * Write one batch as a unit. Resolves with the number of points written
   * once the sink has confirmed the write.
   * @throws SinkWriteError if the sink rejected the batch
   */
  write(bucket: string, points: readonly SinkPoint[]): Promise<number>;
}
