import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpError, InfluxDB, Point } from '@influxdata/influxdb-client';
import { BucketsAPI, HealthAPI } from '@influxdata/influxdb-client-apis';
import {
  describeError,
  SinkUnavailableError,
  SinkWriteError,
} from '../common/errors';
import { Environment } from '../config/environment';
import { PointSink } from './interfaces/point-sink.interface';
import { SinkPoint } from './point.builder';

/**
 * InfluxPointSink
 *
 * Writes point batches to InfluxDB 2 with second precision. Each batch gets
 * its own write API sized to hold it, so nothing flushes in the background
 * and a failed write surfaces on the awaited `close()`. The client library's
 * own retry is disabled; the pipeline decides what to retry.
 */
@Injectable()
export class InfluxPointSink implements PointSink {
  private readonly logger = new Logger(InfluxPointSink.name);
  private client: InfluxDB | null = null;

  constructor(
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  async verify(buckets: readonly string[]): Promise<void> {
    const url = this.configService.get('INFLUX_URL', { infer: true });
    const org = this.configService.get('INFLUX_ORG', { infer: true });
    if (!this.configService.get('INFLUX_TOKEN', { infer: true }) || !org) {
      throw new SinkUnavailableError(
        'INFLUX_TOKEN and INFLUX_ORG must be set to write (use --dry-run to test without a sink)',
      );
    }

    const health = await new HealthAPI(this.influx)
      .getHealth()
      .catch((error: unknown) => {
        throw new SinkUnavailableError(
          `InfluxDB at ${url} is unreachable: ${describeError(error)}`,
          error,
        );
      });
    if (health.status !== 'pass') {
      throw new SinkUnavailableError(
        `InfluxDB health check failed: ${health.message ?? health.status}`,
      );
    }

    const bucketsApi = new BucketsAPI(this.influx);
    for (const name of new Set(buckets)) {
      const found = await bucketsApi
        .getBuckets({ org, name })
        .catch((error: unknown) => {
          if (error instanceof HttpError && error.statusCode === 404) {
            return { buckets: [] };
          }
          throw new SinkUnavailableError(
            `Failed to look up bucket '${name}': ${describeError(error)}`,
            error,
          );
        });
      if (!found.buckets?.length) {
        throw new SinkUnavailableError(
          `Bucket '${name}' does not exist in org '${org}'`,
        );
      }
    }

    this.logger.log(
      `InfluxDB ${health.version ?? ''} at ${url} is healthy, buckets verified: ${[...new Set(buckets)].join(', ')}`,
    );
  }

  async write(bucket: string, points: readonly SinkPoint[]): Promise<number> {
    if (points.length === 0) {
      return 0;
    }

    const org = this.configService.get('INFLUX_ORG', { infer: true });
    const writeApi = this.influx.getWriteApi(org, bucket, 's', {
      batchSize: points.length + 1,
      maxBufferLines: points.length + 1,
      flushInterval: 0,
      maxRetries: 0,
    });

    writeApi.writePoints(points.map(toInfluxPoint));

    try {
      await writeApi.close();
    } catch (error) {
      throw new SinkWriteError(
        bucket,
        points.length,
        error instanceof HttpError ? error.statusCode : null,
        error,
      );
    }

    this.logger.debug(`Wrote ${points.length} points to '${bucket}'`);
    return points.length;
  }

  private get influx(): InfluxDB {
    if (!this.client) {
      this.client = new InfluxDB({
        url: this.configService.get('INFLUX_URL', { infer: true }),
        token: this.configService.get('INFLUX_TOKEN', { infer: true }),
        timeout: this.configService.get('INFLUX_TIMEOUT_MS', { infer: true }),
      });
    }
    return this.client;
  }
}

export function toInfluxPoint(point: SinkPoint): Point {
  const influxPoint = new Point(point.measurement)
    .floatField('value', point.fields.value)
    .timestamp(new Date(point.timestamp * 1000));
  for (const [key, value] of Object.entries(point.tags)) {
    influxPoint.tag(key, value);
  }
  return influxPoint;
}
