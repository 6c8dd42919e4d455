import { Module } from '@nestjs/common';
import { InfluxPointSink } from './influx.sink';
import { POINT_SINK } from './interfaces/point-sink.interface';

/**
 * SinkModule
 *
 * Binds POINT_SINK to the InfluxDB 2 implementation. Connection settings
 * come from the global ConfigModule.
 */
@Module({
  providers: [
    InfluxPointSink,
    { provide: POINT_SINK, useExisting: InfluxPointSink },
  ],
  exports: [POINT_SINK],
})
export class SinkModule {}
