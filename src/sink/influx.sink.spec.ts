import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpError } from '@influxdata/influxdb-client';
import { SinkUnavailableError, SinkWriteError } from '../common/errors';
import { InfluxPointSink, toInfluxPoint } from './influx.sink';
import { SinkPoint } from './point.builder';

const mockWriteApi = {
  writePoints: jest.fn(),
  close: jest.fn(),
};
const mockGetWriteApi = jest.fn(() => mockWriteApi);
const mockGetHealth = jest.fn();
const mockGetBuckets = jest.fn();

// Only the client entry points are replaced; Point and HttpError stay real
jest.mock('@influxdata/influxdb-client', () => ({
  ...jest.requireActual('@influxdata/influxdb-client'),
  InfluxDB: jest.fn().mockImplementation(() => ({
    getWriteApi: mockGetWriteApi,
  })),
}));

jest.mock('@influxdata/influxdb-client-apis', () => ({
  HealthAPI: jest.fn().mockImplementation(() => ({ getHealth: mockGetHealth })),
  BucketsAPI: jest.fn().mockImplementation(() => ({ getBuckets: mockGetBuckets })),
}));

const point: SinkPoint = {
  measurement: '°C',
  tags: {
    entity_id: 'outdoor_temp',
    domain: 'sensor',
    category: 'temperature',
    source: 'migration',
    friendly_name: 'Outdoor temperature',
  },
  fields: { value: 21.5 },
  timestamp: 1_700_000_000,
};

describe('InfluxPointSink', () => {
  let sink: InfluxPointSink;
  let config: Record<string, string | number>;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockWriteApi.close.mockResolvedValue(undefined);

    config = {
      INFLUX_URL: 'http://localhost:8086',
      INFLUX_TOKEN: 'test-secret',
      INFLUX_ORG: 'test-org',
      INFLUX_TIMEOUT_MS: 30000,
    };
    const configService: Partial<ConfigService> = {
      get: jest.fn((key: string) => config[key]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [InfluxPointSink, { provide: ConfigService, useValue: configService }],
    }).compile();

    sink = module.get<InfluxPointSink>(InfluxPointSink);
  });

  describe('verify', () => {
    it('should require a token and an org', async () => {
      config.INFLUX_TOKEN = '';

      await expect(sink.verify(['recent'])).rejects.toThrow(SinkUnavailableError);
      expect(mockGetHealth).not.toHaveBeenCalled();
    });

    it('should check health once and every distinct bucket', async () => {
      mockGetHealth.mockResolvedValue({ status: 'pass', version: '2.7.4' });
      mockGetBuckets.mockResolvedValue({ buckets: [{ name: 'any' }] });

      await sink.verify(['recent', 'historical', 'recent']);

      expect(mockGetHealth).toHaveBeenCalledTimes(1);
      expect(mockGetBuckets.mock.calls).toEqual([
        [{ org: 'test-org', name: 'recent' }],
        [{ org: 'test-org', name: 'historical' }],
      ]);
    });

    it('should report an unreachable server', async () => {
      mockGetHealth.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(sink.verify(['recent'])).rejects.toThrow(
        'InfluxDB at http://localhost:8086 is unreachable: connect ECONNREFUSED',
      );
    });

    it('should report an unhealthy server', async () => {
      mockGetHealth.mockResolvedValue({ status: 'fail', message: 'storage is read-only' });

      await expect(sink.verify(['recent'])).rejects.toThrow(
        'InfluxDB health check failed: storage is read-only',
      );
    });

    it('should report a missing bucket', async () => {
      mockGetHealth.mockResolvedValue({ status: 'pass' });
      mockGetBuckets.mockRejectedValue(new HttpError(404, 'Not Found'));

      await expect(sink.verify(['historical'])).rejects.toThrow(
        "Bucket 'historical' does not exist in org 'test-org'",
      );
    });
  });

  describe('write', () => {
    it('should not open a write API for an empty batch', async () => {
      await expect(sink.write('recent', [])).resolves.toBe(0);
      expect(mockGetWriteApi).not.toHaveBeenCalled();
    });

    it('should write the whole batch and wait for the flush', async () => {
      await expect(sink.write('recent', [point, point])).resolves.toBe(2);

      expect(mockGetWriteApi).toHaveBeenCalledWith('test-org', 'recent', 's', {
        batchSize: 3,
        maxBufferLines: 3,
        flushInterval: 0,
        maxRetries: 0,
      });
      expect(mockWriteApi.writePoints).toHaveBeenCalledTimes(1);
      expect(mockWriteApi.close).toHaveBeenCalledTimes(1);
    });

    it('should wrap rejected flushes with the HTTP status', async () => {
      mockWriteApi.close.mockRejectedValue(new HttpError(401, 'Unauthorized'));

      const error: unknown = await sink.write('recent', [point]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SinkWriteError);
      expect(error).toMatchObject({ bucket: 'recent', pointCount: 1, statusCode: 401 });
      expect(error instanceof SinkWriteError && error.isAuthFailure).toBe(true);
    });

    it('should leave the status empty for network failures', async () => {
      mockWriteApi.close.mockRejectedValue(new Error('socket hang up'));

      await expect(sink.write('recent', [point])).rejects.toMatchObject({
        statusCode: null,
        message: "Failed to write 1 point(s) to bucket 'recent': socket hang up",
      });
    });
  });
});

describe('toInfluxPoint', () => {
  it('should render tags sorted and escaped with a float value', () => {
    expect(toInfluxPoint(point).toLineProtocol()).toBe(
      '°C,category=temperature,domain=sensor,entity_id=outdoor_temp,' +
        'friendly_name=Outdoor\\ temperature,source=migration ' +
        'value=21.5 1700000000000000000',
    );
  });
});
