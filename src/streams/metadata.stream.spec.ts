import { Test } from '@nestjs/testing';
import { InMemoryRecorderSource } from '../../test/utils/in-memory-recorder-source';
import { testRunContext } from '../../test/utils/test-context';
import { RecorderSchemaError, RetryExhaustedError } from '../common/errors';
import { RECORDER_SOURCE } from '../source/interfaces/recorder-source.interface';
import { MetadataPage, MetadataStream } from './metadata.stream';

async function collect(pages: AsyncIterable<MetadataPage>): Promise<MetadataPage[]> {
  const collected: MetadataPage[] = [];
  for await (const page of pages) {
    collected.push(page);
  }
  return collected;
}

describe('MetadataStream', () => {
  let source: InMemoryRecorderSource;
  let stream: MetadataStream;
  const context = testRunContext({ METADATA_BATCH_SIZE: '3' });

  beforeEach(async () => {
    source = new InMemoryRecorderSource();
    const module = await Test.createTestingModule({
      providers: [MetadataStream, { provide: RECORDER_SOURCE, useValue: source }],
    }).compile();
    stream = module.get(MetadataStream);
  });

  const seed = (count: number) => {
    for (let key = 1; key <= count; key++) {
      source.addEntity({ entityKey: key, externalId: `sensor.meter_${key}` });
    }
  };

  it('should page through every entity and stop after a short page', async () => {
    seed(7);

    const pages = await collect(stream.pages(context));

    expect(pages.map(({ offset, nextOffset }) => [offset, nextOffset])).toEqual([
      [0, 3],
      [3, 6],
      [6, 7],
    ]);
    expect(pages.flatMap((page) => page.entities.map((e) => e.entityKey))).toEqual([
      1, 2, 3, 4, 5, 6, 7,
    ]);
    expect(source.entityPageCalls).toHaveLength(3);
  });

  it('should stop on an empty page when the total is a multiple of the page size', async () => {
    seed(6);

    const pages = await collect(stream.pages(context));

    expect(pages).toHaveLength(2);
    expect(source.entityPageCalls).toEqual([
      { offset: 0, limit: 3 },
      { offset: 3, limit: 3 },
      { offset: 6, limit: 3 },
    ]);
  });

  it('should start from the given offset', async () => {
    seed(5);

    const pages = await collect(stream.pages(context, 3));

    expect(pages.flatMap((page) => page.entities.map((e) => e.entityKey))).toEqual([4, 5]);
  });

  it('should yield nothing for an empty source', async () => {
    await expect(collect(stream.pages(context))).resolves.toEqual([]);
  });

  it('should retry a failed page', async () => {
    seed(2);
    jest
      .spyOn(source, 'fetchEntityPage')
      .mockRejectedValueOnce(new Error('database is locked'));

    const pages = await collect(stream.pages(context));

    expect(pages[0].entities).toHaveLength(2);
    expect(source.entityPageCalls).toHaveLength(1);
  });

  it('should give up once retries are exhausted', async () => {
    jest.spyOn(source, 'fetchEntityPage').mockRejectedValue(new Error('disk I/O error'));

    await expect(collect(stream.pages(context))).rejects.toThrow(RetryExhaustedError);
    expect(source.fetchEntityPage).toHaveBeenCalledTimes(3);
  });

  it('should not retry schema errors', async () => {
    jest
      .spyOn(source, 'fetchEntityPage')
      .mockRejectedValue(new RecorderSchemaError('no such table: statistics_meta'));

    await expect(collect(stream.pages(context))).rejects.toThrow(RecorderSchemaError);
    expect(source.fetchEntityPage).toHaveBeenCalledTimes(1);
  });

  describe('estimateCount', () => {
    it('should fall back to 0 when the estimate fails', async () => {
      jest.spyOn(source, 'estimateEntityCount').mockRejectedValue(new Error('busy'));

      await expect(stream.estimateCount()).resolves.toBe(0);
    });
  });
});
