import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { CheckpointCorruptError } from '../common/errors';
import { CheckpointState, CheckpointStore } from './checkpoint.store';

const STARTED = new Date('2024-03-01T12:30:45.000Z');
const UPDATED = new Date('2024-03-01T12:31:00.000Z');

describe('CheckpointState', () => {
  it('should track the in-progress entity per tier', () => {
    const state = CheckpointState.fresh('20240301_123045', STARTED);

    state.advance('sensor.a', 'short_term', 300);
    state.advance('sensor.a', 'long_term', 7200);

    expect(state.resumeAfter('sensor.a', 'short_term')).toBe(300);
    expect(state.resumeAfter('sensor.a', 'long_term')).toBe(7200);
    expect(state.resumeAfter('sensor.b', 'long_term')).toBeNull();
  });

  it('should reset tier positions when a different entity begins', () => {
    const state = CheckpointState.fresh('run', STARTED);
    state.advance('sensor.a', 'long_term', 7200);

    state.begin('sensor.b');

    expect(state.inProgress).toEqual({ externalId: 'sensor.b', tiers: {} });
  });

  it('should keep tier positions when the same entity begins again', () => {
    const state = CheckpointState.fresh('run', STARTED);
    state.advance('sensor.a', 'long_term', 7200);

    state.begin('sensor.a');

    expect(state.resumeAfter('sensor.a', 'long_term')).toBe(7200);
  });

  it('should clear a previous failure when the entity completes', () => {
    const state = CheckpointState.fresh('run', STARTED);
    state.fail('sensor.a');
    expect(state.failedEntities).toEqual(['sensor.a']);

    state.complete('sensor.a');

    expect(state.failedEntities).toEqual([]);
    expect(state.isCompleted('sensor.a')).toBe(true);
    expect(state.inProgress).toBeNull();
  });

  it('should serialize every field', () => {
    const state = CheckpointState.fresh('20240301_123045', STARTED);
    state.complete('sensor.done');
    state.fail('sensor.broken');
    state.advance('sensor.busy', 'short_term', 1_700_000_300);
    state.metadataCursor = 5000;
    state.addTotals({ recordsRead: 10, pointsWritten: 8, recordsCorrected: 1, recordsDropped: 2 });

    expect(state.toSnapshot(UPDATED)).toEqual({
      version: 1,
      runId: '20240301_123045',
      startedAt: '2024-03-01T12:30:45.000Z',
      updatedAt: '2024-03-01T12:31:00.000Z',
      metadataCursor: 5000,
      entitiesCompleted: ['sensor.done'],
      entitiesFailed: ['sensor.broken'],
      inProgress: { externalId: 'sensor.busy', tiers: { short_term: 1_700_000_300 } },
      totals: { recordsRead: 10, pointsWritten: 8, recordsCorrected: 1, recordsDropped: 2 },
    });
  });
});

describe('CheckpointStore', () => {
  const store = new CheckpointStore();
  let directory: string;
  let file: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpoint-'));
    file = path.join(directory, 'export_checkpoint.json');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  const snapshot = () => {
    const state = CheckpointState.fresh('20240301_123045', STARTED);
    state.complete('sensor.a');
    state.advance('sensor.b', 'long_term', 7200);
    return state.toSnapshot(UPDATED);
  };

  it('should return null when no checkpoint exists', async () => {
    await expect(store.load(file)).resolves.toBeNull();
  });

  it('should load what it saved', async () => {
    await store.save(file, snapshot());

    const loaded = await store.load(file);

    expect(loaded).toEqual(snapshot());
    expect(await fs.readdir(directory)).toEqual(['export_checkpoint.json']);
  });

  it('should create missing parent directories', async () => {
    const nested = path.join(directory, 'state', 'checkpoint.json');

    await store.save(nested, snapshot());

    await expect(store.load(nested)).resolves.toEqual(snapshot());
  });

  it('should move a malformed checkpoint aside and start fresh', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
    await fs.writeFile(file, '{"version": 1, "runId": ', 'utf-8');

    await expect(store.load(file)).resolves.toBeNull();

    expect(await fs.readdir(directory)).toEqual(['export_checkpoint.json.corrupt-1700000000000']);
    jest.restoreAllMocks();
  });

  it('should treat a schema mismatch as malformed', async () => {
    await fs.writeFile(file, JSON.stringify({ ...snapshot(), version: 2 }), 'utf-8');

    await expect(store.load(file, { quarantine: false })).resolves.toBeNull();
    expect(await fs.readdir(directory)).toEqual(['export_checkpoint.json']);
  });

  it('should fail when the checkpoint path cannot be read', async () => {
    await fs.mkdir(file);

    await expect(store.load(file)).rejects.toThrow(CheckpointCorruptError);
  });

  it('should archive under the run id', async () => {
    await store.save(file, snapshot());

    const archived = await store.archive(file, '20240301_123045');

    expect(archived).toBe(`${file}.done-20240301_123045`);
    expect(await fs.readdir(directory)).toEqual([
      'export_checkpoint.json.done-20240301_123045',
    ]);
    await expect(store.archive(file, 'again')).resolves.toBeNull();
  });

  it('should report whether a file was removed', async () => {
    await store.save(file, snapshot());

    await expect(store.remove(file)).resolves.toBe(true);
    await expect(store.remove(file)).resolves.toBe(false);
  });
});
