import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RunResult } from './jobs.types';
import { RunStateStore } from './run-state.store';

function sampleResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    runId: 'run-1',
    trigger: 'schedule',
    startedAt: '2024-06-30T03:15:00.000Z',
    finishedAt: '2024-06-30T03:15:02.500Z',
    durationSeconds: 2.5,
    status: 'ok_with_errors',
    cutoff: '2024-05-31T03:15:00.000Z',
    candidatesFound: 2,
    deletedCount: 1,
    failedCount: 1,
    items: [
      {
        id: 1,
        title: 'Film 1',
        year: 2001,
        added: '2024-01-01T00:00:00Z',
        ageDays: 181,
        path: '/movies/Film 1',
        deletedAt: '2024-06-30T03:15:01.000Z',
        excluded: false,
        error: null,
      },
      {
        id: 2,
        title: 'Film 2',
        year: null,
        added: '2024-02-01T00:00:00Z',
        ageDays: 150,
        path: null,
        deletedAt: null,
        excluded: false,
        error: 'delete failed: Radarr delete movie failed: HTTP 500 boom',
      },
    ],
    error: null,
    rule: {
      tagLabel: 'autodelete30',
      daysOld: 30,
      dryRun: false,
      deleteFiles: true,
      addImportExclusion: false,
    },
    ...overrides,
  };
}

describe('RunStateStore', () => {
  let dir: string;
  let store: RunStateStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reaparr-runs-'));
    store = new RunStateStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null before any run was recorded', async () => {
    await expect(store.load()).resolves.toBeNull();
  });

  it('reads back exactly what was saved', async () => {
    const result = sampleResult();
    await store.save(result);
    await expect(store.load()).resolves.toEqual(result);
  });

  it('keeps only the latest run', async () => {
    await store.save(sampleResult());
    const next = sampleResult({
      runId: 'run-2',
      status: 'skipped',
      candidatesFound: 0,
      deletedCount: 0,
      failedCount: 0,
      items: [],
      error: "Tag 'autodelete30' not found in Radarr. Create it and tag movies first.",
    });
    await store.save(next);

    await expect(store.load()).resolves.toEqual(next);
  });

  it('ignores a record with an unexpected shape', async () => {
    await writeFile(
      join(dir, 'last-run.json'),
      JSON.stringify({ ...sampleResult(), status: 'RUNNING' }),
      'utf8',
    );
    await expect(store.load()).resolves.toBeNull();
  });
});
