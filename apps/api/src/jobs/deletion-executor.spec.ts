import { UpstreamError } from '../radarr/radarr.errors';
import { RadarrService } from '../radarr/radarr.service';
import { DeletionExecutor, type ExecuteRun } from './deletion-executor';
import type { Candidate } from './jobs.types';
import { RunStateStore } from './run-state.store';

type RadarrMock = Pick<RadarrService, 'deleteMovie' | 'addImportExclusion'>;
type RunStateMock = Pick<RunStateStore, 'save'>;

const FINISHED_AT = '2024-06-30T12:00:05.000Z';

function candidate(id: number, overrides: Partial<Candidate> = {}): Candidate {
  return {
    id,
    title: `Film ${id}`,
    year: 2000 + id,
    added: '2024-01-01T00:00:00Z',
    ageDays: 181,
    path: `/movies/Film ${id}`,
    tmdbId: 100 + id,
    ...overrides,
  };
}

function createRun(): ExecuteRun {
  return {
    runId: 'run-1',
    trigger: 'manual',
    startedAt: new Date('2024-06-30T12:00:00Z'),
    cutoff: '2024-05-31T12:00:00.000Z',
    rule: {
      tagLabel: 'autodelete30',
      daysOld: 30,
      dryRun: false,
      deleteFiles: true,
      addImportExclusion: false,
    },
    connection: {
      baseUrl: 'http://radarr.local:7878',
      apiKey: 'test-key',
      timeoutMs: 30_000,
    },
    clock: () => new Date(FINISHED_AT),
  };
}

function createExecutor() {
  const radarr: jest.Mocked<RadarrMock> = {
    deleteMovie: jest.fn().mockResolvedValue(undefined),
    addImportExclusion: jest.fn().mockResolvedValue(undefined),
  };
  const runState: jest.Mocked<RunStateMock> = {
    save: jest.fn().mockResolvedValue(undefined),
  };
  const executor = new DeletionExecutor(
    radarr as unknown as RadarrService,
    runState as unknown as RunStateStore,
  );
  return { executor, radarr, runState };
}

const boom = () =>
  new UpstreamError('Radarr delete movie failed: HTTP 500 boom', 500);

describe('DeletionExecutor', () => {
  it('makes no mutating calls on a dry run and stamps every candidate', async () => {
    const { executor, radarr, runState } = createExecutor();

    const result = await executor.execute(
      [candidate(1), candidate(2), candidate(3)],
      { dryRun: true, deleteFiles: true, addImportExclusion: true },
      createRun(),
    );

    expect(radarr.deleteMovie).not.toHaveBeenCalled();
    expect(radarr.addImportExclusion).not.toHaveBeenCalled();
    expect(result.status).toBe('ok');
    expect(result.items.map((i) => i.deletedAt)).toEqual([
      FINISHED_AT,
      FINISHED_AT,
      FINISHED_AT,
    ]);
    expect(result.deletedCount).toBe(3);
    expect(result.failedCount).toBe(0);
    expect(result.durationSeconds).toBe(5);
    expect(runState.save).toHaveBeenCalledWith(result);
  });

  it('reports ok_with_errors when one of two deletes fails', async () => {
    const { executor, radarr } = createExecutor();
    radarr.deleteMovie.mockRejectedValueOnce(boom());

    const result = await executor.execute(
      [candidate(1), candidate(2)],
      { dryRun: false, deleteFiles: true, addImportExclusion: false },
      createRun(),
    );

    expect(radarr.deleteMovie.mock.calls.map((c) => c[1])).toEqual([
      { movieId: 1, deleteFiles: true },
      { movieId: 2, deleteFiles: true },
    ]);
    expect(result.status).toBe('ok_with_errors');
    expect(result.items[0]).toMatchObject({
      id: 1,
      deletedAt: null,
      error: 'delete failed: Radarr delete movie failed: HTTP 500 boom',
    });
    expect(result.items[1]).toMatchObject({
      id: 2,
      deletedAt: FINISHED_AT,
      error: null,
    });
    expect(result.candidatesFound).toBe(2);
    expect(result.deletedCount).toBe(1);
    expect(result.failedCount).toBe(1);
  });

  it('reports failed when every candidate fails', async () => {
    const { executor, radarr } = createExecutor();
    radarr.deleteMovie.mockRejectedValue(boom());

    const result = await executor.execute(
      [candidate(1), candidate(2)],
      { dryRun: false, deleteFiles: false, addImportExclusion: false },
      createRun(),
    );

    expect(result.status).toBe('failed');
    expect(result.failedCount).toBe(2);
    expect(result.deletedCount).toBe(0);
  });

  it('reports ok for a live run with no candidates', async () => {
    const { executor, runState } = createExecutor();

    const result = await executor.execute(
      [],
      { dryRun: false, deleteFiles: true, addImportExclusion: false },
      createRun(),
    );

    expect(result.status).toBe('ok');
    expect(result.items).toEqual([]);
    expect(runState.save).toHaveBeenCalledTimes(1);
  });

  it('attempts the exclusion independently of the delete outcome', async () => {
    const { executor, radarr } = createExecutor();
    radarr.deleteMovie.mockRejectedValueOnce(boom());
    radarr.addImportExclusion
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error('exclusion rejected'));

    const result = await executor.execute(
      [candidate(1), candidate(2), candidate(3, { tmdbId: null })],
      { dryRun: false, deleteFiles: true, addImportExclusion: true },
      createRun(),
    );

    expect(radarr.addImportExclusion.mock.calls.map((c) => c[1])).toEqual([
      { tmdbId: 101, title: 'Film 1', year: 2001 },
      { tmdbId: 102, title: 'Film 2', year: 2002 },
    ]);
    expect(result.items.map((i) => [i.deletedAt, i.excluded, i.error])).toEqual([
      [
        null,
        true,
        'delete failed: Radarr delete movie failed: HTTP 500 boom',
      ],
      [FINISHED_AT, false, 'import exclusion failed: exclusion rejected'],
      [FINISHED_AT, false, 'import exclusion skipped: movie has no tmdbId'],
    ]);
    expect(result.status).toBe('failed');
  });

  it('echoes the run identity and rule into the result', async () => {
    const { executor } = createExecutor();

    const result = await executor.execute(
      [candidate(1)],
      { dryRun: false, deleteFiles: true, addImportExclusion: false },
      createRun(),
    );

    expect(result).toMatchObject({
      runId: 'run-1',
      trigger: 'manual',
      startedAt: '2024-06-30T12:00:00.000Z',
      finishedAt: FINISHED_AT,
      cutoff: '2024-05-31T12:00:00.000Z',
      error: null,
      rule: { tagLabel: 'autodelete30', daysOld: 30 },
    });
  });
});
