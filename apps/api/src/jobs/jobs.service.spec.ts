import { ConflictException } from '@nestjs/common';
import { ConfigError } from '../settings/config.error';
import type { RunResult } from './jobs.types';
import { JobsService } from './jobs.service';
import { RunStateStore } from './run-state.store';
import { TagCleanupJob } from './tag-cleanup.job';

type JobMock = Pick<TagCleanupJob, 'run' | 'validate' | 'preview'>;
type RunStateMock = Pick<RunStateStore, 'load'>;

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise((r) => setImmediate(r));

function createService() {
  const job: jest.Mocked<JobMock> = {
    run: jest.fn(),
    validate: jest.fn().mockResolvedValue([]),
    preview: jest.fn(),
  };
  const runState: jest.Mocked<RunStateMock> = {
    load: jest.fn().mockResolvedValue(null),
  };
  const service = new JobsService(
    job as unknown as TagCleanupJob,
    runState as unknown as RunStateStore,
  );
  return { service, job, runState };
}

const result = { runId: 'r', status: 'ok' } as RunResult;

describe('JobsService', () => {
  it('rejects a second run while one is active', async () => {
    const { service, job } = createService();
    const pending = deferred<RunResult>();
    job.run.mockReturnValueOnce(pending.promise);

    const first = service.runJob({ trigger: 'manual' });

    expect(service.isRunning()).toBe(true);
    await expect(service.runJob({ trigger: 'manual' })).rejects.toBeInstanceOf(
      ConflictException,
    );
    expect(job.run).toHaveBeenCalledTimes(1);

    pending.resolve(result);
    await expect(first).resolves.toBe(result);
    expect(service.isRunning()).toBe(false);
  });

  it('releases the guard when a run throws', async () => {
    const { service, job } = createService();
    job.run.mockRejectedValueOnce(new Error('disk full'));

    await expect(service.runJob({ trigger: 'cli' })).rejects.toThrow(
      'disk full',
    );
    expect(service.isRunning()).toBe(false);
  });

  it('starts a run in the background and clears the guard when it ends', async () => {
    const { service, job } = createService();
    const pending = deferred<RunResult>();
    job.run.mockReturnValueOnce(pending.promise);

    const active = await service.startJob({ trigger: 'manual', dryRun: true });

    expect(active).toMatchObject({ trigger: 'manual', dryRun: true });
    expect(job.run).toHaveBeenCalledWith({
      runId: active.runId,
      trigger: 'manual',
      dryRun: true,
    });
    expect(service.getActiveRun()?.runId).toBe(active.runId);

    pending.resolve(result);
    await flush();
    expect(service.isRunning()).toBe(false);
  });

  it('records a run that cannot start and reports it as a config error', async () => {
    const { service, job } = createService();
    job.validate.mockResolvedValueOnce(['Radarr API key is required.']);
    job.run.mockResolvedValueOnce({ ...result, status: 'failed' });

    const err = await service
      .startJob({ trigger: 'manual' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    expect((err as ConfigError).problems).toEqual([
      'Radarr API key is required.',
    ]);
    expect(job.run).toHaveBeenCalledTimes(1);
    expect(service.isRunning()).toBe(false);
  });
});
