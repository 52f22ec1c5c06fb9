import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { ConfigError } from '../settings/config.error';
import type { JobRunTrigger, RunResult } from './jobs.types';
import { RunStateStore } from './run-state.store';
import { TagCleanupJob, type CleanupPreview } from './tag-cleanup.job';

export const TAG_CLEANUP_JOB = {
  id: 'tagCleanup',
  name: 'Tag cleanup',
  description:
    'Deletes Radarr movies that carry the configured tag and were added more than the configured number of days ago.',
} as const;

export type ActiveRun = {
  runId: string;
  trigger: JobRunTrigger;
  dryRun: boolean | null;
  startedAt: string;
};

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);
  private active: ActiveRun | null = null;

  constructor(
    private readonly job: TagCleanupJob,
    private readonly runState: RunStateStore,
  ) {}

  isRunning(): boolean {
    return this.active !== null;
  }

  getActiveRun(): ActiveRun | null {
    return this.active ? { ...this.active } : null;
  }

  /** Run to completion. Rejects with 409 while another run is active. */
  async runJob(params: {
    trigger: JobRunTrigger;
    dryRun?: boolean;
  }): Promise<RunResult> {
    const active = this.begin(params);
    try {
      return await this.job.run({
        runId: active.runId,
        trigger: active.trigger,
        dryRun: params.dryRun,
      });
    } finally {
      this.active = null;
    }
  }

  /**
   * Start a run and return as soon as it is accepted. A run that cannot start
   * because of configuration is still recorded, then reported as a 400.
   */
  async startJob(params: {
    trigger: JobRunTrigger;
    dryRun?: boolean;
  }): Promise<ActiveRun> {
    const active = this.begin(params);
    const runParams = {
      runId: active.runId,
      trigger: active.trigger,
      dryRun: params.dryRun,
    };

    let problems: string[];
    try {
      problems = await this.job.validate(params.dryRun);
    } catch (err) {
      this.active = null;
      throw err;
    }

    if (problems.length) {
      try {
        await this.job.run(runParams);
      } finally {
        this.active = null;
      }
      throw new ConfigError(problems);
    }

    // Run in the background so API calls return quickly; the result is persisted.
    void this.job
      .run(runParams)
      .catch((err) => {
        this.logger.error(
          `Unhandled job execution error jobId=${TAG_CLEANUP_JOB.id} runId=${active.runId}: ${errToMessage(err)}`,
        );
      })
      .finally(() => {
        this.active = null;
      });

    return { ...active };
  }

  async getLastRun(): Promise<RunResult | null> {
    return await this.runState.load();
  }

  async preview(): Promise<CleanupPreview> {
    return await this.job.preview();
  }

  private begin(params: {
    trigger: JobRunTrigger;
    dryRun?: boolean;
  }): ActiveRun {
    if (this.active) {
      throw new ConflictException(
        `Job already running: ${TAG_CLEANUP_JOB.id} (run ${this.active.runId})`,
      );
    }
    this.active = {
      runId: randomUUID(),
      trigger: params.trigger,
      dryRun: params.dryRun ?? null,
      startedAt: new Date().toISOString(),
    };
    return this.active;
  }
}
