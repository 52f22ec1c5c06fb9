import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { CronJob } from 'cron';
import type { Subscription } from 'rxjs';
import { SettingsService } from '../settings/settings.service';
import { JobsService, TAG_CLEANUP_JOB } from './jobs.service';
import type { JobRunTrigger } from './jobs.types';

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function toIsoString(value: unknown): string | null {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value.trim() ? value.trim() : null;
  if (!value || typeof value !== 'object') return null;

  const rec = value as Record<string, unknown>;
  const toISO = rec['toISO'];
  if (typeof toISO === 'function') {
    const out = (toISO as () => unknown).call(value);
    if (typeof out === 'string') return out;
  }

  const toJSDate = rec['toJSDate'];
  if (typeof toJSDate === 'function') {
    const out = (toJSDate as () => unknown).call(value);
    if (out instanceof Date) return out.toISOString();
  }

  return null;
}

export function schedulerEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.SCHEDULER_ENABLED !== 'false';
}

/**
 * Owns the cron timer for the cleanup job. The schedule follows the stored
 * `cronSchedule` and is rebuilt whenever that setting changes.
 */
@Injectable()
export class JobsScheduler
  implements OnModuleInit, OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(JobsScheduler.name);
  private cronJob: CronJob | null = null;
  private cron: string | null = null;
  private subscription: Subscription | null = null;

  constructor(
    private readonly settings: SettingsService,
    private readonly jobsService: JobsService,
  ) {}

  async onModuleInit() {
    if (!schedulerEnabled()) {
      this.logger.warn('Scheduler disabled via SCHEDULER_ENABLED=false');
      return;
    }

    const current = await this.settings.getSettings();
    this.schedule(current.cronSchedule);

    this.subscription = this.settings.changes$.subscribe((change) => {
      if (!change.changed.includes('cronSchedule')) return;
      this.schedule(change.next.cronSchedule);
    });
  }

  async onApplicationBootstrap() {
    if (!schedulerEnabled()) return;
    const current = await this.settings.getSettings();
    if (!current.runOnStartup) return;

    this.logger.log('RUN_ON_STARTUP enabled: starting a cleanup run');
    void this.trigger('startup');
  }

  onModuleDestroy() {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.stop();
  }

  getCron(): string | null {
    return this.cron;
  }

  getNextRunAt(): string | null {
    if (!this.cronJob) return null;
    try {
      const next: unknown = this.cronJob.nextDate();
      return toIsoString(next);
    } catch {
      return null;
    }
  }

  /** Fired by the cron timer; a tick that lands on an active run is dropped. */
  async trigger(trigger: JobRunTrigger): Promise<void> {
    if (this.jobsService.isRunning()) {
      this.logger.warn(
        `Skipping ${trigger} run of ${TAG_CLEANUP_JOB.id}: a run is already in progress`,
      );
      return;
    }
    try {
      await this.jobsService.runJob({ trigger });
    } catch (err) {
      this.logger.error(
        `Scheduled job failed jobId=${TAG_CLEANUP_JOB.id}: ${errToMessage(err)}`,
      );
    }
  }

  private schedule(cron: string) {
    this.stop();
    try {
      const job = new CronJob(cron, async () => {
        await this.trigger('schedule');
      });
      job.start();
      this.cronJob = job;
      this.cron = cron;
      this.logger.log(`Scheduled ${TAG_CLEANUP_JOB.id} cron=${cron}`);
    } catch (err) {
      this.logger.error(
        `Failed to schedule jobId=${TAG_CLEANUP_JOB.id} cron=${cron}: ${errToMessage(err)}`,
      );
    }
  }

  private stop() {
    this.cronJob?.stop();
    this.cronJob = null;
    this.cron = null;
  }
}
