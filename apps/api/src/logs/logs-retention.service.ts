import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { serverLogs } from './server-logs.store';

const DAY_MS = 24 * 60 * 60_000;

@Injectable()
export class LogsRetentionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LogsRetentionService.name);
  private startupTimer: NodeJS.Timeout | null = null;

  static readonly RETENTION_DAYS = 15;

  onModuleInit() {
    this.startupTimer = setTimeout(() => this.prune(), 15_000);
    this.startupTimer.unref();
  }

  onModuleDestroy() {
    if (this.startupTimer) clearTimeout(this.startupTimer);
    this.startupTimer = null;
  }

  @Interval(DAY_MS)
  daily() {
    this.prune();
  }

  prune(now: Date = new Date()) {
    const cutoff = new Date(
      now.getTime() - LogsRetentionService.RETENTION_DAYS * DAY_MS,
    );
    const res = serverLogs.pruneOlderThan(cutoff);
    if (res.removed > 0) {
      this.logger.log(
        `Log retention: removed=${res.removed} kept=${res.kept} cutoff=${cutoff.toISOString()}`,
      );
    }
    return res;
  }
}
