import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { JobsScheduler } from '../jobs/jobs.scheduler';
import { JobsService } from '../jobs/jobs.service';
import { SettingsService } from '../settings/settings.service';
import { buildDashboard } from './run-reporter';

@Controller('dashboard')
@ApiTags('dashboard')
export class DashboardController {
  constructor(
    private readonly settingsService: SettingsService,
    private readonly jobsService: JobsService,
    private readonly jobsScheduler: JobsScheduler,
  ) {}

  @Get()
  async get() {
    const [settings, lastRun] = await Promise.all([
      this.settingsService.getSettings(),
      this.jobsService.getLastRun(),
    ]);
    return buildDashboard({
      lastRun,
      settings,
      now: new Date(),
      nextRunAt: this.jobsScheduler.getNextRunAt(),
      running: this.jobsService.isRunning(),
    });
  }
}
