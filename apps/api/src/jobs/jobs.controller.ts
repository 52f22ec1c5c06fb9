import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { SettingsService } from '../settings/settings.service';
import { JobsScheduler, schedulerEnabled } from './jobs.scheduler';
import { JobsService, TAG_CLEANUP_JOB } from './jobs.service';

type RunJobBody = {
  dryRun?: unknown;
};

@Controller('jobs')
@ApiTags('jobs')
export class JobsController {
  constructor(
    private readonly jobsService: JobsService,
    private readonly jobsScheduler: JobsScheduler,
    private readonly settingsService: SettingsService,
  ) {}

  @Get()
  async listJobs() {
    const settings = await this.settingsService.getSettings();
    return {
      jobs: [
        {
          ...TAG_CLEANUP_JOB,
          schedule: {
            cron: settings.cronSchedule,
            enabled: schedulerEnabled(),
            nextRunAt: this.jobsScheduler.getNextRunAt(),
          },
          runOnStartup: settings.runOnStartup,
          running: this.jobsService.getActiveRun(),
        },
      ],
    };
  }

  @Post('run')
  @HttpCode(202)
  async runJob(@Body() body: RunJobBody) {
    const raw = body?.dryRun;
    if (raw !== undefined && typeof raw !== 'boolean') {
      throw new BadRequestException('dryRun must be a boolean');
    }
    const run = await this.jobsService.startJob({
      trigger: 'manual',
      dryRun: raw,
    });
    return { ok: true, run };
  }

  @Get('preview')
  async preview() {
    return await this.jobsService.preview();
  }

  @Get('last-run')
  async lastRun() {
    return { run: await this.jobsService.getLastRun() };
  }
}
