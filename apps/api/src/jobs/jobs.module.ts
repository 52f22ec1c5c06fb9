import { Module } from '@nestjs/common';
import { SettingsModule } from '../settings/settings.module';
import { JobsController } from './jobs.controller';
import { JobsScheduler } from './jobs.scheduler';
import { JobsService } from './jobs.service';
import { TagCleanupModule } from './tag-cleanup.module';

@Module({
  imports: [SettingsModule, TagCleanupModule],
  controllers: [JobsController],
  providers: [JobsService, JobsScheduler],
  exports: [JobsService, JobsScheduler],
})
export class JobsModule {}
