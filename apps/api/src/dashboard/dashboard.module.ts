import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { SettingsModule } from '../settings/settings.module';
import { DashboardController } from './dashboard.controller';

@Module({
  imports: [SettingsModule, JobsModule],
  controllers: [DashboardController],
})
export class DashboardModule {}
