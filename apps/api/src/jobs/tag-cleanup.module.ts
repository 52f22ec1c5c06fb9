import { Module } from '@nestjs/common';
import { RadarrModule } from '../radarr/radarr.module';
import { SettingsModule } from '../settings/settings.module';
import { DeletionExecutor } from './deletion-executor';
import { RunStateStore } from './run-state.store';
import { TagCleanupJob } from './tag-cleanup.job';

/** The run pipeline without any trigger: shared by the HTTP app and the CLI. */
@Module({
  imports: [SettingsModule, RadarrModule],
  providers: [TagCleanupJob, DeletionExecutor, RunStateStore],
  exports: [TagCleanupJob, RunStateStore],
})
export class TagCleanupModule {}
