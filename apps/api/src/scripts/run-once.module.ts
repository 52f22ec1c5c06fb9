import { Module } from '@nestjs/common';
import { TagCleanupModule } from '../jobs/tag-cleanup.module';
import { StorageModule } from '../storage/storage.module';

/** The run pipeline without HTTP, cron or log retention. */
@Module({
  imports: [StorageModule, TagCleanupModule],
})
export class RunOnceModule {}
