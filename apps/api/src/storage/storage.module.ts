import { Global, Module } from '@nestjs/common';
import { resolveDataDir } from '../bootstrap-env';
import { APP_DATA_DIR } from './storage.constants';

@Global()
@Module({
  providers: [
    {
      provide: APP_DATA_DIR,
      useFactory: () => resolveDataDir(),
    },
  ],
  exports: [APP_DATA_DIR],
})
export class StorageModule {}
