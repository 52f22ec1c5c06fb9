import { Inject, Injectable } from '@nestjs/common';
import { constants as fsConstants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import type { AppMetaResponseDto, HealthResponseDto } from './app.dto';
import { readAppMeta } from './app.meta';
import { SettingsService } from './settings/settings.service';
import { APP_DATA_DIR } from './storage/storage.constants';

export type ReadinessCheck =
  | { ok: true }
  | {
      ok: false;
      error: string;
    };

export type ReadinessResponse = {
  status: 'ready' | 'not_ready';
  time: string;
  checks: {
    dataDir: ReadinessCheck;
    settings: ReadinessCheck;
  };
};

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

@Injectable()
export class AppService {
  constructor(
    @Inject(APP_DATA_DIR) private readonly dataDir: string,
    private readonly settings: SettingsService,
  ) {}

  getHealth(): HealthResponseDto {
    return {
      status: 'ok' as const,
      time: new Date().toISOString(),
    };
  }

  getMeta(): AppMetaResponseDto {
    return readAppMeta();
  }

  async getReadiness(): Promise<ReadinessResponse> {
    const time = new Date().toISOString();
    const [dataDir, settings] = await Promise.all([
      this.checkDataDir(),
      this.checkSettings(),
    ]);
    const status =
      dataDir.ok && settings.ok ? ('ready' as const) : ('not_ready' as const);
    return { status, time, checks: { dataDir, settings } };
  }

  private async checkDataDir(): Promise<ReadinessCheck> {
    try {
      const s = await stat(this.dataDir);
      if (!s.isDirectory()) {
        return { ok: false, error: 'APP_DATA_DIR is not a directory' };
      }
      // Writing the stores needs write + search on the directory.
      await access(this.dataDir, fsConstants.W_OK | fsConstants.X_OK);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errToMessage(err) };
    }
  }

  private async checkSettings(): Promise<ReadinessCheck> {
    try {
      await this.settings.getSettings();
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errToMessage(err) };
    }
  }
}
