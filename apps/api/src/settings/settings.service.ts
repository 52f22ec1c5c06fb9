import { Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'node:path';
import { Subject } from 'rxjs';
import { JsonFileStore } from '../storage/json-file.store';
import { APP_DATA_DIR, SETTINGS_FILE_NAME } from '../storage/storage.constants';
import { settingsFromEnv } from './settings.defaults';
import {
  applySettingsPatch,
  assertSettingsUsable,
  diffSettings,
  normalizeSettings,
} from './settings.rules';
import type {
  PublicSettings,
  Settings,
  SettingsChange,
} from './settings.types';

function toPublicSettings(settings: Settings): PublicSettings {
  const { radarrApiKey, ...rest } = settings;
  return { ...rest, radarrApiKeySet: Boolean(radarrApiKey) };
}

@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private readonly store: JsonFileStore;
  private readonly defaults: Settings = settingsFromEnv(process.env);
  private writeChain: Promise<unknown> = Promise.resolve();

  /** Emits after every persisted change. */
  readonly changes$ = new Subject<SettingsChange>();

  constructor(@Inject(APP_DATA_DIR) dataDir: string) {
    this.store = new JsonFileStore(join(dataDir, SETTINGS_FILE_NAME));
  }

  /**
   * Immutable snapshot of the current settings. A run takes one snapshot at
   * its start and never re-reads.
   */
  async getSettings(): Promise<Readonly<Settings>> {
    const raw = await this.store.read();
    return Object.freeze(normalizeSettings(raw, this.defaults));
  }

  async getPublicSettings(): Promise<PublicSettings> {
    return toPublicSettings(await this.getSettings());
  }

  async updateSettings(patch: unknown): Promise<PublicSettings> {
    const next = await this.mutate((current) => {
      const candidate = applySettingsPatch(current, patch);
      assertSettingsUsable(candidate, 'save', current);
      return candidate;
    });
    return toPublicSettings(next);
  }

  async recordConnectionTest(params: {
    radarrUrl: string;
    radarrApiKey: string;
    ok: boolean;
  }): Promise<PublicSettings> {
    const { radarrUrl, radarrApiKey, ok } = params;
    const next = await this.mutate((current) =>
      ok
        ? { ...current, radarrUrl, radarrApiKey, radarrOk: true }
        : { ...current, radarrOk: false },
    );
    return toPublicSettings(next);
  }

  async resetRadarr(): Promise<PublicSettings> {
    const next = await this.mutate((current) => ({
      ...current,
      radarrUrl: '',
      radarrApiKey: '',
      radarrOk: false,
    }));
    return toPublicSettings(next);
  }

  async toggleTheme(): Promise<PublicSettings> {
    const next = await this.mutate((current) => ({
      ...current,
      uiTheme: current.uiTheme === 'light' ? 'dark' : 'light',
    }));
    return toPublicSettings(next);
  }

  private mutate(
    updater: (current: Settings) => Settings,
  ): Promise<Readonly<Settings>> {
    // Serialize read-modify-write cycles so concurrent requests cannot
    // interleave and drop each other's changes.
    const run = this.writeChain
      .catch(() => undefined)
      .then(async () => {
        const previous = await this.getSettings();
        const next = Object.freeze(updater({ ...previous }));
        const changed = diffSettings(previous, next);
        if (!changed.length) return next;

        await this.store.write(next);
        this.logger.log(`Updated settings: ${changed.join(', ')}`);
        this.changes$.next({ previous, next, changed });
        return next;
      });
    this.writeChain = run;
    return run;
  }
}
