import { UI_THEMES, type Settings, type UiTheme } from './settings.types';

export const DEFAULT_RADARR_URL = 'http://radarr:7878';
export const DEFAULT_TAG_LABEL = 'autodelete30';
export const DEFAULT_DAYS_OLD = 30;
export const DEFAULT_CRON_SCHEDULE = '15 3 * * *';
export const DEFAULT_HTTP_TIMEOUT_SECONDS = 30;

export const DAYS_OLD_RANGE = { min: 1, max: 36_500 } as const;
export const HTTP_TIMEOUT_RANGE = { min: 5, max: 300 } as const;

type EnvLike = Record<string, string | undefined>;

export function parseBoolLike(raw: unknown, fallback: boolean): boolean {
  if (typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return raw !== 0;
  const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  if (!normalized) return fallback;
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return fallback;
}

export function clampInt(
  value: unknown,
  min: number,
  max: number,
  fallback: number,
): number {
  const n =
    typeof value === 'number' && Number.isFinite(value)
      ? Math.trunc(value)
      : typeof value === 'string' && value.trim()
        ? Number.parseInt(value.trim(), 10)
        : fallback;
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, n));
}

export function normalizeTheme(raw: unknown, fallback: UiTheme = 'dark'): UiTheme {
  const value = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
  return UI_THEMES.find((t) => t === value) ?? fallback;
}

export function normalizeBaseUrl(raw: unknown): string {
  const value = typeof raw === 'string' ? raw.trim() : '';
  return value.replace(/\/+$/, '');
}

export function settingsFromEnv(env: EnvLike = process.env): Settings {
  const str = (key: string, fallback: string) => {
    const v = env[key];
    return typeof v === 'string' && v.trim() ? v.trim() : fallback;
  };

  return {
    radarrUrl: normalizeBaseUrl(str('RADARR_URL', DEFAULT_RADARR_URL)),
    radarrApiKey: str('RADARR_API_KEY', ''),
    radarrOk: false,
    tagLabel: str('TAG_LABEL', DEFAULT_TAG_LABEL),
    daysOld: clampInt(
      env.DAYS_OLD,
      DAYS_OLD_RANGE.min,
      DAYS_OLD_RANGE.max,
      DEFAULT_DAYS_OLD,
    ),
    dryRun: parseBoolLike(env.DRY_RUN, true),
    deleteFiles: parseBoolLike(env.DELETE_FILES, true),
    addImportExclusion: parseBoolLike(env.ADD_IMPORT_EXCLUSION, false),
    httpTimeoutSeconds: clampInt(
      env.HTTP_TIMEOUT_SECONDS,
      HTTP_TIMEOUT_RANGE.min,
      HTTP_TIMEOUT_RANGE.max,
      DEFAULT_HTTP_TIMEOUT_SECONDS,
    ),
    cronSchedule: str('CRON_SCHEDULE', DEFAULT_CRON_SCHEDULE),
    runOnStartup: parseBoolLike(env.RUN_ON_STARTUP, false),
    uiTheme: normalizeTheme(env.UI_THEME),
  };
}
