import { CronTime } from 'cron';
import { ConfigError } from './config.error';
import {
  clampInt,
  DAYS_OLD_RANGE,
  HTTP_TIMEOUT_RANGE,
  normalizeBaseUrl,
  normalizeTheme,
  parseBoolLike,
} from './settings.defaults';
import type {
  Settings,
  SettingsIntent,
  SettingsKey,
} from './settings.types';

const HTTP_BASE_URL_PREFIX = /^https?:\/\//i;
const HTTP_PROTOCOLS = new Set(['http:', 'https:']);

const PATCHABLE_KEYS: readonly SettingsKey[] = [
  'radarrUrl',
  'radarrApiKey',
  'tagLabel',
  'daysOld',
  'dryRun',
  'deleteFiles',
  'addImportExclusion',
  'httpTimeoutSeconds',
  'cronSchedule',
  'runOnStartup',
  'uiTheme',
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isPatchableKey(key: string): key is SettingsKey {
  return PATCHABLE_KEYS.some((k) => k === key);
}

function asTrimmedString(value: unknown, fallback: string): string {
  if (typeof value !== 'string') return fallback;
  return value.trim();
}

export function ensureHttpBaseUrl(raw: unknown): string {
  const value = normalizeBaseUrl(raw);
  if (!value) return '';
  return HTTP_BASE_URL_PREFIX.test(value) ? value : `http://${value}`;
}

export function isValidHttpBaseUrl(baseUrl: string): boolean {
  try {
    return HTTP_PROTOCOLS.has(new URL(baseUrl).protocol.toLowerCase());
  } catch {
    return false;
  }
}

export function isValidCron(expr: string): boolean {
  try {
    new CronTime(expr);
    return true;
  } catch {
    return false;
  }
}

/**
 * Overlays a persisted document on the env-seeded defaults. Unknown keys are
 * dropped and every field is coerced back into its domain.
 */
export function normalizeSettings(raw: unknown, defaults: Settings): Settings {
  const doc = isPlainObject(raw) ? raw : {};
  const tagLabel = asTrimmedString(doc['tagLabel'], defaults.tagLabel);
  const cronSchedule = asTrimmedString(doc['cronSchedule'], defaults.cronSchedule);

  return {
    radarrUrl:
      'radarrUrl' in doc ? normalizeBaseUrl(doc['radarrUrl']) : defaults.radarrUrl,
    radarrApiKey: asTrimmedString(doc['radarrApiKey'], defaults.radarrApiKey),
    radarrOk: parseBoolLike(doc['radarrOk'], defaults.radarrOk),
    tagLabel: tagLabel || defaults.tagLabel,
    daysOld: clampInt(
      doc['daysOld'],
      DAYS_OLD_RANGE.min,
      DAYS_OLD_RANGE.max,
      defaults.daysOld,
    ),
    dryRun: parseBoolLike(doc['dryRun'], defaults.dryRun),
    deleteFiles: parseBoolLike(doc['deleteFiles'], defaults.deleteFiles),
    addImportExclusion: parseBoolLike(
      doc['addImportExclusion'],
      defaults.addImportExclusion,
    ),
    httpTimeoutSeconds: clampInt(
      doc['httpTimeoutSeconds'],
      HTTP_TIMEOUT_RANGE.min,
      HTTP_TIMEOUT_RANGE.max,
      defaults.httpTimeoutSeconds,
    ),
    cronSchedule: cronSchedule || defaults.cronSchedule,
    runOnStartup: parseBoolLike(doc['runOnStartup'], defaults.runOnStartup),
    uiTheme: normalizeTheme(doc['uiTheme'], defaults.uiTheme),
  };
}

export function connectionChanged(a: Settings, b: Settings): boolean {
  return a.radarrUrl !== b.radarrUrl || a.radarrApiKey !== b.radarrApiKey;
}

const RULE_KEYS: readonly SettingsKey[] = [
  'tagLabel',
  'daysOld',
  'dryRun',
  'deleteFiles',
  'addImportExclusion',
];

/** True when a field the cleanup run acts on differs. */
function ruleChanged(a: Settings, b: Settings): boolean {
  return RULE_KEYS.some((k) => a[k] !== b[k]);
}

export function diffSettings(a: Settings, b: Settings): SettingsKey[] {
  return (Object.keys(b) as SettingsKey[]).filter((k) => a[k] !== b[k]);
}

/**
 * Applies a user patch. Rejects unknown or derived keys; the verified flag
 * is cleared whenever the URL or key change.
 */
export function applySettingsPatch(current: Settings, patch: unknown): Settings {
  if (!isPlainObject(patch)) {
    throw new ConfigError(['settings must be an object.']);
  }

  const problems: string[] = [];
  const merged: Record<string, unknown> = { ...current };
  for (const [key, value] of Object.entries(patch)) {
    if (key === 'radarrOk') {
      problems.push('radarrOk is set by the connection test and cannot be saved directly.');
      continue;
    }
    if (!isPatchableKey(key)) {
      problems.push(`Unknown setting: ${key}.`);
      continue;
    }
    merged[key] = key === 'radarrUrl' ? ensureHttpBaseUrl(value) : value;
  }
  if (problems.length) throw new ConfigError(problems);

  const next = normalizeSettings(merged, current);
  if (connectionChanged(current, next)) next.radarrOk = false;
  return next;
}

/**
 * The single gate for actions that depend on settings. `save` checks a new
 * snapshot against the one it replaces; `run` checks the snapshot a run is
 * about to use.
 */
export function validateSettings(
  settings: Settings,
  intent: SettingsIntent,
  previous?: Settings,
): string[] {
  const problems: string[] = [];

  if (settings.radarrUrl && !isValidHttpBaseUrl(settings.radarrUrl)) {
    problems.push('Radarr URL must be a valid http(s) URL.');
  }

  if (intent === 'save') {
    if (previous && connectionChanged(previous, settings)) {
      problems.push(
        'Radarr URL or API key changed: run Test Connection and make sure it succeeds before saving.',
      );
    } else if (!settings.radarrOk) {
      if (!settings.dryRun) {
        problems.push(
          'Dry run can only be turned off once the Radarr connection has been verified.',
        );
      } else if (previous && ruleChanged(previous, settings)) {
        problems.push(
          'Cleanup rules can only be changed once the Radarr connection has been verified.',
        );
      }
    }
    if (!isValidCron(settings.cronSchedule)) {
      problems.push(`Invalid cron expression: ${settings.cronSchedule}.`);
    }
    return problems;
  }

  if (!settings.radarrUrl) {
    problems.push('Radarr URL is required, e.g. http://radarr:7878.');
  }
  if (!settings.radarrApiKey) {
    problems.push('Radarr API key is required.');
  }
  if (!settings.dryRun && !settings.radarrOk) {
    problems.push(
      'Radarr connection is not verified: live runs are refused until Test Connection succeeds.',
    );
  }
  return problems;
}

export function assertSettingsUsable(
  settings: Settings,
  intent: SettingsIntent,
  previous?: Settings,
): void {
  const problems = validateSettings(settings, intent, previous);
  if (problems.length) throw new ConfigError(problems);
}
