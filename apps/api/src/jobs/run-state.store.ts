import { Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'node:path';
import { JsonFileStore } from '../storage/json-file.store';
import { APP_DATA_DIR, LAST_RUN_FILE_NAME } from '../storage/storage.constants';
import {
  RUN_STATUSES,
  type JobRunTrigger,
  type RunItemResult,
  type RunResult,
} from './jobs.types';

const TRIGGERS: readonly JobRunTrigger[] = ['manual', 'schedule', 'startup', 'cli'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || isString(value);
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || isNumber(value);
}

function parseItem(raw: unknown): RunItemResult | null {
  if (!isRecord(raw)) return null;
  const { id, title, year, added, ageDays, path, deletedAt, excluded, error } =
    raw;
  if (!isNumber(id) || !isString(title) || !isNullableNumber(year)) return null;
  if (!isString(added) || !isNumber(ageDays) || !isNullableString(path)) {
    return null;
  }
  if (!isNullableString(deletedAt) || typeof excluded !== 'boolean') {
    return null;
  }
  if (!isNullableString(error)) return null;
  return { id, title, year, added, ageDays, path, deletedAt, excluded, error };
}

/**
 * Validate a persisted run record. Anything that does not match the current
 * shape is treated as "no previous run".
 */
export function parseRunResult(raw: unknown): RunResult | null {
  if (!isRecord(raw)) return null;
  const { runId, trigger, startedAt, finishedAt, durationSeconds, status, cutoff } =
    raw;
  if (!isString(runId) || !isString(startedAt) || !isString(finishedAt)) {
    return null;
  }
  if (!TRIGGERS.some((t) => t === trigger)) return null;
  if (!RUN_STATUSES.some((s) => s === status)) return null;
  if (!isNumber(durationSeconds) || !isString(cutoff)) return null;

  const { candidatesFound, deletedCount, failedCount, error, rule } = raw;
  if (!isNumber(candidatesFound) || !isNumber(deletedCount)) return null;
  if (!isNumber(failedCount) || !isNullableString(error)) return null;

  if (!isRecord(rule)) return null;
  const { tagLabel, daysOld, dryRun, deleteFiles, addImportExclusion } = rule;
  if (!isString(tagLabel) || !isNumber(daysOld)) return null;
  if (
    typeof dryRun !== 'boolean' ||
    typeof deleteFiles !== 'boolean' ||
    typeof addImportExclusion !== 'boolean'
  ) {
    return null;
  }

  if (!Array.isArray(raw.items)) return null;
  const items: RunItemResult[] = [];
  for (const entry of raw.items) {
    const item = parseItem(entry);
    if (!item) return null;
    items.push(item);
  }

  return {
    runId,
    trigger: TRIGGERS.find((t) => t === trigger) ?? 'manual',
    startedAt,
    finishedAt,
    durationSeconds,
    status: RUN_STATUSES.find((s) => s === status) ?? 'failed',
    cutoff,
    candidatesFound,
    deletedCount,
    failedCount,
    items,
    error,
    rule: { tagLabel, daysOld, dryRun, deleteFiles, addImportExclusion },
  };
}

/** Single-slot store: each run fully replaces the previous record. */
@Injectable()
export class RunStateStore {
  private readonly logger = new Logger(RunStateStore.name);
  private readonly store: JsonFileStore;

  constructor(@Inject(APP_DATA_DIR) dataDir: string) {
    this.store = new JsonFileStore(join(dataDir, LAST_RUN_FILE_NAME));
  }

  async save(result: RunResult): Promise<void> {
    await this.store.write(result);
  }

  async load(): Promise<RunResult | null> {
    const raw = await this.store.read();
    if (raw === null) return null;
    const parsed = parseRunResult(raw);
    if (!parsed) {
      this.logger.warn('Ignoring last-run record with an unexpected shape');
    }
    return parsed;
  }
}
