import { Injectable, Logger } from '@nestjs/common';
import { isRadarrError } from '../radarr/radarr.errors';
import { RadarrService } from '../radarr/radarr.service';
import type { RadarrConnection } from '../radarr/radarr.types';
import { validateSettings } from '../settings/settings.rules';
import { SettingsService } from '../settings/settings.service';
import type { Settings } from '../settings/settings.types';
import { findTag, MS_PER_DAY, selectCandidates } from './candidate-selector';
import { DeletionExecutor } from './deletion-executor';
import type {
  Candidate,
  JobRunTrigger,
  RunResult,
  SelectionResult,
  SkippedItem,
} from './jobs.types';
import {
  buildRunResult,
  ruleFromSettings,
  type RunContext,
} from './run-result';
import { RunStateStore } from './run-state.store';

export type TagCleanupRunParams = {
  runId: string;
  trigger: JobRunTrigger;
  /** Overrides the stored dry-run flag for this run only. */
  dryRun?: boolean;
  clock?: () => Date;
};

export type CleanupPreview = {
  tagLabel: string;
  daysOld: number;
  tagId: number | null;
  cutoff: string;
  candidates: Candidate[];
  skipped: SkippedItem[];
  error: string | null;
};

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function connectionFromSettings(
  settings: Readonly<Settings>,
): RadarrConnection {
  return {
    baseUrl: settings.radarrUrl,
    apiKey: settings.radarrApiKey,
    timeoutMs: settings.httpTimeoutSeconds * 1000,
  };
}

/**
 * One tag-cleanup run: snapshot settings, validate, select candidates, then
 * hand them to the deletion executor. Every path ends with a persisted
 * RunResult.
 */
@Injectable()
export class TagCleanupJob {
  private readonly logger = new Logger(TagCleanupJob.name);

  constructor(
    private readonly settings: SettingsService,
    private readonly radarr: RadarrService,
    private readonly executor: DeletionExecutor,
    private readonly runState: RunStateStore,
  ) {}

  async run(params: TagCleanupRunParams): Promise<RunResult> {
    const clock = params.clock ?? (() => new Date());
    const startedAt = clock();
    const stored = await this.settings.getSettings();
    const snapshot: Readonly<Settings> =
      params.dryRun === undefined
        ? stored
        : Object.freeze({ ...stored, dryRun: params.dryRun });

    const run: RunContext = {
      runId: params.runId,
      trigger: params.trigger,
      startedAt,
      cutoff: new Date(
        startedAt.getTime() - snapshot.daysOld * MS_PER_DAY,
      ).toISOString(),
      rule: ruleFromSettings(snapshot),
    };

    this.logger.log(
      `Run ${run.runId} started (${run.trigger}): tag=${snapshot.tagLabel} daysOld=${snapshot.daysOld} dryRun=${snapshot.dryRun} deleteFiles=${snapshot.deleteFiles} exclusion=${snapshot.addImportExclusion}`,
    );

    const problems = validateSettings(snapshot, 'run');
    if (problems.length) {
      return await this.finishEarly(run, clock, 'failed', problems.join(' '));
    }

    const connection = connectionFromSettings(snapshot);
    let selection: SelectionResult;
    try {
      selection = await this.select(snapshot, connection, startedAt);
    } catch (err) {
      const message = errToMessage(err);
      if (!isRadarrError(err)) {
        this.logger.error(
          `Run ${run.runId} selection crashed: ${message}`,
          err instanceof Error ? err.stack : undefined,
        );
      }
      return await this.finishEarly(run, clock, 'failed', message);
    }

    for (const skipped of selection.skipped) {
      this.logger.debug(
        `Skipping id=${skipped.id} '${skipped.title}': ${skipped.reason}`,
      );
    }

    if (selection.error) {
      return await this.finishEarly(
        run,
        clock,
        'skipped',
        selection.error.message,
      );
    }

    this.logger.log(
      `Run ${run.runId}: ${selection.candidates.length} candidate(s) older than ${snapshot.daysOld} day(s) with tag '${snapshot.tagLabel}'`,
    );

    return await this.executor.execute(
      selection.candidates,
      {
        dryRun: snapshot.dryRun,
        deleteFiles: snapshot.deleteFiles,
        addImportExclusion: snapshot.addImportExclusion,
      },
      { ...run, connection, clock },
    );
  }

  /** Problems that would stop a run with the given dry-run override. */
  async validate(dryRun?: boolean): Promise<string[]> {
    const stored = await this.settings.getSettings();
    const snapshot =
      dryRun === undefined ? stored : Object.freeze({ ...stored, dryRun });
    return validateSettings(snapshot, 'run');
  }

  /** Selection only: never mutates Radarr, never touches the run record. */
  async preview(now: Date = new Date()): Promise<CleanupPreview> {
    const stored = await this.settings.getSettings();
    const snapshot = Object.freeze({ ...stored, dryRun: true });
    const base = {
      tagLabel: snapshot.tagLabel,
      daysOld: snapshot.daysOld,
    };

    const problems = validateSettings(snapshot, 'run');
    if (problems.length) {
      return {
        ...base,
        tagId: null,
        cutoff: new Date(
          now.getTime() - snapshot.daysOld * MS_PER_DAY,
        ).toISOString(),
        candidates: [],
        skipped: [],
        error: problems.join(' '),
      };
    }

    const selection = await this.select(
      snapshot,
      connectionFromSettings(snapshot),
      now,
    );
    return {
      ...base,
      tagId: selection.tagId,
      cutoff: selection.cutoff,
      candidates: selection.candidates,
      skipped: selection.skipped,
      error: selection.error?.message ?? null,
    };
  }

  private async select(
    snapshot: Readonly<Settings>,
    connection: RadarrConnection,
    now: Date,
  ): Promise<SelectionResult> {
    const tags = await this.radarr.listTags(connection);
    const movies = findTag(tags, snapshot.tagLabel)
      ? await this.radarr.listMovies(connection)
      : [];
    return selectCandidates({
      tags,
      movies,
      tagLabel: snapshot.tagLabel,
      daysOld: snapshot.daysOld,
      now,
    });
  }

  private async finishEarly(
    run: RunContext,
    clock: () => Date,
    status: 'failed' | 'skipped',
    error: string,
  ): Promise<RunResult> {
    const result = buildRunResult({
      run,
      finishedAt: clock(),
      status,
      items: [],
      error,
    });
    await this.runState.save(result);
    if (status === 'failed') {
      this.logger.error(`Run ${run.runId} failed: ${error}`);
    } else {
      this.logger.warn(`Run ${run.runId} skipped: ${error}`);
    }
    return result;
  }
}
