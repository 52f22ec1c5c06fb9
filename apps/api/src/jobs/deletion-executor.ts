import { Injectable, Logger } from '@nestjs/common';
import { RadarrService } from '../radarr/radarr.service';
import type { RadarrConnection } from '../radarr/radarr.types';
import { ItemError } from './cleanup.errors';
import type {
  Candidate,
  ItemOutcome,
  RunItemResult,
  RunResult,
} from './jobs.types';
import {
  buildRunResult,
  classifyOutcomes,
  itemFromCandidate,
  type RunContext,
} from './run-result';
import { RunStateStore } from './run-state.store';

export type ExecuteOptions = {
  dryRun: boolean;
  deleteFiles: boolean;
  addImportExclusion: boolean;
};

export type ExecuteRun = RunContext & {
  connection: RadarrConnection;
  clock?: () => Date;
};

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function describeCandidate(candidate: Candidate): string {
  const year = candidate.year ? ` (${candidate.year})` : '';
  return `id=${candidate.id} '${candidate.title}${year}'`;
}

@Injectable()
export class DeletionExecutor {
  private readonly logger = new Logger(DeletionExecutor.name);

  constructor(
    private readonly radarr: RadarrService,
    private readonly runState: RunStateStore,
  ) {}

  async execute(
    candidates: Candidate[],
    options: ExecuteOptions,
    run: ExecuteRun,
  ): Promise<RunResult> {
    const clock = run.clock ?? (() => new Date());
    const outcomes: ItemOutcome[] = [];

    if (options.dryRun) {
      for (const candidate of candidates) {
        this.logger.log(
          `[dry-run] Would delete ${describeCandidate(candidate)} age=${candidate.ageDays}d`,
        );
      }
    } else {
      for (const candidate of candidates) {
        outcomes.push(await this.processItem(candidate, options, run));
      }
    }

    const finishedAt = clock();
    const items: RunItemResult[] = options.dryRun
      ? candidates.map((c) => ({
          ...itemFromCandidate(c),
          deletedAt: finishedAt.toISOString(),
        }))
      : outcomes.map((o) => o.item);

    const result = buildRunResult({
      run,
      finishedAt,
      status: options.dryRun ? 'ok' : classifyOutcomes(outcomes),
      items,
    });

    await this.runState.save(result);
    this.logger.log(
      `Run ${result.runId} finished: status=${result.status} candidates=${result.candidatesFound} deleted=${result.deletedCount} failed=${result.failedCount}`,
    );
    return result;
  }

  private async processItem(
    candidate: Candidate,
    options: ExecuteOptions,
    run: ExecuteRun,
  ): Promise<ItemOutcome> {
    const clock = run.clock ?? (() => new Date());
    const item = itemFromCandidate(candidate);
    const errors: ItemError[] = [];

    try {
      await this.radarr.deleteMovie(run.connection, {
        movieId: candidate.id,
        deleteFiles: options.deleteFiles,
      });
      item.deletedAt = clock().toISOString();
      this.logger.log(
        `Deleted ${describeCandidate(candidate)} age=${candidate.ageDays}d deleteFiles=${options.deleteFiles}`,
      );
    } catch (err) {
      errors.push(
        new ItemError(
          candidate.id,
          'delete',
          `delete failed: ${errToMessage(err)}`,
        ),
      );
    }

    if (options.addImportExclusion) {
      if (candidate.tmdbId === null) {
        errors.push(
          new ItemError(
            candidate.id,
            'exclusion',
            'import exclusion skipped: movie has no tmdbId',
          ),
        );
      } else {
        try {
          await this.radarr.addImportExclusion(run.connection, {
            tmdbId: candidate.tmdbId,
            title: candidate.title,
            year: candidate.year,
          });
          item.excluded = true;
        } catch (err) {
          errors.push(
            new ItemError(
              candidate.id,
              'exclusion',
              `import exclusion failed: ${errToMessage(err)}`,
            ),
          );
        }
      }
    }

    if (!errors.length) return { ok: true, item };

    item.error = errors.map((e) => e.message).join('; ');
    this.logger.error(`Failed on ${describeCandidate(candidate)}: ${item.error}`);
    return { ok: false, item, errors };
  }
}
