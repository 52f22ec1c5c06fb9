import type { Settings } from '../settings/settings.types';
import type {
  Candidate,
  ItemOutcome,
  JobRunTrigger,
  RunItemResult,
  RunResult,
  RunRule,
  RunStatus,
} from './jobs.types';

/** Identity and timing shared by every result a run can produce. */
export type RunContext = {
  runId: string;
  trigger: JobRunTrigger;
  startedAt: Date;
  cutoff: string;
  rule: RunRule;
};

export function ruleFromSettings(settings: Readonly<Settings>): RunRule {
  return {
    tagLabel: settings.tagLabel,
    daysOld: settings.daysOld,
    dryRun: settings.dryRun,
    deleteFiles: settings.deleteFiles,
    addImportExclusion: settings.addImportExclusion,
  };
}

export function itemFromCandidate(candidate: Candidate): RunItemResult {
  return {
    id: candidate.id,
    title: candidate.title,
    year: candidate.year,
    added: candidate.added,
    ageDays: candidate.ageDays,
    path: candidate.path,
    deletedAt: null,
    excluded: false,
    error: null,
  };
}

export function classifyOutcomes(outcomes: ItemOutcome[]): RunStatus {
  const failed = outcomes.filter((o) => !o.ok).length;
  if (failed === 0) return 'ok';
  return failed === outcomes.length ? 'failed' : 'ok_with_errors';
}

export function buildRunResult(params: {
  run: RunContext;
  finishedAt: Date;
  status: RunStatus;
  items: RunItemResult[];
  error?: string | null;
}): RunResult {
  const { run, finishedAt, status, items } = params;
  const durationMs = Math.max(0, finishedAt.getTime() - run.startedAt.getTime());
  return {
    runId: run.runId,
    trigger: run.trigger,
    startedAt: run.startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationSeconds: Math.round(durationMs / 10) / 100,
    status,
    cutoff: run.cutoff,
    candidatesFound: items.length,
    deletedCount: items.filter((i) => i.deletedAt !== null).length,
    failedCount: items.filter((i) => i.error !== null).length,
    items,
    error: params.error ?? null,
    rule: { ...run.rule },
  };
}

/** Process exit code for a finished run: only `failed` is a failure. */
export function exitCodeForStatus(status: RunStatus): number {
  return status === 'failed' ? 1 : 0;
}
