import type { ItemError, TagNotFoundError } from './cleanup.errors';

export type JobRunTrigger = 'manual' | 'schedule' | 'startup' | 'cli';

export type RunStatus = 'ok' | 'ok_with_errors' | 'failed' | 'skipped';

export const RUN_STATUSES: readonly RunStatus[] = [
  'ok',
  'ok_with_errors',
  'failed',
  'skipped',
];

/** Rule parameters a run used, echoed into its result. */
export type RunRule = {
  tagLabel: string;
  daysOld: number;
  dryRun: boolean;
  deleteFiles: boolean;
  addImportExclusion: boolean;
};

export type Candidate = {
  id: number;
  title: string;
  year: number | null;
  added: string;
  ageDays: number;
  path: string | null;
  tmdbId: number | null;
};

export type SkippedItem = {
  id: number;
  title: string;
  reason: string;
};

export type SelectionResult = {
  tagId: number | null;
  cutoff: string;
  candidates: Candidate[];
  skipped: SkippedItem[];
  error: TagNotFoundError | null;
};

export type RunItemResult = {
  id: number;
  title: string;
  year: number | null;
  added: string;
  ageDays: number;
  path: string | null;
  deletedAt: string | null;
  excluded: boolean;
  error: string | null;
};

export type ItemOutcome =
  | { ok: true; item: RunItemResult }
  | { ok: false; item: RunItemResult; errors: ItemError[] };

export type RunResult = {
  runId: string;
  trigger: JobRunTrigger;
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
  status: RunStatus;
  cutoff: string;
  candidatesFound: number;
  deletedCount: number;
  failedCount: number;
  items: RunItemResult[];
  error: string | null;
  rule: RunRule;
};
