import type {
  RunItemResult,
  RunResult,
  RunRule,
  RunStatus,
} from '../jobs/jobs.types';
import type { Settings, UiTheme } from '../settings/settings.types';

const STATUS_LABELS: Record<RunStatus, string> = {
  ok: 'OK',
  ok_with_errors: 'OK with errors',
  failed: 'Failed',
  skipped: 'Skipped',
};

export type DashboardLastRun = {
  runId: string;
  trigger: RunResult['trigger'];
  status: RunStatus;
  statusLabel: string;
  headline: string;
  startedAt: string;
  finishedAt: string;
  finishedRelative: string;
  durationSeconds: number;
  counts: { candidates: number; deleted: number; failed: number };
  rule: RunRule;
  ruleChanged: boolean;
  error: string | null;
  items: RunItemResult[];
};

export type DashboardView = {
  theme: UiTheme;
  connection: { radarrUrl: string; verified: boolean };
  schedule: { cron: string; nextRunAt: string | null; running: boolean };
  rule: RunRule;
  lastRun: DashboardLastRun | null;
};

function plural(n: number, word: string): string {
  return `${n} ${n === 1 ? word : `${word}s`}`;
}

/** "just now", "5 minutes ago", "3 hours ago", "2 days ago". */
export function formatRelativeTime(iso: string, now: Date): string {
  const then = Date.parse(iso);
  if (!Number.isFinite(then)) return 'unknown';
  const seconds = Math.floor((now.getTime() - then) / 1000);
  if (seconds < 60) return 'just now';
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${plural(minutes, 'minute')} ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${plural(hours, 'hour')} ago`;
  return `${plural(Math.floor(hours / 24), 'day')} ago`;
}

function headlineFor(run: RunResult): string {
  if (run.status === 'skipped') return run.error ?? 'Nothing to do.';
  if (run.error) return `Run failed: ${run.error}`;
  if (run.rule.dryRun) {
    return `Dry run: ${plural(run.candidatesFound, 'movie')} would be deleted.`;
  }
  const base = `Deleted ${run.deletedCount} of ${plural(run.candidatesFound, 'movie')}`;
  return run.failedCount ? `${base}, ${run.failedCount} failed.` : `${base}.`;
}

function sameRule(a: RunRule, b: RunRule): boolean {
  return (
    a.tagLabel === b.tagLabel &&
    a.daysOld === b.daysOld &&
    a.dryRun === b.dryRun &&
    a.deleteFiles === b.deleteFiles &&
    a.addImportExclusion === b.addImportExclusion
  );
}

/** Pure view model for the control panel's landing page. */
export function buildDashboard(params: {
  lastRun: RunResult | null;
  settings: Readonly<Settings>;
  now: Date;
  nextRunAt: string | null;
  running: boolean;
}): DashboardView {
  const { lastRun, settings, now } = params;
  const rule: RunRule = {
    tagLabel: settings.tagLabel,
    daysOld: settings.daysOld,
    dryRun: settings.dryRun,
    deleteFiles: settings.deleteFiles,
    addImportExclusion: settings.addImportExclusion,
  };

  return {
    theme: settings.uiTheme,
    connection: { radarrUrl: settings.radarrUrl, verified: settings.radarrOk },
    schedule: {
      cron: settings.cronSchedule,
      nextRunAt: params.nextRunAt,
      running: params.running,
    },
    rule,
    lastRun: lastRun
      ? {
          runId: lastRun.runId,
          trigger: lastRun.trigger,
          status: lastRun.status,
          statusLabel: STATUS_LABELS[lastRun.status],
          headline: headlineFor(lastRun),
          startedAt: lastRun.startedAt,
          finishedAt: lastRun.finishedAt,
          finishedRelative: formatRelativeTime(lastRun.finishedAt, now),
          durationSeconds: lastRun.durationSeconds,
          counts: {
            candidates: lastRun.candidatesFound,
            deleted: lastRun.deletedCount,
            failed: lastRun.failedCount,
          },
          rule: lastRun.rule,
          ruleChanged: !sameRule(lastRun.rule, rule),
          error: lastRun.error,
          items: lastRun.items,
        }
      : null,
  };
}
