import type { RadarrMovie, RadarrTag } from '../radarr/radarr.types';
import { TagNotFoundError } from './cleanup.errors';
import type { Candidate, SelectionResult, SkippedItem } from './jobs.types';

export const MS_PER_DAY = 86_400_000;

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function normalizeOffset(raw: string | undefined): string {
  if (!raw || raw.toUpperCase() === 'Z') return 'Z';
  const sign = raw[0];
  const digits = raw.slice(1).replace(':', '');
  const hh = digits.slice(0, 2);
  const mm = digits.slice(2, 4) || '00';
  return `${sign}${hh}:${mm}`;
}

/**
 * Parse a Radarr "added" timestamp to epoch millis.
 *
 * A trailing `Z` and a missing offset both mean UTC. Returns null for anything
 * that is not a valid calendar date/time.
 */
export function parseAddedTimestamp(raw: string): number | null {
  const m = ISO_TIMESTAMP.exec(raw.trim());
  if (!m) return null;
  const [, y, mo, d, hh = '00', mi = '00', ss = '00', frac = '', offset] = m;

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  if (month < 1 || month > 12) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day < 1 || day > daysInMonth) return null;
  if (Number(hh) > 23 || Number(mi) > 59 || Number(ss) > 59) return null;

  const millis = frac.padEnd(3, '0').slice(0, 3);
  const iso = `${y}-${mo}-${d}T${hh}:${mi}:${ss}.${millis}${normalizeOffset(offset)}`;
  const ms = Date.parse(iso);
  return Number.isFinite(ms) ? ms : null;
}

export function findTag(tags: RadarrTag[], label: string): RadarrTag | null {
  return tags.find((t) => t.label === label) ?? null;
}

/**
 * Pick the movies carrying `tagLabel` whose added time is strictly before
 * `now - daysOld`, oldest first. Pure: the same inputs and `now` always give
 * the same result.
 */
export function selectCandidates(params: {
  tags: RadarrTag[];
  movies: RadarrMovie[];
  tagLabel: string;
  daysOld: number;
  now: Date;
}): SelectionResult {
  const { tags, movies, tagLabel, daysOld } = params;
  const nowMs = params.now.getTime();
  const cutoffMs = nowMs - daysOld * MS_PER_DAY;
  const cutoff = new Date(cutoffMs).toISOString();

  const tag = findTag(tags, tagLabel);
  if (!tag) {
    return {
      tagId: null,
      cutoff,
      candidates: [],
      skipped: [],
      error: new TagNotFoundError(tagLabel),
    };
  }

  const candidates: Candidate[] = [];
  const skipped: SkippedItem[] = [];

  for (const movie of movies) {
    if (!movie.tags.includes(tag.id)) continue;
    if (!movie.added) {
      skipped.push({
        id: movie.id,
        title: movie.title,
        reason: 'missing added timestamp',
      });
      continue;
    }

    const addedMs = parseAddedTimestamp(movie.added);
    if (addedMs === null) {
      skipped.push({
        id: movie.id,
        title: movie.title,
        reason: `unparseable added timestamp: ${movie.added}`,
      });
      continue;
    }

    if (addedMs >= cutoffMs) continue;

    candidates.push({
      id: movie.id,
      title: movie.title,
      year: movie.year,
      added: movie.added,
      ageDays: Math.floor((nowMs - addedMs) / MS_PER_DAY),
      path: movie.path,
      tmdbId: movie.tmdbId,
    });
  }

  // Array.prototype.sort is stable, so equal ages keep their Radarr order.
  candidates.sort((a, b) => b.ageDays - a.ageDays);

  return { tagId: tag.id, cutoff, candidates, skipped, error: null };
}
