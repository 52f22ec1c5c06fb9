export type RadarrConnection = {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
};

export type RadarrTag = {
  id: number;
  label: string;
};

export type RadarrMovie = {
  id: number;
  title: string;
  year: number | null;
  path: string | null;
  /** ISO-8601 as returned by Radarr; a missing offset means UTC. */
  added: string | null;
  tags: number[];
  tmdbId: number | null;
};

export type RadarrSystemStatus = {
  version: string | null;
  appName: string | null;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function asFiniteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function asNonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function parseRadarrTags(data: readonly unknown[]): RadarrTag[] {
  const out: RadarrTag[] = [];
  for (const raw of data) {
    if (!isPlainObject(raw)) continue;
    const id = asFiniteNumber(raw['id']);
    const label = typeof raw['label'] === 'string' ? raw['label'] : null;
    if (id === null || label === null) continue;
    out.push({ id, label });
  }
  return out;
}

export function parseRadarrMovies(data: readonly unknown[]): RadarrMovie[] {
  const out: RadarrMovie[] = [];
  for (const raw of data) {
    if (!isPlainObject(raw)) continue;
    const id = asFiniteNumber(raw['id']);
    if (id === null) continue;
    const tagsRaw = raw['tags'];
    const tags = Array.isArray(tagsRaw)
      ? tagsRaw.filter(
          (t): t is number => typeof t === 'number' && Number.isFinite(t),
        )
      : [];
    out.push({
      id,
      title: asNonEmptyString(raw['title']) ?? `movie#${id}`,
      year: asFiniteNumber(raw['year']),
      path: asNonEmptyString(raw['path']),
      added: asNonEmptyString(raw['added']),
      tags,
      tmdbId: asFiniteNumber(raw['tmdbId']),
    });
  }
  return out;
}

export function parseRadarrSystemStatus(data: unknown): RadarrSystemStatus {
  if (!isPlainObject(data)) return { version: null, appName: null };
  return {
    version: asNonEmptyString(data['version']),
    appName: asNonEmptyString(data['appName']),
  };
}
