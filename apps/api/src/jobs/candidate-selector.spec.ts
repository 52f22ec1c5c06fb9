import type { RadarrMovie, RadarrTag } from '../radarr/radarr.types';
import { TagNotFoundError } from './cleanup.errors';
import { parseAddedTimestamp, selectCandidates } from './candidate-selector';

const NOW = new Date('2024-06-30T12:00:00Z');

const TAGS: RadarrTag[] = [
  { id: 5, label: 'autodelete30' },
  { id: 9, label: 'keep' },
];

function movie(
  id: number,
  added: string | null,
  tags: number[] = [5],
): RadarrMovie {
  return {
    id,
    title: `Film ${id}`,
    year: 2000 + id,
    path: `/movies/Film ${id}`,
    added,
    tags,
    tmdbId: 100 + id,
  };
}

function select(movies: RadarrMovie[], tagLabel = 'autodelete30') {
  return selectCandidates({
    tags: TAGS,
    movies,
    tagLabel,
    daysOld: 30,
    now: NOW,
  });
}

describe('parseAddedTimestamp', () => {
  it('treats a trailing Z and a missing offset as UTC', () => {
    const utc = Date.UTC(2024, 0, 2, 3, 4, 5);
    expect(parseAddedTimestamp('2024-01-02T03:04:05Z')).toBe(utc);
    expect(parseAddedTimestamp('2024-01-02T03:04:05')).toBe(utc);
  });

  it('honours explicit offsets and fractional seconds', () => {
    expect(parseAddedTimestamp('2024-01-02T05:04:05+02:00')).toBe(
      Date.UTC(2024, 0, 2, 3, 4, 5),
    );
    expect(parseAddedTimestamp('2024-01-02T03:04:05.1234567Z')).toBe(
      Date.UTC(2024, 0, 2, 3, 4, 5, 123),
    );
  });

  it.each(['not-a-date', '2024-02-30T00:00:00Z', '2024-13-01T00:00:00Z', ''])(
    'rejects %p',
    (raw) => {
      expect(parseAddedTimestamp(raw)).toBeNull();
    },
  );
});

describe('selectCandidates', () => {
  it('excludes an item added exactly at the cutoff', () => {
    const result = select([
      movie(1, '2024-05-31T12:00:00Z'),
      movie(2, '2024-05-31T11:59:59Z'),
    ]);

    expect(result.cutoff).toBe('2024-05-31T12:00:00.000Z');
    expect(result.candidates.map((c) => c.id)).toEqual([2]);
    expect(result.candidates[0]?.ageDays).toBe(30);
  });

  it('floors the age in whole days', () => {
    const result = select([movie(1, '2024-05-31T00:00:00Z')]);
    expect(result.candidates[0]?.ageDays).toBe(30);
  });

  it('orders by age descending and keeps input order for equal ages', () => {
    const result = select([
      movie(1, '2024-05-01T00:00:00Z'),
      movie(2, '2024-03-01T00:00:00Z'),
      movie(3, '2024-05-01T06:00:00Z'),
      movie(4, '2024-04-30T12:00:00'),
    ]);

    expect(result.candidates.map((c) => [c.id, c.ageDays])).toEqual([
      [2, 121],
      [4, 61],
      [1, 60],
      [3, 60],
    ]);
  });

  it('ignores items without the tag and records unusable timestamps', () => {
    const result = select([
      movie(1, '2024-01-01T00:00:00Z', [9]),
      movie(2, null),
      movie(3, 'yesterday'),
      movie(4, '2024-01-01T00:00:00Z', [9, 5]),
    ]);

    expect(result.tagId).toBe(5);
    expect(result.candidates.map((c) => c.id)).toEqual([4]);
    expect(result.skipped).toEqual([
      { id: 2, title: 'Film 2', reason: 'missing added timestamp' },
      {
        id: 3,
        title: 'Film 3',
        reason: 'unparseable added timestamp: yesterday',
      },
    ]);
    expect(result.error).toBeNull();
  });

  it('copies the candidate fields from the movie', () => {
    const result = select([movie(4, '2024-01-01T00:00:00Z')]);
    expect(result.candidates).toEqual([
      {
        id: 4,
        title: 'Film 4',
        year: 2004,
        added: '2024-01-01T00:00:00Z',
        ageDays: 181,
        path: '/movies/Film 4',
        tmdbId: 104,
      },
    ]);
  });

  it('returns no candidates and a TagNotFoundError for an unknown label', () => {
    const result = select([movie(1, '2024-01-01T00:00:00Z')], 'AutoDelete30');

    expect(result.tagId).toBeNull();
    expect(result.candidates).toEqual([]);
    expect(result.error).toBeInstanceOf(TagNotFoundError);
    expect(result.error?.message).toBe(
      "Tag 'AutoDelete30' not found in Radarr. Create it and tag movies first.",
    );
  });

  it('is deterministic for the same inputs and now', () => {
    const movies = [
      movie(1, '2024-05-01T00:00:00Z'),
      movie(2, '2024-03-01T00:00:00Z'),
      movie(3, 'bad'),
    ];
    expect(select(movies)).toEqual(select(movies));
  });
});
