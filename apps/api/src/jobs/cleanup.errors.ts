/**
 * The configured tag label does not exist in Radarr. A "nothing to do"
 * condition: the run is recorded as skipped, never thrown past the selector.
 */
export class TagNotFoundError extends Error {
  constructor(readonly tagLabel: string) {
    super(
      `Tag '${tagLabel}' not found in Radarr. Create it and tag movies first.`,
    );
    this.name = 'TagNotFoundError';
  }
}

export type ItemErrorStage = 'delete' | 'exclusion';

/** One candidate's delete or exclusion call failed; the batch continues. */
export class ItemError extends Error {
  constructor(
    readonly movieId: number,
    readonly stage: ItemErrorStage,
    message: string,
  ) {
    super(message);
    this.name = 'ItemError';
  }
}
