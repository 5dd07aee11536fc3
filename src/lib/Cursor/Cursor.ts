import { Schema } from 'effect';

/**
 * Durable pointer tracking the first full pass over the listing.
 *
 * While `baselineComplete` is false the harvester is *building*: each run
 * scans a bounded window starting at `nextPage`. Once true it is in
 * *steady state* and every run rescans the top of the listing; `nextPage`
 * is then reset to 1 and no longer read.
 *
 * @group Data Types
 * @public
 */
export class Cursor extends Schema.Class<Cursor>('Cursor')({
  nextPage: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  baselineComplete: Schema.Boolean,
}) {
  static initial = (): Cursor =>
    new Cursor({ nextPage: 1, baselineComplete: false });
}

export interface CursorLimits {
  readonly pageCeiling: number;
  readonly perRunPageLimit: number;
  readonly deltaWindowSize: number;
}

export interface PageRange {
  readonly first: number;
  /** Inclusive */
  readonly last: number;
}

export const rangePages = (range: PageRange): number[] => {
  const pages: number[] = [];
  for (let page = range.first; page <= range.last; page++) {
    pages.push(page);
  }
  return pages;
};

/**
 * The sequential window a run scans for the given cursor.
 *
 * - building: `perRunPageLimit` pages from `nextPage`, capped at the ceiling
 * - steady state: pages 1 to `deltaWindowSize`, capped at the ceiling
 */
export const sequentialWindow = (
  cursor: Cursor,
  limits: CursorLimits
): PageRange => {
  if (cursor.baselineComplete) {
    return { first: 1, last: Math.min(limits.pageCeiling, limits.deltaWindowSize) };
  }
  const first = Math.min(cursor.nextPage, limits.pageCeiling);
  return {
    first,
    last: Math.min(first + limits.perRunPageLimit - 1, limits.pageCeiling),
  };
};

export interface BuildingProgress {
  /** Highest sequential-window page that ended Ok or Empty this run */
  readonly highestCompleted?: number;
  /** The consecutive-empty threshold was reached */
  readonly endOfData: boolean;
}

/**
 * Cursor after a run.
 *
 * In building mode the cursor moves to one past the highest completed page
 * (never beyond the ceiling). End of data, or completing the ceiling page,
 * switches to steady state. A steady-state cursor is returned unchanged.
 */
export const advanceCursor = (
  cursor: Cursor,
  progress: BuildingProgress,
  pageCeiling: number
): Cursor => {
  if (cursor.baselineComplete) {
    return cursor;
  }

  const reachedCeiling =
    progress.highestCompleted !== undefined &&
    progress.highestCompleted >= pageCeiling;

  if (progress.endOfData || reachedCeiling) {
    return new Cursor({ nextPage: 1, baselineComplete: true });
  }

  if (progress.highestCompleted === undefined) {
    return cursor;
  }

  return new Cursor({
    nextPage: Math.min(
      Math.max(cursor.nextPage, progress.highestCompleted + 1),
      pageCeiling
    ),
    baselineComplete: false,
  });
};
