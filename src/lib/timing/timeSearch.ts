/**
 * Binary search over time ranges sorted by start.
 *
 * Lookups hold no state between calls; the subtitle driver keeps its own
 * cursor and only falls back to these when the clock leaves it.
 */

import type { Cue } from '../captions/types';

/** Anything with a closed `[start, end]` interval in seconds. */
export interface TimeRange {
  readonly start: number;
  readonly end: number;
}

/** Reads the interval of an item that does not store it as `start`/`end`. */
export interface TimeRangeAccessor<T> {
  start(item: T): number;
  end(item: T): number;
}

export const Accessors: {
  readonly startEnd: TimeRangeAccessor<TimeRange>;
} = {
  startEnd: {
    start: (item) => item.start,
    end: (item) => item.end,
  },
};

/** -1 before the range, 0 inside it (bounds included), 1 after it. */
export function compareTime<T>(t: number, item: T, acc: TimeRangeAccessor<T>): -1 | 0 | 1 {
  if (t < acc.start(item)) return -1;
  if (t > acc.end(item)) return 1;
  return 0;
}

/**
 * Number of leading items whose start is `<= t`. Items past that point all
 * start later than `t`.
 */
function countStartedBy<T>(items: readonly T[], t: number, acc: TimeRangeAccessor<T>): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (acc.start(items[mid]) <= t) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Highest index whose start is `<= t`, or `-1` when every item starts later
 * or `t` is not finite.
 */
export function findLastStartAtOrBefore<T>(
  items: readonly T[],
  t: number,
  acc: TimeRangeAccessor<T>,
): number {
  if (!Number.isFinite(t)) return -1;
  return countStartedBy(items, t, acc) - 1;
}

/**
 * Index of an item whose range contains `t`, or `-1`.
 *
 * With overlapping ranges any containing item may be returned; callers that
 * care must keep their ranges disjoint.
 */
export function findActiveIndex<T>(
  items: readonly T[],
  t: number,
  acc: TimeRangeAccessor<T>,
): number {
  if (!Number.isFinite(t)) return -1;
  let lo = 0;
  let hi = items.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const side = compareTime(t, items[mid], acc);
    if (side === 0) return mid;
    if (side < 0) {
      hi = mid - 1;
    } else {
      lo = mid + 1;
    }
  }
  return -1;
}

export function locateCue(cues: readonly Cue[], t: number): number {
  return findActiveIndex(cues, t, Accessors.startEnd);
}

export function lastCueStartingAtOrBefore(cues: readonly Cue[], t: number): number {
  return findLastStartAtOrBefore(cues, t, Accessors.startEnd);
}
