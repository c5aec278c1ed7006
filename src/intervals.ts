import type { InterpolatedSeries, Interval, Threshold } from './types.js';

export interface ExtractOptions {
  /**
   * Close a run that is still inside the band when the series ends at the
   * last sample. Off by default, which drops such a run.
   */
  includeTrailingOpenInterval?: boolean;
}

/** Whether a height lies inside the band. Unset bounds are open. */
export function matchesThreshold({ low, high }: Threshold, height: number): boolean {
  if (typeof low === 'number' && typeof high === 'number') return height > low && height < high;
  if (typeof low === 'number') return height > low;
  if (typeof high === 'number') return height < high;
  return true;
}

/**
 * Scan the series once and emit every run of samples inside the band.
 *
 * An interval starts at its first matching sample and ends at the first
 * sample after it that no longer matches.
 */
export function extractIntervals(
  { points }: InterpolatedSeries,
  threshold: Threshold,
  { includeTrailingOpenInterval = false }: ExtractOptions = {}
): Interval[] {
  const intervals: Interval[] = [];
  let start: Date | null = null;

  for (const { time, height } of points) {
    if (matchesThreshold(threshold, height)) {
      if (start === null) start = time;
    } else if (start !== null) {
      intervals.push(Object.freeze({ start, end: time }));
      start = null;
    }
  }

  const last = points.at(-1);
  if (includeTrailingOpenInterval && start !== null && last && last.time > start) {
    intervals.push(Object.freeze({ start, end: last.time }));
  }

  return intervals;
}
