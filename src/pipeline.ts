import { createCalendar } from './calendar.js';
import { interpolateSeries } from './calculations.js';
import { extractIntervals } from './intervals.js';
import type { App, CalendarRequest, CalendarResult, TideSource } from './types.js';

/**
 * Fetch predictions, interpolate, extract the in-band intervals and render
 * them as iCalendar. Any failure aborts the whole run.
 */
export async function createTideCalendar(
  source: TideSource,
  app: App,
  request: CalendarRequest
): Promise<CalendarResult> {
  const { threshold, includeTrailingOpenInterval = false, ...params } = request;

  const predictions = await source.fetchPredictions(params);
  app.debug(`Fetched ${predictions.length} predictions for ${params.stationId} from ${source.title}`);

  const interpolated = interpolateSeries(predictions);
  app.debug(`Interpolated ${interpolated.points.length} samples`);

  const intervals = extractIntervals(interpolated, threshold, { includeTrailingOpenInterval });
  app.debug(`Found ${intervals.length} intervals (low: ${threshold.low ?? 'unset'}, high: ${threshold.high ?? 'unset'})`);

  const station = await source.fetchStationInfo(params.stationId);
  const ics = createCalendar(intervals, station, threshold, { units: params.units });

  return { station, predictions, interpolated, intervals, ics };
}
