import ical from "ical-generator";
import type { Interval, StationInfo, Threshold, Units } from "./types.js";

export interface CalendarOptions {
  /** Calendar display name. Defaults to "Tides at <station>". */
  name?: string;
  units?: Units;
}

const unitLabel: Record<Units, string> = { metric: "m", english: "ft" };

/** Event title, e.g. "Seattle min 1.5 max none". */
export function describeThreshold(station: Pick<StationInfo, "name">, { low, high }: Threshold): string {
  return `${station.name} min ${low ?? "none"} max ${high ?? "none"}`;
}

/**
 * Render each interval as a VEVENT. Interval bounds are GMT instants, so
 * they are written in UTC form (`DTSTART:20240101T014600Z`).
 */
export function createCalendar(
  intervals: readonly Interval[],
  station: StationInfo,
  threshold: Threshold,
  { name = `Tides at ${station.name}`, units }: CalendarOptions = {}
): string {
  const calendar = ical({
    name,
    prodId: { company: "tide-calendar", product: "tide-calendar" },
  });

  const summary = describeThreshold(station, threshold);
  const description = units
    ? `Predicted tide height within the band at NOAA station ${station.id} (${unitLabel[units]}, MLLW)`
    : `Predicted tide height within the band at NOAA station ${station.id} (MLLW)`;

  for (const { start, end } of intervals) {
    calendar.createEvent({
      id: `${station.id}-${start.getTime()}@tide-calendar`,
      start,
      end,
      summary,
      description,
    });
  }

  return calendar.toString();
}
