import moment from "moment";
import { ConfigError } from "./errors.js";
import type { Units } from "./types.js";

export const dateFormat = "YYYYMMDD";
export const units: readonly Units[] = ["metric", "english"];

export type Config = {
  stationId: string;
  beginDate: string;
  endDate: string;
  units: Units;
  low?: number;
  high?: number;
  includeTrailingOpenInterval: boolean;
  /** Where the .ics file is written */
  output: string;
  cacheDir: string;
  /** Age after which the cached station catalog is downloaded again */
  cacheMaxAgeDays: number;
  application: string;
};

export type ConfigInput = Partial<Omit<Config, "units">> & { units?: string };

export function defaults(now = new Date()): Omit<Config, "stationId"> {
  return {
    beginDate: moment(now).format(dateFormat),
    endDate: moment(now).add(7, "days").format(dateFormat),
    units: "metric",
    includeTrailingOpenInterval: false,
    output: "tides.ics",
    cacheDir: process.env.TIDE_CALENDAR_CACHE_DIR || ".tide-calendar-cache",
    cacheMaxAgeDays: 30,
    application: "tide-calendar",
  };
}

/** Merge user input over the defaults and reject anything NOAA would choke on. */
export function resolveConfig(input: ConfigInput, now = new Date()): Config {
  const base = defaults(now);
  const stationId = input.stationId?.trim();
  if (!stationId) throw new ConfigError("A station id is required");

  const unitSystem = input.units ?? base.units;
  if (!isUnits(unitSystem)) {
    throw new ConfigError(`Units must be one of ${units.join(", ")}, got "${unitSystem}"`);
  }

  const config: Config = {
    stationId,
    beginDate: input.beginDate ?? base.beginDate,
    endDate: input.endDate ?? weekAfter(input.beginDate) ?? base.endDate,
    units: unitSystem,
    low: input.low,
    high: input.high,
    includeTrailingOpenInterval: input.includeTrailingOpenInterval ?? base.includeTrailingOpenInterval,
    output: input.output ?? base.output,
    cacheDir: input.cacheDir ?? base.cacheDir,
    cacheMaxAgeDays: input.cacheMaxAgeDays ?? base.cacheMaxAgeDays,
    application: input.application ?? base.application,
  };

  const begin = parseDate("begin date", config.beginDate);
  const end = parseDate("end date", config.endDate);
  if (begin.isAfter(end)) {
    throw new ConfigError(`Begin date ${config.beginDate} is after end date ${config.endDate}`);
  }

  for (const key of ["low", "high"] as const) {
    const value = config[key];
    if (value !== undefined && !Number.isFinite(value)) {
      throw new ConfigError(`The ${key} limit must be a number`);
    }
  }
  if (config.low !== undefined && config.high !== undefined && config.low >= config.high) {
    throw new ConfigError(`The low limit (${config.low}) must be below the high limit (${config.high})`);
  }

  if (!(config.cacheMaxAgeDays >= 0)) {
    throw new ConfigError(`Cache age must be zero or more days, got ${config.cacheMaxAgeDays}`);
  }

  return config;
}

function isUnits(value: string): value is Units {
  return units.some((u) => u === value);
}

/** Seven days after a begin date, so a lone begin date still gets a week. */
function weekAfter(beginDate: string | undefined): string | undefined {
  if (beginDate === undefined) return undefined;
  const begin = moment.utc(beginDate, dateFormat, true);
  return begin.isValid() ? begin.add(7, "days").format(dateFormat) : undefined;
}

function parseDate(label: string, value: string) {
  const date = moment.utc(value, dateFormat, true);
  if (!date.isValid()) throw new ConfigError(`Invalid ${label} "${value}", expected ${dateFormat}`);
  return date;
}
