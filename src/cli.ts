import { writeFile } from "fs/promises";
import { Command, InvalidArgumentError } from "commander";
import moment from "moment";
import FileCache from "./cache.js";
import { defaults, resolveConfig, units, type Config } from "./config.js";
import { ConfigError } from "./errors.js";
import { createTideCalendar } from "./pipeline.js";
import noaa from "./sources/noaa.js";
import { countStations, StationList } from "./stations.js";
import type { App, Position, TideSource } from "./types.js";

const DAY = 24 * 60 * 60 * 1000;

export interface CliDependencies {
  app: App;
  createSource?: (app: App, config: Config) => TideSource;
  writeFile?: (path: string, data: string) => Promise<void>;
  print?: (line: string) => void;
  now?: () => Date;
}

export function createProgram({
  app,
  createSource = (sourceApp, { application }) => noaa(sourceApp, { application }),
  writeFile: write = (path, data) => writeFile(path, data, "utf-8"),
  print = (line) => process.stdout.write(`${line}\n`),
  now = () => new Date(),
}: CliDependencies): Command {
  const program = new Command("tide-calendar")
    .description("Turn NOAA tide predictions into calendar events for the hours a tide stays within a height band.");

  program
    .command("calendar")
    .description("Write an iCalendar file with one event per interval inside the band")
    .argument("<station>", "NOAA station id, e.g. 9447130")
    .option("-b, --begin <YYYYMMDD>", "first day of predictions (default: today)")
    .option("-e, --end <YYYYMMDD>", "last day of predictions (default: begin + 7 days)")
    .option("-u, --units <units>", `one of ${units.join(", ")}`)
    .option("--low <height>", "tide must be above this height", parseNumber)
    .option("--high <height>", "tide must be below this height", parseNumber)
    .option("--include-trailing", "keep an interval still open when the predictions end")
    .option("-o, --output <file>", "where to write the .ics file")
    .option("--cache-dir <dir>", "directory for the cached station catalog")
    .option("--no-validate", "skip checking the station against the NOAA catalog")
    .action(async (station: string, opts: CalendarOptions) => {
      const config = resolveConfig({
        stationId: station,
        beginDate: opts.begin,
        endDate: opts.end,
        units: opts.units,
        low: opts.low,
        high: opts.high,
        includeTrailingOpenInterval: opts.includeTrailing,
        output: opts.output,
        cacheDir: opts.cacheDir,
      }, now());
      app.debug("Starting tide calendar: " + JSON.stringify(config));

      if (opts.validate) {
        const stations = await loadStations(app, config);
        if (!stations.has(config.stationId)) {
          throw new ConfigError(`Unknown tide prediction station "${config.stationId}"`);
        }
      }

      const { intervals, ics } = await createTideCalendar(createSource(app, config), app, {
        stationId: config.stationId,
        beginDate: config.beginDate,
        endDate: config.endDate,
        units: config.units,
        threshold: { low: config.low, high: config.high },
        includeTrailingOpenInterval: config.includeTrailingOpenInterval,
      });

      await write(config.output, ics);

      for (const { start, end } of intervals) {
        print(`${formatTime(start)} - ${formatTime(end)}`);
      }
      print(`Wrote ${intervals.length} events to ${config.output}`);
    });

  program
    .command("stations")
    .description("Count NOAA stations, or list the ones nearest a position")
    .option("--type <type>", "station type, e.g. tidepredictions")
    .option("--near <lat,lon>", "list the stations closest to this position", parsePosition)
    .option("--limit <n>", "how many stations to list", parseCount, 5)
    .option("--cache-dir <dir>", "directory for the cached station catalog")
    .action(async (opts: StationsOptions) => {
      if (!opts.near) {
        print(String(await countStations(app, { type: opts.type })));
        return;
      }

      const { cacheDir, cacheMaxAgeDays } = defaults(now());
      const cache = new FileCache(opts.cacheDir ?? cacheDir, cacheMaxAgeDays * DAY);
      const stations = await StationList.load(cache, app, { type: opts.type });
      print(String(stations.size));
      for (const { id, name, state, distance } of stations.near(opts.near, opts.limit)) {
        print(`${id}  ${name}${state ? `, ${state}` : ""} (${(distance / 1000).toFixed(1)} km)`);
      }
    });

  return program;
}

interface CalendarOptions {
  begin?: string;
  end?: string;
  units?: string;
  low?: number;
  high?: number;
  includeTrailing?: boolean;
  output?: string;
  cacheDir?: string;
  validate: boolean;
}

interface StationsOptions {
  type?: string;
  near?: Position;
  limit: number;
  cacheDir?: string;
}

function loadStations(app: App, config: Config) {
  const cache = new FileCache(config.cacheDir, config.cacheMaxAgeDays * DAY);
  return StationList.load(cache, app, { type: "tidepredictions" });
}

function formatTime(date: Date) {
  return moment.utc(date).format("YYYY-MM-DD HH:mm [GMT]");
}

function parseNumber(value: string): number {
  const number = Number(value);
  if (value.trim() === "" || !Number.isFinite(number)) throw new InvalidArgumentError("Not a number.");
  return number;
}

function parseCount(value: string): number {
  const number = parseNumber(value);
  if (!Number.isInteger(number) || number < 1) throw new InvalidArgumentError("Not a positive integer.");
  return number;
}

function parsePosition(value: string): Position {
  const [latitude, longitude] = value.split(",").map((part) => Number(part.trim()));
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude) || Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    throw new InvalidArgumentError("Expected <lat,lon> in decimal degrees.");
  }
  return { latitude, longitude };
}
