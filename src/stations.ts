import { getDistance } from "geolib";
import FileCache from "./cache.js";
import { ParseError } from "./errors.js";
import { getJson, isRecord } from "./http.js";
import type { App, Position, StationWithDistance } from "./types.js";
import type { NoaaStation } from "./types/noaa.js";

export const stationsUrl =
  "https://api.tidesandcurrents.noaa.gov/mdapi/prod/webapi/stations.json";

export interface CatalogOptions {
  /** Narrow the catalog, e.g. "tidepredictions" or "harcon". */
  type?: string;
}

/** Download the NOAA station catalog. */
export async function fetchStationCatalog(
  app: App,
  { type }: CatalogOptions = {}
): Promise<NoaaStation[]> {
  const endpoint = new URL(stationsUrl);
  if (type) endpoint.searchParams.set("type", type);

  app.debug(`Downloading station catalog: ${endpoint}`);
  try {
    const { body } = await getJson(endpoint, "tide station list");
    const stations: unknown = isRecord(body) ? body.stations : undefined;
    if (!Array.isArray(stations)) throw new ParseError("stations", stations);

    app.debug(`Station catalog has ${stations.length} stations`);
    return stations;
  } catch (err) {
    app.error(err);
    throw err;
  }
}

export async function countStations(app: App, options: CatalogOptions = {}): Promise<number> {
  return (await fetchStationCatalog(app, options)).length;
}

export class StationList extends Map<string, NoaaStation> {
  static async load(cache: FileCache, app: App, options: CatalogOptions = {}): Promise<StationList> {
    const key = options.type ? `stations-${options.type}` : "stations";
    let stations = (await cache.get(key)) as NoaaStation[] | undefined;

    if (Array.isArray(stations)) {
      app.debug(`Loaded ${stations.length} cached stations`);
    } else {
      stations = await fetchStationCatalog(app, options);
      await cache.set(key, stations);
    }

    return new this(stations);
  }

  constructor(data: NoaaStation[]) {
    super(data.map((station) => [station.id, station]));
  }

  closestTo(position: Position): StationWithDistance | undefined {
    return this.near(position, 1)[0];
  }

  near(position: Position, limit = 10): StationWithDistance[] {
    const stationsWithDistances = Array.from(this.values()).map((station) => ({
      ...station,
      distance: getDistance(position, {
        latitude: station.lat,
        longitude: station.lng,
      }),
    }));

    return stationsWithDistances
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);
  }
}
