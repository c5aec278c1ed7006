import moment from "moment";
import { createTideSeries } from "../calculations.js";
import { FetchError, MissingStationInfoError, ParseError } from "../errors.js";
import { getJson, isRecord } from "../http.js";
import type {
  App,
  PredictionParams,
  StationInfo,
  TidePoint,
  TideSeries,
  TideSource,
} from "../types.js";
import type { NoaaStation } from "../types/noaa.js";

const dataGetterUrl =
  "https://api.tidesandcurrents.noaa.gov/api/prod/datagetter";
const stationUrl = (id: string) =>
  `https://api.tidesandcurrents.noaa.gov/mdapi/prod/webapi/stations/${encodeURIComponent(id)}.json`;

const datum = "MLLW";
const timestampFormat = "YYYY-MM-DD HH:mm";

export interface NoaaOptions {
  /** Sent as the `application` parameter so NOAA can attribute traffic. */
  application?: string;
}

export default function (app: App, { application = "tide-calendar" }: NoaaOptions = {}): TideSource {
  return {
    id: "noaa",
    title: "NOAA CO-OPS",

    async fetchPredictions(params: PredictionParams): Promise<TideSeries> {
      const endpoint = new URL(dataGetterUrl);
      endpoint.search = new URLSearchParams({
        station: params.stationId,
        product: "predictions",
        time_zone: "GMT",
        begin_date: params.beginDate,
        end_date: params.endDate,
        units: params.units,
        datum,
        interval: "hilo",
        format: "json",
        application,
      }).toString();

      app.debug(`Fetching tides from NOAA: ${endpoint}`);

      try {
        const res = await getJson(endpoint, "NOAA tides");
        if (!isRecord(res.body)) throw new ParseError("body", res.body);
        const { error, predictions } = res.body;

        // NOAA answers 200 with an error body when nothing matches the request
        if (isRecord(error)) throw new FetchError(String(error.message), endpoint.toString(), res.status);
        if (!Array.isArray(predictions)) throw new ParseError("predictions", predictions);

        app.debug(`NOAA returned ${predictions.length} predictions`);
        return createTideSeries(predictions.map(parsePrediction));
      } catch (err) {
        app.error(err);
        throw err;
      }
    },

    async fetchStationInfo(stationId: string): Promise<StationInfo> {
      const endpoint = stationUrl(stationId);
      app.debug(`Fetching station info from NOAA: ${endpoint}`);

      try {
        const res = await getJson(endpoint, "station info");
        const stations: unknown = isRecord(res.body) ? res.body.stations : undefined;
        const station: NoaaStation | undefined = Array.isArray(stations) ? stations[0] : undefined;
        if (!station) throw new FetchError(`No station named ${stationId}`, endpoint, res.status);

        return {
          id: station.id || stationId,
          name: station.name,
          latitude: station.lat,
          longitude: station.lng,
          state: station.state || undefined,
          timezone: station.timezone,
        };
      } catch (err) {
        const missing = new MissingStationInfoError(stationId, { cause: err });
        app.error(missing);
        throw missing;
      }
    },
  };
}

/** Read a NOAA prediction record; timestamps are GMT because that is what was requested. */
export function parsePrediction(record: unknown): TidePoint {
  if (!isRecord(record)) throw new ParseError("prediction", record);
  const { t, v } = record;

  const time = typeof t === "string" ? moment.utc(t, timestampFormat, true) : null;
  if (!time?.isValid()) throw new ParseError("t", t);

  const height = typeof v === "string" && v.trim() !== "" ? Number(v) : NaN;
  if (!Number.isFinite(height)) throw new ParseError("v", v);

  return { time: time.toDate(), height };
}
