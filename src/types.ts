import type { NoaaStation } from './types/noaa.js';

/** Debug and error logging, passed to every stage that talks to NOAA or runs the pipeline. */
export interface App {
  debug(message: string): void;
  error(error: unknown): void;
}

export type Units = "metric" | "english";

export interface Position {
  latitude: number;
  longitude: number;
}

export interface TidePoint {
  readonly time: Date;
  readonly height: number;
}

/** Tide points ordered by strictly increasing time. */
export type TideSeries = readonly TidePoint[];

export interface InterpolatedSeries {
  readonly stepMinutes: number;
  readonly points: TideSeries;
}

export interface Interval {
  readonly start: Date;
  readonly end: Date;
}

export interface Threshold {
  low?: number;
  high?: number;
}

export interface StationInfo {
  id: string;
  name: string;
  latitude?: number;
  longitude?: number;
  state?: string;
  timezone?: string;
}

export interface PredictionParams {
  stationId: string;
  /** YYYYMMDD */
  beginDate: string;
  /** YYYYMMDD */
  endDate: string;
  units: Units;
}

export interface TideSource {
  id: string;
  title: string;
  fetchPredictions(params: PredictionParams): Promise<TideSeries>;
  fetchStationInfo(stationId: string): Promise<StationInfo>;
}

export interface CalendarRequest extends PredictionParams {
  threshold: Threshold;
  includeTrailingOpenInterval?: boolean;
}

export interface CalendarResult {
  station: StationInfo;
  predictions: TideSeries;
  interpolated: InterpolatedSeries;
  intervals: Interval[];
  ics: string;
}

export type StationWithDistance = NoaaStation & { distance: number };
