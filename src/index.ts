/*
 * Copyright 2017 Scott Bender <scott@scottbender.net> and Joachim Bakke
 * Copyright 2025 Brandon Keepers <brandon@opensoul.org>
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

export { createTideCalendar } from './pipeline.js';
export { createTideSeries, pchip, interpolateSeries, heightAt } from './calculations.js';
export { matchesThreshold, extractIntervals, type ExtractOptions } from './intervals.js';
export { createCalendar, describeThreshold, type CalendarOptions } from './calendar.js';
export { fetchStationCatalog, countStations, StationList, type CatalogOptions } from './stations.js';
export { default as noaa, parsePrediction, type NoaaOptions } from './sources/noaa.js';
export { resolveConfig, defaults, type Config, type ConfigInput } from './config.js';
export { createApp, enableLogging, formatError } from './logger.js';
export { getJson, isRecord, type JsonResponse } from './http.js';
export { default as FileCache } from './cache.js';
export * from './errors.js';
export type * from './types.js';
