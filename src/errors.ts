/** Base class for every failure a tide calendar run can report. */
export class TideCalendarError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A remote endpoint answered with a non-success status or an error body. */
export class FetchError extends TideCalendarError {
  constructor(message: string, public readonly url: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A value from the remote API could not be read as a timestamp or height. */
export class ParseError extends TideCalendarError {
  constructor(public readonly field: string, public readonly value: unknown, message?: string) {
    super(message ?? `Invalid ${field}: ${JSON.stringify(value)}`);
  }
}

export class InsufficientDataError extends TideCalendarError {
  constructor(public readonly count: number) {
    super(`At least 2 tide predictions are needed to interpolate, got ${count}`);
  }
}

export class MissingStationInfoError extends TideCalendarError {
  constructor(public readonly stationId: string, options?: { cause?: unknown }) {
    super(`Failed to retrieve station info for ${stationId}`, options);
  }
}

/** Invalid user input, rejected before anything is fetched. */
export class ConfigError extends TideCalendarError {}
