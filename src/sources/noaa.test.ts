import { describe, it, expect, vi, beforeEach } from 'vitest';
import noaa, { parsePrediction } from './noaa.js';
import { FetchError, MissingStationInfoError, ParseError } from '../errors.js';

const app = { debug: vi.fn(), error: vi.fn() };
const params = { stationId: '9447130', beginDate: '20240101', endDate: '20240102', units: 'english' as const };

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

let fetchMock: ReturnType<typeof vi.fn>;

beforeEach(() => {
  app.debug.mockReset();
  app.error.mockReset();
  fetchMock = vi.fn();
  vi.stubGlobal('fetch', fetchMock);
});

function requestedUrl(call = 0) {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

describe('parsePrediction', () => {
  it('reads GMT timestamps and heights', () => {
    const { time, height } = parsePrediction({ t: '2024-01-01 06:12', v: '3.456', type: 'H' });
    expect(time.toISOString()).toBe('2024-01-01T06:12:00.000Z');
    expect(height).toBe(3.456);
  });

  it('accepts negative heights', () => {
    expect(parsePrediction({ t: '2024-01-01 06:12', v: '-0.318' }).height).toBe(-0.318);
  });

  it('rejects records that are not objects', () => {
    expect(() => parsePrediction(null)).toThrow(ParseError);
    expect(() => parsePrediction('2024-01-01 06:12')).toThrow(ParseError);
  });

  it('rejects malformed values', () => {
    expect(() => parsePrediction({ t: '2024-01-01T06:12', v: '1' })).toThrow(ParseError);
    expect(() => parsePrediction({ t: '2024-13-01 06:12', v: '1' })).toThrow(ParseError);
    expect(() => parsePrediction({ t: '2024-01-01 06:12', v: '' })).toThrow(ParseError);
    expect(() => parsePrediction({ t: '2024-01-01 06:12', v: 'abc' })).toThrow(ParseError);
  });
});

describe('fetchPredictions', () => {
  it('requests hilo predictions in GMT against MLLW', async () => {
    fetchMock.mockResolvedValue(json({ predictions: [] }));
    await noaa(app, { application: 'test-app' }).fetchPredictions(params);

    const url = requestedUrl();
    expect(url.origin + url.pathname).toBe('https://api.tidesandcurrents.noaa.gov/api/prod/datagetter');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      station: '9447130',
      product: 'predictions',
      time_zone: 'GMT',
      begin_date: '20240101',
      end_date: '20240102',
      units: 'english',
      datum: 'MLLW',
      interval: 'hilo',
      format: 'json',
      application: 'test-app',
    });
  });

  it('returns the predictions in time order', async () => {
    fetchMock.mockResolvedValue(json({
      predictions: [
        { t: '2024-01-01 12:40', v: '11.204', type: 'H' },
        { t: '2024-01-01 06:05', v: '2.871', type: 'L' },
      ],
    }));

    const series = await noaa(app).fetchPredictions(params);
    expect(series.map(({ time, height }) => [time.toISOString(), height])).toEqual([
      ['2024-01-01T06:05:00.000Z', 2.871],
      ['2024-01-01T12:40:00.000Z', 11.204],
    ]);
  });

  it('fails on a non-success status', async () => {
    fetchMock.mockResolvedValue(new Response('down', { status: 503 }));

    const error = await noaa(app).fetchPredictions(params).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 503 });
    expect(app.error).toHaveBeenCalledWith(error);
  });

  it('fails when NOAA reports an error in the body', async () => {
    fetchMock.mockResolvedValue(json({ error: { message: 'No Predictions data was found.' } }));

    await expect(noaa(app).fetchPredictions(params)).rejects.toThrow(new FetchError('No Predictions data was found.', ''));
  });

  it('fails on an unreadable height', async () => {
    fetchMock.mockResolvedValue(json({ predictions: [{ t: '2024-01-01 06:05', v: 'n/a' }] }));

    await expect(noaa(app).fetchPredictions(params)).rejects.toMatchObject({ name: 'ParseError', field: 'v', value: 'n/a' });
  });

  it('fails when the network is unreachable', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(noaa(app).fetchPredictions(params)).rejects.toMatchObject({
      name: 'FetchError',
      message: 'Failed to fetch NOAA tides: fetch failed',
      status: undefined,
    });
  });

  it('fails on a body that is not JSON', async () => {
    fetchMock.mockResolvedValue(new Response('<html>Service unavailable</html>', { status: 200 }));

    await expect(noaa(app).fetchPredictions(params)).rejects.toMatchObject({ name: 'ParseError', field: 'body' });
  });

  it('fails on an empty prediction record', async () => {
    fetchMock.mockResolvedValue(json({ predictions: [{ t: '2024-01-01 06:05', v: '1.2' }, null] }));

    await expect(noaa(app).fetchPredictions(params)).rejects.toMatchObject({ name: 'ParseError', field: 'prediction' });
  });

  it('fails when predictions are missing', async () => {
    fetchMock.mockResolvedValue(json({}));

    await expect(noaa(app).fetchPredictions(params)).rejects.toBeInstanceOf(ParseError);
  });
});

describe('fetchStationInfo', () => {
  it('returns the station name and position', async () => {
    fetchMock.mockResolvedValue(json({
      stations: [{ id: '9447130', name: 'Seattle', state: 'WA', lat: 47.6026, lng: -122.3393, timezone: 'PST' }],
    }));

    await expect(noaa(app).fetchStationInfo('9447130')).resolves.toEqual({
      id: '9447130',
      name: 'Seattle',
      state: 'WA',
      latitude: 47.6026,
      longitude: -122.3393,
      timezone: 'PST',
    });
    expect(requestedUrl().toString()).toBe('https://api.tidesandcurrents.noaa.gov/mdapi/prod/webapi/stations/9447130.json');
  });

  it('reports a missing station', async () => {
    fetchMock.mockResolvedValue(new Response('Not found', { status: 404 }));

    const error = await noaa(app).fetchStationInfo('0000000').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MissingStationInfoError);
    expect(error).toMatchObject({ stationId: '0000000' });
    expect(error instanceof Error && error.cause).toBeInstanceOf(FetchError);
  });

  it('reports a network failure as missing station info', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const error = await noaa(app).fetchStationInfo('9447130').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MissingStationInfoError);
    expect(error instanceof Error && error.cause).toBeInstanceOf(FetchError);
  });

  it('reports an empty station list', async () => {
    fetchMock.mockResolvedValue(json({ stations: [] }));

    await expect(noaa(app).fetchStationInfo('9447130')).rejects.toBeInstanceOf(MissingStationInfoError);
  });
});
