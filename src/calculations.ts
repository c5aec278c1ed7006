import { InsufficientDataError, ParseError } from './errors.js';
import type { InterpolatedSeries, TidePoint, TideSeries } from './types.js';

const MINUTE = 60 * 1000;

/** Order tide points by time, rejecting two heights for the same instant. */
export function createTideSeries(points: Iterable<TidePoint>): TideSeries {
  const sorted = Array.from(points).sort((a, b) => a.time.getTime() - b.time.getTime());

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].time.getTime() === sorted[i - 1].time.getTime()) {
      throw new ParseError('t', sorted[i].time.toISOString(), `Duplicate prediction at ${sorted[i].time.toISOString()}`);
    }
  }

  return Object.freeze(sorted.map(({ time, height }) => Object.freeze({ time, height })));
}

/**
 * Piecewise Cubic Hermite Interpolating Polynomial.
 *
 * Slopes follow Fritsch-Carlson, so the curve never overshoots between a
 * high and a low. `xs` must be strictly increasing.
 */
export function pchip(xs: readonly number[], ys: readonly number[]): (x: number) => number {
  const n = xs.length;
  if (n < 2 || ys.length !== n) throw new InsufficientDataError(Math.min(n, ys.length));

  const h: number[] = [];
  const delta: number[] = [];
  for (let k = 0; k < n - 1; k++) {
    h.push(xs[k + 1] - xs[k]);
    delta.push((ys[k + 1] - ys[k]) / h[k]);
  }

  const d = slopes(h, delta);

  return (x: number) => {
    const k = segmentAt(xs, x);
    if (x === xs[k]) return ys[k];
    if (x === xs[k + 1]) return ys[k + 1];

    const t = (x - xs[k]) / h[k];
    const t2 = t * t;
    const t3 = t2 * t;

    return (2 * t3 - 3 * t2 + 1) * ys[k]
      + (t3 - 2 * t2 + t) * h[k] * d[k]
      + (-2 * t3 + 3 * t2) * ys[k + 1]
      + (t3 - t2) * h[k] * d[k + 1];
  };
}

function slopes(h: number[], delta: number[]): number[] {
  const n = h.length + 1;

  // Two knots: a straight line
  if (n === 2) return [delta[0], delta[0]];

  const d = new Array<number>(n).fill(0);
  for (let k = 1; k < n - 1; k++) {
    if (delta[k - 1] * delta[k] <= 0) continue;
    const w1 = 2 * h[k] + h[k - 1];
    const w2 = h[k] + 2 * h[k - 1];
    d[k] = (w1 + w2) / (w1 / delta[k - 1] + w2 / delta[k]);
  }

  d[0] = endSlope(h[0], h[1], delta[0], delta[1]);
  d[n - 1] = endSlope(h[n - 2], h[n - 3], delta[n - 2], delta[n - 3]);
  return d;
}

/** One-sided three-point slope, clamped to keep the end segment monotonic. */
function endSlope(h0: number, h1: number, m0: number, m1: number): number {
  const d = ((2 * h0 + h1) * m0 - h0 * m1) / (h0 + h1);

  if (Math.sign(d) !== Math.sign(m0)) return 0;
  if (Math.sign(m0) !== Math.sign(m1) && Math.abs(d) > Math.abs(3 * m0)) return 3 * m0;
  return d;
}

/** Index of the segment [xs[k], xs[k+1]] containing x. */
function segmentAt(xs: readonly number[], x: number): number {
  if (x < xs[0] || x > xs[xs.length - 1]) {
    throw new RangeError(`${x} is outside the interpolation range`);
  }

  let lo = 0;
  let hi = xs.length - 2;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (xs[mid] <= x) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

function curveFor(series: TideSeries) {
  if (series.length < 2) throw new InsufficientDataError(series.length);

  const origin = series[0].time.getTime();
  const curve = pchip(
    series.map(({ time }) => (time.getTime() - origin) / MINUTE),
    series.map(({ height }) => height)
  );

  return { origin, curve };
}

/** Resample the series every `stepMinutes` from its first point to its last, inclusive. */
export function interpolateSeries(series: TideSeries, stepMinutes = 1): InterpolatedSeries {
  if (!(stepMinutes > 0)) throw new RangeError(`Invalid step: ${stepMinutes} minutes`);

  const { origin, curve } = curveFor(series);
  const span = (series[series.length - 1].time.getTime() - origin) / MINUTE;

  const points: TidePoint[] = [];
  for (let i = 0; i * stepMinutes <= span; i++) {
    const minutes = i * stepMinutes;
    points.push(Object.freeze({ time: new Date(origin + minutes * MINUTE), height: curve(minutes) }));
  }

  return Object.freeze({ stepMinutes, points: Object.freeze(points) });
}

/** Estimate the height at any instant covered by the series. */
export function heightAt(series: TideSeries, time: Date): number {
  const { origin, curve } = curveFor(series);
  return curve((time.getTime() - origin) / MINUTE);
}
