import { linearRegression as fitLine, mean as average, median as middle, probit, sampleVariance } from 'simple-statistics';

// Numeric helpers shared by the analyzer, anomaly detector and forecaster.
// simple-statistics throws on empty input; these return NaN or 0 instead so
// callers can mark a window as insufficient.

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return average([...values]);
}

// Sample variance (n - 1 denominator); 0 for fewer than two values
export function variance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  return sampleVariance([...values]);
}

export function stdDev(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return middle([...values]);
}

export interface LinearFit {
  slope: number;
  intercept: number;
}

export function linearRegression(xs: readonly number[], ys: readonly number[]): LinearFit {
  const n = Math.min(xs.length, ys.length);
  if (n === 0) return { slope: 0, intercept: 0 };

  const points = xs.slice(0, n).map((x, i) => [x, ys[i] ?? 0]);
  // A vertical cloud has no slope; keep the level instead of NaN
  if (points.every(([x]) => x === points[0]?.[0])) {
    return { slope: 0, intercept: mean(ys.slice(0, n)) };
  }

  const { m, b } = fitLine(points);
  return { slope: m, intercept: b };
}

// Inverse of the standard normal CDF
export function normalQuantile(p: number): number {
  if (p <= 0 || p >= 1) {
    throw new RangeError(`Probability must be in (0, 1), got ${p}`);
  }
  return probit(p);
}

// z such that a symmetric interval of +/- z sigma holds `confidence` of a normal distribution
export function twoSidedZ(confidence: number): number {
  return normalQuantile(0.5 + confidence / 2);
}

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
