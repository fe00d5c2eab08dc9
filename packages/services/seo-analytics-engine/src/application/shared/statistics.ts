/**
 * Statistics primitives shared by the forecasting, anomaly and trend engines.
 * All functions are total: empty or degenerate input yields 0 or a sentinel
 * label, never NaN.
 */

import type { TrendDirection, Volatility } from '../../domains/entities';

/** Two-sided 95% normal quantile */
export const Z_95 = 1.96;

export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/** Bessel-corrected standard deviation; 0 below two values */
export function sampleStdev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squares = sum(values.map(value => (value - avg) ** 2));
  return Math.sqrt(squares / (values.length - 1));
}

export function populationStdev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const squares = sum(values.map(value => (value - avg) ** 2));
  return Math.sqrt(squares / values.length);
}

export interface LinearFit {
  slope: number;
  intercept: number;
  /** 0 when the series is constant */
  rSquared: number;
  /** sqrt(ssRes / (n - 2)); 0 with two points or fewer */
  standardError: number;
  xMean: number;
  /** Σ(x - x̄)² */
  sxx: number;
  n: number;
}

/**
 * Ordinary least squares of value against index 0..n-1.
 * Returns null when the index variance is zero (fewer than two points).
 */
export function fitLinear(values: readonly number[]): LinearFit | null {
  const n = values.length;
  if (n < 2) return null;

  const xMean = (n - 1) / 2;
  const yMean = mean(values);

  let sxy = 0;
  let sxx = 0;
  values.forEach((value, x) => {
    sxy += (x - xMean) * (value - yMean);
    sxx += (x - xMean) ** 2;
  });
  if (sxx === 0) return null;

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  let ssTot = 0;
  let ssRes = 0;
  values.forEach((value, x) => {
    ssTot += (value - yMean) ** 2;
    ssRes += (value - (slope * x + intercept)) ** 2;
  });

  return {
    slope,
    intercept,
    rSquared: ssTot === 0 ? 0 : 1 - ssRes / ssTot,
    standardError: n > 2 ? Math.sqrt(ssRes / (n - 2)) : 0,
    xMean,
    sxx,
    n,
  };
}

export function predictAt(fit: LinearFit, x: number): number {
  return fit.slope * x + fit.intercept;
}

/** Half-width of the 95% prediction interval at index x */
export function predictionMargin(fit: LinearFit, x: number): number {
  return Z_95 * fit.standardError * Math.sqrt(1 + 1 / fit.n + (x - fit.xMean) ** 2 / fit.sxx);
}

/**
 * Regression slope compared against 1% of the mean (0.01 when the mean is 0).
 */
export function trendDirection(values: readonly number[]): TrendDirection {
  if (values.length < 2) return 'insufficient_data';

  const fit = fitLinear(values);
  if (!fit) return 'flat';

  const avg = mean(values);
  const threshold = avg !== 0 ? 0.01 * Math.abs(avg) : 0.01;

  if (fit.slope > threshold) return 'up';
  if (fit.slope < -threshold) return 'down';
  return 'flat';
}

/** Coefficient of variation bands: <10% low, <25% medium, otherwise high */
export function classifyVolatility(values: readonly number[]): Volatility {
  if (values.length < 2) return 'unknown';

  const avg = mean(values);
  if (avg === 0) return 'unknown';

  const cv = (sampleStdev(values) / Math.abs(avg)) * 100;
  if (cv < 10) return 'low';
  if (cv < 25) return 'medium';
  return 'high';
}

/** Percent change relative to `previous`; 0 when `previous` is 0 */
export function percentChange(current: number, previous: number): number {
  return previous === 0 ? 0 : ((current - previous) / previous) * 100;
}
