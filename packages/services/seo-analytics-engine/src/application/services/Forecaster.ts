/**
 * Forecaster
 * Linear, moving-average, keyword-position and seasonal traffic projections
 * over repository histories. Every projected point satisfies
 * confidenceLow <= predictedValue <= confidenceHigh.
 */

import { errorMessage } from '@seo-insights/platform-core';
import { Result } from '@seo-insights/shared-contracts';
import type { IMetricRepository } from '../../domains/repositories/IMetricRepository';
import type {
  ClientForecastBatch,
  ForecastConfidence,
  ForecastPoint,
  KeywordPositionForecast,
  KeywordPositionPoint,
  LinearForecast,
  MovingAverageForecast,
  SlopeTrend,
  TrafficForecast,
} from '../../domains/entities';
import { getLogger } from '../../config/engine-config';
import {
  addDays,
  fitLinear,
  mean,
  metricNames,
  predictAt,
  predictionMargin,
  round,
  sampleStdev,
  systemClock,
  toIsoDate,
  Z_95,
  type Clock,
  type LinearFit,
} from '../shared';

const logger = getLogger('seo-analytics-engine-forecaster');

const LINEAR_HISTORY_MONTHS = 6;
const LINEAR_MIN_POINTS = 3;
const TRAFFIC_HISTORY_DAYS = 90;
const TRAFFIC_MIN_POINTS = 7;
const SEASONALITY_MIN_POINTS = 14;
const KEYWORD_MIN_POSITIONS = 5;
const KEYWORD_TREND_WINDOW = 10;
const RETURNED_POINTS = 30;
const WEEK = 7;

export interface ForecasterOptions {
  defaultHorizonDays?: number;
  now?: Clock;
}

function slopeTrend(slope: number): SlopeTrend {
  if (slope > 0) return 'increasing';
  if (slope < 0) return 'decreasing';
  return 'stable';
}

function confidenceFromRSquared(rSquared: number): ForecastConfidence {
  if (rSquared > 0.7) return 'high';
  if (rSquared > 0.4) return 'medium';
  return 'low';
}

function invalidHorizon(daysAhead: number) {
  return Result.fail('INVALID_INPUT', `daysAhead must be a positive integer, got ${daysAhead}`);
}

/**
 * Weekday multipliers indexed by `i mod 7`.
 * Null below two full weeks of data.
 */
function weeklyPattern(values: readonly number[]): number[] | null {
  if (values.length < SEASONALITY_MIN_POINTS) return null;

  const overall = mean(values);
  return Array.from({ length: WEEK }, (_, day) => {
    const dayValues = values.filter((_, index) => index % WEEK === day);
    return overall !== 0 ? mean(dayValues) / overall : 1;
  });
}

export class Forecaster {
  private readonly defaultHorizonDays: number;
  private readonly now: Clock;

  constructor(
    private readonly repository: IMetricRepository,
    options: ForecasterOptions = {}
  ) {
    this.defaultHorizonDays = options.defaultHorizonDays ?? 90;
    this.now = options.now ?? systemClock;
  }

  /**
   * OLS trend over the last six months with a 95% prediction interval.
   * All generated points are persisted; the first 30 are returned.
   */
  async forecastLinear(
    clientId: number,
    metricName: string,
    daysAhead: number = this.defaultHorizonDays
  ): Promise<Result<LinearForecast>> {
    if (!Number.isInteger(daysAhead) || daysAhead < 1) return invalidHorizon(daysAhead);

    const trend = await this.repository.getMetricTrend(clientId, metricName, LINEAR_HISTORY_MONTHS);
    if (trend.length < LINEAR_MIN_POINTS) {
      logger.debug('Linear forecast skipped', { clientId, metricName, points: trend.length });
      return Result.fail(
        'INSUFFICIENT_DATA',
        `Need at least ${LINEAR_MIN_POINTS} samples of ${metricName}, found ${trend.length}`
      );
    }

    const fit = fitLinear(trend.map(sample => sample.value));
    if (!fit) {
      return Result.fail('INSUFFICIENT_DATA', `Cannot fit a trend for ${metricName}`);
    }

    const lastDate = trend[trend.length - 1].date;
    const points = Array.from({ length: daysAhead }, (_, offset) =>
      this.linearPoint(fit, fit.n + offset, addDays(lastDate, offset + 1))
    );

    await this.repository.saveForecast(clientId, metricName, points);

    logger.debug('Linear forecast generated', {
      clientId,
      metricName,
      rSquared: fit.rSquared,
      horizon: daysAhead,
    });

    return Result.ok<LinearForecast>({
      metric: metricName,
      model: 'linear_regression',
      rSquared: round(fit.rSquared, 3),
      confidence: confidenceFromRSquared(fit.rSquared),
      slope: round(fit.slope, 4),
      trend: slopeTrend(fit.slope),
      forecasts: points.slice(0, RETURNED_POINTS),
      totalForecasts: points.length,
    });
  }

  /**
   * Flat projection of the trailing `window` mean with a ±1.96σ band.
   */
  async forecastMovingAverage(
    clientId: number,
    metricName: string,
    window = 7,
    daysAhead = 30
  ): Promise<Result<MovingAverageForecast>> {
    if (!Number.isInteger(window) || window < 1) {
      return Result.fail('INVALID_INPUT', `window must be a positive integer, got ${window}`);
    }
    if (!Number.isInteger(daysAhead) || daysAhead < 1) return invalidHorizon(daysAhead);

    const trend = await this.repository.getMetricTrend(clientId, metricName, LINEAR_HISTORY_MONTHS);
    if (trend.length < window) {
      logger.debug('Moving average forecast skipped', { clientId, metricName, points: trend.length, window });
      return Result.fail('INSUFFICIENT_DATA', `Need at least ${window} samples of ${metricName}, found ${trend.length}`);
    }

    const recent = trend.slice(-window).map(sample => sample.value);
    const baseline = mean(recent);
    const band = Z_95 * sampleStdev(recent);

    const predictedValue = Math.max(0, round(baseline));
    const confidenceLow = Math.max(0, round(baseline - band));
    const confidenceHigh = Math.max(predictedValue, round(baseline + band));

    const lastDate = trend[trend.length - 1].date;
    const forecasts: ForecastPoint[] = Array.from({ length: daysAhead }, (_, offset) => ({
      date: addDays(lastDate, offset + 1),
      predictedValue,
      confidenceLow,
      confidenceHigh,
      modelType: 'moving_average',
    }));

    return Result.ok<MovingAverageForecast>({
      metric: metricName,
      model: 'moving_average',
      windowSize: window,
      baselineValue: round(baseline),
      forecasts,
    });
  }

  /**
   * Extrapolates the average daily change of the last ten known positions,
   * clamped to ranks 1..100.
   */
  async forecastKeywordPosition(
    clientId: number,
    keyword: string,
    daysAhead = 30
  ): Promise<Result<KeywordPositionForecast>> {
    if (!Number.isInteger(daysAhead) || daysAhead < 1) return invalidHorizon(daysAhead);

    const history = await this.repository.getKeywordHistory(clientId, keyword);
    const positions = history.flatMap(observation => (observation.position === null ? [] : [observation.position]));

    if (positions.length < KEYWORD_MIN_POSITIONS) {
      logger.debug('Keyword forecast skipped', { clientId, keyword, positions: positions.length });
      return Result.fail(
        'INSUFFICIENT_DATA',
        `Need at least ${KEYWORD_MIN_POSITIONS} ranked observations for "${keyword}", found ${positions.length}`
      );
    }

    const recent = positions.slice(-KEYWORD_TREND_WINDOW);
    const totalChange = recent[recent.length - 1] - recent[0];
    const dailyChange = totalChange / recent.length;
    const currentPosition = positions[positions.length - 1];
    const lastDate = history[history.length - 1].date;

    const forecasts: KeywordPositionPoint[] = [];
    let projected = currentPosition;
    for (let day = 1; day <= daysAhead; day++) {
      projected = Math.max(1, Math.min(100, projected + dailyChange));
      forecasts.push({
        date: addDays(lastDate, day),
        predictedPosition: round(projected, 1),
        confidence: 'medium',
      });
    }

    const at30 = forecasts.length >= RETURNED_POINTS ? forecasts[RETURNED_POINTS - 1].predictedPosition : null;

    return Result.ok<KeywordPositionForecast>({
      keyword,
      currentPosition,
      dailyChange: round(dailyChange, 3),
      forecastedPosition30d: at30,
      expectedChange: at30 === null ? 0 : round(at30 - currentPosition, 1),
      trend: totalChange > 0 ? 'up' : totalChange < 0 ? 'down' : 'flat',
      forecasts,
    });
  }

  /**
   * Linear session trend over the last 90 days, scaled by a weekly factor
   * when at least two weeks of data exist.
   */
  async forecastTraffic(clientId: number, daysAhead: number = this.defaultHorizonDays): Promise<Result<TrafficForecast>> {
    if (!Number.isInteger(daysAhead) || daysAhead < 1) return invalidHorizon(daysAhead);

    const traffic = await this.repository.getTrafficTrend(clientId, TRAFFIC_HISTORY_DAYS);
    if (traffic.length < TRAFFIC_MIN_POINTS) {
      logger.debug('Traffic forecast skipped', { clientId, points: traffic.length });
      return Result.fail(
        'INSUFFICIENT_DATA',
        `Need at least ${TRAFFIC_MIN_POINTS} days of traffic, found ${traffic.length}`
      );
    }

    const sessions = traffic.map(sample => sample.sessions);
    const fit = fitLinear(sessions);
    if (!fit) {
      return Result.fail('INSUFFICIENT_DATA', 'Cannot fit a traffic trend');
    }

    const pattern = weeklyPattern(sessions);
    const factors = pattern ?? Array.from({ length: WEEK }, () => 1);
    const lastDate = traffic[traffic.length - 1].date;

    const points: ForecastPoint[] = Array.from({ length: daysAhead }, (_, offset) => {
      const x = fit.n + offset;
      const factor = factors[x % WEEK];
      const adjusted = predictAt(fit, x) * factor;
      const margin = predictionMargin(fit, x) * factor;
      const predictedValue = Math.max(0, Math.round(adjusted));
      return {
        date: addDays(lastDate, offset + 1),
        predictedValue,
        confidenceLow: Math.max(0, Math.round(adjusted - margin)),
        confidenceHigh: Math.max(predictedValue, Math.round(adjusted + margin)),
        modelType: 'seasonal_linear',
      };
    });

    const currentAvg = mean(sessions.slice(-WEEK));
    const hasMonth = points.length >= RETURNED_POINTS;
    const forecastAvg = hasMonth ? mean(points.slice(0, RETURNED_POINTS).map(point => point.predictedValue)) : 0;
    const growthRate = hasMonth && currentAvg !== 0 ? ((forecastAvg - currentAvg) / currentAvg) * 100 : 0;

    logger.debug('Traffic forecast generated', { clientId, seasonality: pattern !== null, horizon: daysAhead });

    return Result.ok<TrafficForecast>({
      model: 'seasonal_linear',
      currentDailyAvg: Math.round(currentAvg),
      forecastedDailyAvg30d: Math.round(forecastAvg),
      expectedGrowthRate: round(growthRate),
      trend: slopeTrend(fit.slope),
      seasonalityDetected: pattern !== null,
      seasonalFactors: factors.map(factor => round(factor, 3)),
      forecasts: points.slice(0, RETURNED_POINTS),
      totalForecasts: points.length,
    });
  }

  /**
   * Linear forecast for every metric the client tracks plus the traffic
   * forecast. A repository failure is recorded against its own entry.
   */
  async forecastAllMetrics(clientId: number, daysAhead: number = this.defaultHorizonDays): Promise<ClientForecastBatch> {
    const names = metricNames(await this.repository.getMetrics(clientId));

    const metrics: Record<string, Result<LinearForecast>> = {};
    for (const name of names) {
      metrics[name] = await this.captureUpstream(() => this.forecastLinear(clientId, name, daysAhead));
    }
    const traffic = await this.captureUpstream(() => this.forecastTraffic(clientId, daysAhead));

    logger.info('Client forecasts generated', { clientId, metrics: names.length });

    return {
      clientId,
      metrics,
      traffic,
      totalMetrics: names.length,
      generatedAt: toIsoDate(this.now()),
    };
  }

  private async captureUpstream<T>(run: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
      return await run();
    } catch (error) {
      logger.warn('Forecast entry failed', { error: errorMessage(error) });
      return Result.fail('UPSTREAM_FAILURE', errorMessage(error), error);
    }
  }

  private linearPoint(fit: LinearFit, x: number, date: string): ForecastPoint {
    const predicted = predictAt(fit, x);
    const margin = predictionMargin(fit, x);
    const predictedValue = Math.max(0, round(predicted));
    return {
      date,
      predictedValue,
      confidenceLow: Math.max(0, round(predicted - margin)),
      confidenceHigh: Math.max(predictedValue, round(predicted + margin)),
      modelType: 'linear',
    };
  }
}
