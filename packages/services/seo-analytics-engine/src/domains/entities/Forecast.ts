/**
 * Domain Entity: Forecast
 * Derived, recomputable projections. Persisted only for the audit trail.
 */

import type { Result } from '@seo-insights/shared-contracts';
import type { ChangeDirection, SlopeTrend } from './Trend';

export type ForecastModelType = 'linear' | 'moving_average' | 'seasonal_linear';

export type ForecastConfidence = 'high' | 'medium' | 'low';

export interface ForecastPoint {
  readonly date: string;
  readonly predictedValue: number;
  readonly confidenceLow: number;
  readonly confidenceHigh: number;
  readonly modelType: ForecastModelType;
}

export interface LinearForecast {
  metric: string;
  model: 'linear_regression';
  rSquared: number;
  confidence: ForecastConfidence;
  slope: number;
  trend: SlopeTrend;
  /** First 30 projected days */
  forecasts: ForecastPoint[];
  totalForecasts: number;
}

export interface MovingAverageForecast {
  metric: string;
  model: 'moving_average';
  windowSize: number;
  baselineValue: number;
  forecasts: ForecastPoint[];
}

export interface KeywordPositionPoint {
  readonly date: string;
  readonly predictedPosition: number;
  readonly confidence: ForecastConfidence;
}

export interface KeywordPositionForecast {
  keyword: string;
  currentPosition: number;
  dailyChange: number;
  /** null when the horizon is shorter than 30 days */
  forecastedPosition30d: number | null;
  expectedChange: number;
  /** Direction of the raw position number; 'up' means the rank number grew */
  trend: ChangeDirection;
  forecasts: KeywordPositionPoint[];
}

export interface TrafficForecast {
  model: 'seasonal_linear';
  currentDailyAvg: number;
  forecastedDailyAvg30d: number;
  expectedGrowthRate: number;
  trend: SlopeTrend;
  seasonalityDetected: boolean;
  /** Multiplier per `index mod 7`; all 1.0 when seasonality was skipped */
  seasonalFactors: number[];
  forecasts: ForecastPoint[];
  totalForecasts: number;
}

export interface ClientForecastBatch {
  clientId: number;
  metrics: Record<string, Result<LinearForecast>>;
  traffic: Result<TrafficForecast>;
  totalMetrics: number;
  generatedAt: string;
}
