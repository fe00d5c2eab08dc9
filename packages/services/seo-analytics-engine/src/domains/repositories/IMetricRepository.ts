/**
 * Repository Interface for the analytics engine
 * Data access contract the engines query; storage is the implementer's concern.
 */

import type {
  ClientRecord,
  KeywordObservation,
  MetricSample,
  ReportSnapshot,
  TrafficSample,
} from '@seo-insights/shared-contracts';
import type { AnomalyRecord, StoredAnomaly } from '../entities/Anomaly';
import type { ForecastPoint } from '../entities/Forecast';

export interface MetricQuery {
  readonly metricName?: string;
  /** Inclusive YYYY-MM-DD bounds */
  readonly startDate?: string;
  readonly endDate?: string;
}

export interface IMetricRepository {
  /** Newest first */
  getMetrics(clientId: number, query?: MetricQuery): Promise<MetricSample[]>;
  /** Oldest first, last `months` calendar months */
  getMetricTrend(clientId: number, metricName: string, months: number): Promise<MetricSample[]>;
  /** Oldest first, one aggregated sample per date */
  getTrafficTrend(clientId: number, days: number): Promise<TrafficSample[]>;
  /** Oldest first */
  getKeywordHistory(clientId: number, keyword: string): Promise<KeywordObservation[]>;
  /** Latest date only, most clicks first */
  getTopKeywords(clientId: number, limit: number): Promise<KeywordObservation[]>;

  saveForecast(clientId: number, metricName: string, points: readonly ForecastPoint[]): Promise<void>;
  saveAnomaly(record: AnomalyRecord): Promise<void>;
  /** Newest first, then largest deviation */
  getRecentAnomalies(clientId: number, days: number): Promise<StoredAnomaly[]>;

  /** Newest first */
  getReports(clientId: number, limit: number): Promise<ReportSnapshot[]>;
  getClient(clientId: number): Promise<ClientRecord | null>;
}
