/**
 * seo-analytics-engine
 * Forecasting, anomaly detection, historical trend analysis and
 * recommendation prioritization over SEO performance histories.
 */

export * from './domains/entities';
export type { IMetricRepository, MetricQuery } from './domains/repositories/IMetricRepository';
export * from './application/errors';
export * from './application/services';
export { InMemoryMetricRepository, type StoredForecast } from './infrastructure/repositories/InMemoryMetricRepository';
export {
  PostgresMetricRepository,
  type PostgresMetricRepositoryOptions,
} from './infrastructure/repositories/PostgresMetricRepository';
export * from './infrastructure/ServiceFactory';
export {
  DEFAULT_ENGINE_CONFIG,
  ENGINE_NAME,
  loadEngineConfig,
  type AnalyticsEngineConfig,
} from './config/engine-config';
export type { Clock } from './application/shared';
