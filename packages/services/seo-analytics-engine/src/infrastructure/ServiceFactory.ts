/**
 * seo-analytics-engine - Service Factory (Composition Root)
 * Builds explicit engine instances over a caller-supplied repository.
 */

import { Pool } from 'pg';
import type { IMetricRepository } from '../domains/repositories/IMetricRepository';
import { Forecaster } from '../application/services/Forecaster';
import { AnomalyDetector } from '../application/services/AnomalyDetector';
import { HistoricalAnalyzer } from '../application/services/HistoricalAnalyzer';
import { PrioritizationEngine } from '../application/services/PrioritizationEngine';
import { AnalyticsError } from '../application/errors';
import type { Clock } from '../application/shared';
import { DEFAULT_ENGINE_CONFIG, getLogger, type AnalyticsEngineConfig } from '../config/engine-config';
import { PostgresMetricRepository } from './repositories/PostgresMetricRepository';

const logger = getLogger('seo-analytics-engine:service-factory');

export interface AnalyticsEngines {
  repository: IMetricRepository;
  forecaster: Forecaster;
  anomalyDetector: AnomalyDetector;
  historicalAnalyzer: HistoricalAnalyzer;
  prioritizationEngine: PrioritizationEngine;
}

export interface EngineFactoryOptions {
  now?: Clock;
}

export function createAnalyticsEngines(
  repository: IMetricRepository,
  config: AnalyticsEngineConfig = DEFAULT_ENGINE_CONFIG,
  options: EngineFactoryOptions = {}
): AnalyticsEngines {
  const { now } = options;

  logger.debug('Creating analytics engines', {
    zScoreThreshold: config.anomaly.zScoreThreshold,
    percentChangeThreshold: config.anomaly.percentChangeThreshold,
    positionThreshold: config.anomaly.positionThreshold,
    defaultHorizonDays: config.forecast.defaultHorizonDays,
  });

  return {
    repository,
    forecaster: new Forecaster(repository, { defaultHorizonDays: config.forecast.defaultHorizonDays, now }),
    anomalyDetector: new AnomalyDetector(repository, { ...config.anomaly, now }),
    historicalAnalyzer: new HistoricalAnalyzer(repository, { now }),
    prioritizationEngine: new PrioritizationEngine(),
  };
}

/**
 * Pool-backed repository for the configured database.
 * @throws {AnalyticsError} INVALID_CONFIGURATION when DATABASE_URL is not set
 */
export function createPostgresMetricRepository(
  config: AnalyticsEngineConfig,
  options: EngineFactoryOptions = {}
): PostgresMetricRepository {
  if (!config.databaseUrl) {
    throw AnalyticsError.invalidConfiguration('DATABASE_URL is required for the Postgres repository');
  }
  const pool = new Pool({ connectionString: config.databaseUrl });
  return new PostgresMetricRepository(pool, options);
}
