/**
 * Engine configuration for seo-analytics-engine.
 * Thin layer over platform-core's environment helpers.
 */

import { z } from 'zod';
import { getConfig, getOptionalConfig, type EnvSource } from '@seo-insights/platform-core';
import { AnalyticsError } from '../application/errors';

export { createLogger, getLogger } from '@seo-insights/platform-core';

export const ENGINE_NAME = 'seo-analytics-engine';

const EngineConfigSchema = z.object({
  anomaly: z.object({
    zScoreThreshold: z.number().finite().positive(),
    percentChangeThreshold: z.number().finite().positive(),
    positionThreshold: z.number().finite().nonnegative(),
  }),
  forecast: z.object({
    defaultHorizonDays: z.number().int().positive().max(365),
  }),
  databaseUrl: z.string().url().optional(),
});

export type AnalyticsEngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: AnalyticsEngineConfig = {
  anomaly: {
    zScoreThreshold: 2.5,
    percentChangeThreshold: 30,
    positionThreshold: 5,
  },
  forecast: {
    defaultHorizonDays: 90,
  },
};

/**
 * Build the engine configuration from environment variables.
 * @throws {AnalyticsError} INVALID_CONFIGURATION when a value is out of range or unparseable
 */
export function loadEngineConfig(env: EnvSource = process.env): AnalyticsEngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  const parsed = EngineConfigSchema.safeParse({
    anomaly: {
      zScoreThreshold: getConfig('ANOMALY_Z_SCORE_THRESHOLD', defaults.anomaly.zScoreThreshold, env),
      percentChangeThreshold: getConfig(
        'ANOMALY_PERCENT_CHANGE_THRESHOLD',
        defaults.anomaly.percentChangeThreshold,
        env
      ),
      positionThreshold: getConfig('RANKING_DROP_POSITION_THRESHOLD', defaults.anomaly.positionThreshold, env),
    },
    forecast: {
      defaultHorizonDays: getConfig('FORECAST_DEFAULT_HORIZON_DAYS', defaults.forecast.defaultHorizonDays, env),
    },
    databaseUrl: getOptionalConfig('DATABASE_URL', env),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw AnalyticsError.invalidConfiguration(issues);
  }

  return parsed.data;
}
