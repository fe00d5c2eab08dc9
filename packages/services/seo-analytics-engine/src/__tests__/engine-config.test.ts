import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from '../config/engine-config';
import { AnalyticsError } from '../application/errors';

describe('loadEngineConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('reads thresholds and the database url', () => {
    const config = loadEngineConfig({
      ANOMALY_Z_SCORE_THRESHOLD: '3',
      ANOMALY_PERCENT_CHANGE_THRESHOLD: '25.5',
      RANKING_DROP_POSITION_THRESHOLD: '8',
      FORECAST_DEFAULT_HORIZON_DAYS: '30',
      DATABASE_URL: 'postgres://localhost:5432/seo_test',
    });

    expect(config).toEqual({
      anomaly: { zScoreThreshold: 3, percentChangeThreshold: 25.5, positionThreshold: 8 },
      forecast: { defaultHorizonDays: 30 },
      databaseUrl: 'postgres://localhost:5432/seo_test',
    });
  });

  it('rejects unparseable numbers', () => {
    expect(() => loadEngineConfig({ ANOMALY_Z_SCORE_THRESHOLD: 'abc' })).toThrow(AnalyticsError);
    expect(() => loadEngineConfig({ ANOMALY_Z_SCORE_THRESHOLD: 'abc' })).toThrow(/anomaly\.zScoreThreshold/);
  });

  it('rejects a horizon beyond a year', () => {
    expect(() => loadEngineConfig({ FORECAST_DEFAULT_HORIZON_DAYS: '400' })).toThrow(/forecast\.defaultHorizonDays/);
  });
});
