import { vi } from 'vitest';
import type { KeywordObservation, MetricSample, TrafficSample } from '@seo-insights/shared-contracts';
import { addDays } from '../../application/shared';

export const CLIENT_ID = 1;
export const TODAY = '2024-06-30';
export const fixedClock = () => new Date(`${TODAY}T12:00:00.000Z`);

/** One sample per day, the last one dated `endDate` */
export function dailyMetrics(metricName: string, values: readonly number[], endDate = TODAY): MetricSample[] {
  return values.map((value, index) => ({
    clientId: CLIENT_ID,
    metricName,
    value,
    date: addDays(endDate, index - values.length + 1),
  }));
}

export function dailyTraffic(sessions: readonly number[], endDate = TODAY): TrafficSample[] {
  return sessions.map((value, index) => ({
    clientId: CLIENT_ID,
    date: addDays(endDate, index - sessions.length + 1),
    sessions: value,
    users: Math.round(value * 0.8),
    pageviews: value * 2,
  }));
}

export function keywordObservation(overrides: Partial<KeywordObservation> = {}): KeywordObservation {
  return {
    clientId: CLIENT_ID,
    keyword: 'buy shoes',
    position: 5,
    impressions: 1000,
    clicks: 50,
    ctr: 5,
    date: TODAY,
    ...overrides,
  };
}

export function createMockRepository() {
  return {
    getMetrics: vi.fn().mockResolvedValue([]),
    getMetricTrend: vi.fn().mockResolvedValue([]),
    getTrafficTrend: vi.fn().mockResolvedValue([]),
    getKeywordHistory: vi.fn().mockResolvedValue([]),
    getTopKeywords: vi.fn().mockResolvedValue([]),
    saveForecast: vi.fn().mockResolvedValue(undefined),
    saveAnomaly: vi.fn().mockResolvedValue(undefined),
    getRecentAnomalies: vi.fn().mockResolvedValue([]),
    getReports: vi.fn().mockResolvedValue([]),
    getClient: vi.fn().mockResolvedValue(null),
  };
}
