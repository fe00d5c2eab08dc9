import { describe, it, expect, beforeEach, vi } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
}));

vi.mock('../config/engine-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../config/engine-config')>()),
  getLogger: () => mockLogger,
}));

import { HistoricalAnalyzer } from '../application/services/HistoricalAnalyzer';
import { InMemoryMetricRepository } from '../infrastructure/repositories/InMemoryMetricRepository';
import { CLIENT_ID, TODAY, dailyMetrics, fixedClock, keywordObservation } from './helpers/fixtures';

function sample(metricName: string, date: string, value: number) {
  return { clientId: CLIENT_ID, metricName, date, value };
}

describe('HistoricalAnalyzer', () => {
  let repository: InMemoryMetricRepository;
  let analyzer: HistoricalAnalyzer;

  beforeEach(() => {
    vi.clearAllMocks();
    repository = new InMemoryMetricRepository({ now: fixedClock });
    repository.addClient({ id: CLIENT_ID, name: 'Acme Tyres' });
    analyzer = new HistoricalAnalyzer(repository, { now: fixedClock });
  });

  describe('compareMonthOverMonth', () => {
    it('compares the two latest samples', async () => {
      repository.addMetrics([sample('organic_clicks', '2024-05-01', 200), sample('organic_clicks', '2024-06-01', 250)]);

      const result = await analyzer.compareMonthOverMonth(CLIENT_ID, 'organic_clicks');

      expect(result).toEqual({
        success: true,
        data: {
          metric: 'organic_clicks',
          currentValue: 250,
          currentDate: '2024-06-01',
          previousValue: 200,
          previousDate: '2024-05-01',
          change: 50,
          changePercent: 25,
          trend: 'up',
        },
      });
    });

    it('reports a decline', async () => {
      repository.addMetrics([sample('organic_clicks', '2024-05-01', 250), sample('organic_clicks', '2024-06-01', 200)]);

      const result = await analyzer.compareMonthOverMonth(CLIENT_ID, 'organic_clicks');

      expect(result.success && result.data).toMatchObject({ change: -50, changePercent: -20, trend: 'down' });
    });

    it('needs two samples', async () => {
      repository.addMetrics([sample('organic_clicks', '2024-06-01', 250)]);

      const result = await analyzer.compareMonthOverMonth(CLIENT_ID, 'organic_clicks');

      expect(!result.success && result.error.code).toBe('INSUFFICIENT_DATA');
    });

    it('refuses a zero baseline', async () => {
      repository.addMetrics([sample('conversions', '2024-05-01', 0), sample('conversions', '2024-06-01', 12)]);

      const result = await analyzer.compareMonthOverMonth(CLIENT_ID, 'conversions');

      expect(!result.success && result.error.code).toBe('INSUFFICIENT_DATA');
    });
  });

  describe('compareYearOverYear', () => {
    it('averages the last 30 days against the 30 days ending a year ago', async () => {
      repository.addMetrics([
        sample('sessions', '2024-06-10', 100),
        sample('sessions', '2024-06-20', 120),
        sample('sessions', '2023-06-15', 80),
        sample('sessions', '2023-06-25', 120),
        sample('sessions', '2023-09-01', 1000),
      ]);

      const result = await analyzer.compareYearOverYear(CLIENT_ID, 'sessions');

      expect(result).toEqual({
        success: true,
        data: {
          metric: 'sessions',
          currentAverage: 110,
          yearAgoAverage: 100,
          change: 10,
          changePercent: 10,
          trend: 'up',
        },
      });
    });

    it('fails without a year-ago window', async () => {
      repository.addMetrics([sample('sessions', '2024-06-10', 100)]);

      const result = await analyzer.compareYearOverYear(CLIENT_ID, 'sessions');

      expect(!result.success && result.error.code).toBe('INSUFFICIENT_DATA');
    });
  });

  describe('getMetricSummary', () => {
    it('summarizes the timeline', async () => {
      repository.addMetrics(dailyMetrics('organic_clicks', [100, 110, 120, 130, 140]));

      const result = await analyzer.getMetricSummary(CLIENT_ID, 'organic_clicks');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        metric: 'organic_clicks',
        periodMonths: 6,
        currentValue: 140,
        minValue: 100,
        maxValue: 140,
        averageValue: 120,
        stdDeviation: 15.81,
        trendDirection: 'up',
        volatility: 'medium',
        dataPoints: 5,
      });
      expect(result.data.timeline.map(point => point.value)).toEqual([100, 110, 120, 130, 140]);
    });

    it('fails when the window is empty', async () => {
      repository.addMetrics([sample('organic_clicks', '2023-01-01', 10)]);

      const result = await analyzer.getMetricSummary(CLIENT_ID, 'organic_clicks');

      expect(!result.success && result.error.code).toBe('INSUFFICIENT_DATA');
    });
  });

  describe('analyzeKeywordTrends', () => {
    it('summarizes ranked positions and clicks', async () => {
      const positions = [12, null, 8, 6];
      repository.addKeywords(
        positions.map((position, index) =>
          keywordObservation({ position, clicks: (index + 1) * 10, date: `2024-06-${27 + index}` })
        )
      );

      const result = await analyzer.analyzeKeywordTrends(CLIENT_ID, 'buy shoes');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        keyword: 'buy shoes',
        firstTracked: '2024-06-27',
        lastTracked: TODAY,
        currentPosition: 6,
        bestPosition: 6,
        worstPosition: 12,
        averagePosition: 8.67,
        positionImprovement: 6,
        totalClicks: 100,
        averageClicks: 25,
        trend: 'down',
      });
      expect(result.data.history).toHaveLength(4);
    });

    it('fails for an untracked keyword', async () => {
      const result = await analyzer.analyzeKeywordTrends(CLIENT_ID, 'unknown');

      expect(!result.success && result.error.code).toBe('INSUFFICIENT_DATA');
    });
  });

  describe('compareKeywordPeriods', () => {
    beforeEach(() => {
      repository.addKeywords([
        keywordObservation({ keyword: 'buy shoes', position: 10, clicks: 20, date: '2024-05-20' }),
        keywordObservation({ keyword: 'buy shoes', position: 8, clicks: 25, date: '2024-05-30' }),
        keywordObservation({ keyword: 'buy shoes', position: 4, clicks: 60 }),
        keywordObservation({ keyword: 'shoe store', position: 5, clicks: 40, date: '2024-06-15' }),
        keywordObservation({ keyword: 'shoe store', position: 9, clicks: 30 }),
        keywordObservation({ keyword: 'red shoes', position: 7, clicks: 10, date: '2024-06-01' }),
        keywordObservation({ keyword: 'red shoes', position: 7, clicks: 12 }),
        keywordObservation({ keyword: 'single', position: 3, clicks: 5 }),
      ]);
    });

    it('compares against the latest observation at or before the cutoff', async () => {
      const comparison = await analyzer.compareKeywordPeriods(CLIENT_ID);

      expect(comparison.topWinners).toEqual([
        {
          keyword: 'buy shoes',
          currentPosition: 4,
          previousPosition: 8,
          positionChange: 4,
          currentClicks: 60,
          previousClicks: 25,
          clicksChange: 35,
          status: 'improved',
        },
      ]);
    });

    it('falls back to the earliest observation and ranks by impact', async () => {
      const comparison = await analyzer.compareKeywordPeriods(CLIENT_ID);

      expect(comparison).toMatchObject({ periodDays: 30, totalKeywords: 3, improved: 1, declined: 1, stable: 1 });
      expect(comparison.allComparisons.map(entry => entry.keyword)).toEqual(['buy shoes', 'red shoes', 'shoe store']);
      expect(comparison.topLosers[0]).toMatchObject({
        keyword: 'shoe store',
        previousPosition: 5,
        positionChange: -4,
        clicksChange: -10,
        status: 'declined',
      });
    });
  });

  describe('calculateHealthScoreTrend', () => {
    it('skips unscored reports and reads the trend oldest first', async () => {
      repository.addReport(CLIENT_ID, { reportDate: '2024-03-01', healthScore: 60 });
      repository.addReport(CLIENT_ID, { reportDate: '2024-04-01', healthScore: null });
      repository.addReport(CLIENT_ID, { reportDate: '2024-05-01', healthScore: 70 });
      repository.addReport(CLIENT_ID, { reportDate: '2024-06-01', healthScore: 80 });

      const result = await analyzer.calculateHealthScoreTrend(CLIENT_ID);

      expect(result).toEqual({
        success: true,
        data: {
          currentScore: 80,
          averageScore: 70,
          bestScore: 80,
          worstScore: 60,
          improvement: 20,
          trend: 'up',
          history: [
            { date: '2024-06-01', score: 80 },
            { date: '2024-05-01', score: 70 },
            { date: '2024-03-01', score: 60 },
          ],
        },
      });
    });

    it('fails without any scored report', async () => {
      repository.addReport(CLIENT_ID, { reportDate: '2024-06-01', healthScore: null });

      const result = await analyzer.calculateHealthScoreTrend(CLIENT_ID);

      expect(result).toEqual({
        success: false,
        error: { code: 'INSUFFICIENT_DATA', message: 'No health score data available' },
      });
    });
  });

  describe('identifyTopImprovements', () => {
    beforeEach(() => {
      repository.addMetrics([
        sample('organic_clicks', '2024-05-01', 200),
        sample('organic_clicks', '2024-06-01', 250),
        sample('bounce_rate', '2024-05-01', 50),
        sample('bounce_rate', '2024-06-01', 40),
        sample('conversions', '2024-05-01', 10),
        sample('conversions', '2024-06-01', 10),
        sample('impressions', '2024-06-01', 9000),
      ]);
    });

    it('orders metrics by absolute change and drops unchanged ones', async () => {
      await expect(analyzer.identifyTopImprovements(CLIENT_ID)).resolves.toEqual([
        { metric: 'organic_clicks', changePercent: 25, changeValue: 50, currentValue: 250 },
        { metric: 'bounce_rate', changePercent: -20, changeValue: -10, currentValue: 40 },
      ]);
    });

    it('honours the limit', async () => {
      const improvements = await analyzer.identifyTopImprovements(CLIENT_ID, 1);

      expect(improvements.map(entry => entry.metric)).toEqual(['organic_clicks']);
    });
  });

  describe('identifyConcerningTrends', () => {
    it('lists declining metrics with volatile ones first', async () => {
      repository.addMetrics([
        ...dailyMetrics('organic_clicks', [200, 180, 160, 140, 120]),
        ...dailyMetrics('conversions', [100, 20, 80, 10, 5]),
        ...dailyMetrics('sessions', [100, 110, 120, 130, 140]),
      ]);

      await expect(analyzer.identifyConcerningTrends(CLIENT_ID)).resolves.toEqual([
        { metric: 'conversions', trend: 'down', volatility: 'high', severity: 'high', currentValue: 5, average: 43 },
        {
          metric: 'organic_clicks',
          trend: 'down',
          volatility: 'medium',
          severity: 'medium',
          currentValue: 120,
          average: 160,
        },
      ]);
    });
  });

  describe('generateTrendReport', () => {
    it('fails for an unknown client', async () => {
      const result = await analyzer.generateTrendReport(42);

      expect(result).toEqual({ success: false, error: { code: 'INVALID_INPUT', message: 'Client not found: 42' } });
    });

    it('assembles every section', async () => {
      repository.addMetrics([
        sample('organic_clicks', '2024-05-01', 200),
        sample('organic_clicks', '2024-06-01', 250),
        ...dailyMetrics('bounce_rate', [50, 45, 40, 35, 30]),
      ]);
      repository.addReport(CLIENT_ID, { reportDate: '2024-06-01', healthScore: 80 });

      const result = await analyzer.generateTrendReport(CLIENT_ID);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const report = result.data;
      expect(report.clientName).toBe('Acme Tyres');
      expect(report.generatedAt).toBe('2024-06-30T12:00:00.000Z');
      expect(report.healthScoreTrend?.currentScore).toBe(80);
      expect(report.topImprovements.map(entry => [entry.metric, entry.changePercent])).toEqual([
        ['organic_clicks', 25],
        ['bounce_rate', -14.29],
      ]);
      expect(report.concerningTrends.map(entry => entry.metric)).toEqual(['bounce_rate']);
      expect(report.keywordPerformance).toEqual({ improved: 0, declined: 0, topWinners: [], topLosers: [] });
      expect(report.summary).toEqual({
        totalMetricsTracked: 3,
        positiveTrends: 1,
        negativeTrends: 1,
        overallHealth: 'improving',
      });
    });

    it('leaves the health section empty without scored reports', async () => {
      const result = await analyzer.generateTrendReport(CLIENT_ID);

      expect(result.success && result.data.healthScoreTrend).toBeNull();
      expect(result.success && result.data.summary.overallHealth).toBe('declining');
    });
  });
});
