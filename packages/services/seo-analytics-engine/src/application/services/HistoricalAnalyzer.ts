/**
 * Historical Analyzer
 * Period comparisons, metric and keyword trend summaries, and the trend
 * report composed from them.
 */

import { Result } from '@seo-insights/shared-contracts';
import type { IMetricRepository } from '../../domains/repositories/IMetricRepository';
import type {
  ChangeDirection,
  ConcerningTrend,
  HealthScorePoint,
  HealthScoreTrend,
  KeywordComparison,
  KeywordPeriodComparison,
  KeywordTrend,
  MetricImprovement,
  MetricSummary,
  PeriodComparison,
  TrendReport,
  YearOverYearComparison,
} from '../../domains/entities';
import { getLogger } from '../../config/engine-config';
import {
  classifyVolatility,
  distinct,
  mean,
  metricNames,
  percentChange,
  round,
  sampleStdev,
  subtractDays,
  sum,
  systemClock,
  toIsoDate,
  trendDirection,
  type Clock,
} from '../shared';

const logger = getLogger('seo-analytics-engine-historicalanalyzer');

const COMPARISON_WINDOW_DAYS = 30;
const DAYS_PER_YEAR = 365;
const KEYWORD_COMPARISON_LIMIT = 100;
const TOP_MOVERS = 10;
const CONCERN_WINDOW_MONTHS = 3;

export interface HistoricalAnalyzerOptions {
  now?: Clock;
}

function changeDirection(change: number): ChangeDirection {
  if (change > 0) return 'up';
  if (change < 0) return 'down';
  return 'flat';
}

export class HistoricalAnalyzer {
  private readonly now: Clock;

  constructor(
    private readonly repository: IMetricRepository,
    options: HistoricalAnalyzerOptions = {}
  ) {
    this.now = options.now ?? systemClock;
  }

  /** Latest sample against the one before it */
  async compareMonthOverMonth(clientId: number, metricName: string): Promise<Result<PeriodComparison>> {
    const samples = await this.repository.getMetrics(clientId, { metricName });
    if (samples.length < 2) {
      return Result.fail('INSUFFICIENT_DATA', `Need two samples of ${metricName} to compare, found ${samples.length}`);
    }

    const [current, previous] = samples;
    if (previous.value === 0) {
      return Result.fail('INSUFFICIENT_DATA', `Previous ${metricName} value is 0; percent change is undefined`);
    }

    const change = current.value - previous.value;
    return Result.ok<PeriodComparison>({
      metric: metricName,
      currentValue: current.value,
      currentDate: current.date,
      previousValue: previous.value,
      previousDate: previous.date,
      change: round(change),
      changePercent: round(percentChange(current.value, previous.value)),
      trend: changeDirection(change),
    });
  }

  /** Average of the last 30 days against the 30 days ending a year ago */
  async compareYearOverYear(clientId: number, metricName: string): Promise<Result<YearOverYearComparison>> {
    const today = this.today();
    const yearAgo = subtractDays(today, DAYS_PER_YEAR);

    const current = await this.repository.getMetrics(clientId, {
      metricName,
      startDate: subtractDays(today, COMPARISON_WINDOW_DAYS),
    });
    const previous = await this.repository.getMetrics(clientId, {
      metricName,
      startDate: subtractDays(yearAgo, COMPARISON_WINDOW_DAYS),
      endDate: yearAgo,
    });

    if (current.length === 0 || previous.length === 0) {
      return Result.fail('INSUFFICIENT_DATA', `No year-ago window of ${metricName} to compare against`);
    }

    const currentAvg = mean(current.map(sample => sample.value));
    const previousAvg = mean(previous.map(sample => sample.value));
    if (previousAvg === 0) {
      return Result.fail('INSUFFICIENT_DATA', `Year-ago ${metricName} average is 0; percent change is undefined`);
    }

    const change = currentAvg - previousAvg;
    return Result.ok<YearOverYearComparison>({
      metric: metricName,
      currentAverage: round(currentAvg),
      yearAgoAverage: round(previousAvg),
      change: round(change),
      changePercent: round(percentChange(currentAvg, previousAvg)),
      trend: changeDirection(change),
    });
  }

  async getMetricSummary(clientId: number, metricName: string, months = 6): Promise<Result<MetricSummary>> {
    const timeline = await this.repository.getMetricTrend(clientId, metricName, months);
    if (timeline.length === 0) {
      return Result.fail('INSUFFICIENT_DATA', `No ${metricName} samples in the last ${months} months`);
    }

    const values = timeline.map(sample => sample.value);
    return Result.ok<MetricSummary>({
      metric: metricName,
      periodMonths: months,
      currentValue: values[values.length - 1],
      minValue: Math.min(...values),
      maxValue: Math.max(...values),
      averageValue: round(mean(values)),
      stdDeviation: round(sampleStdev(values)),
      trendDirection: trendDirection(values),
      volatility: classifyVolatility(values),
      dataPoints: values.length,
      timeline,
    });
  }

  async analyzeKeywordTrends(clientId: number, keyword: string): Promise<Result<KeywordTrend>> {
    const history = await this.repository.getKeywordHistory(clientId, keyword);
    if (history.length === 0) {
      return Result.fail('INSUFFICIENT_DATA', `No history for keyword "${keyword}"`);
    }

    const positions = history.flatMap(observation => (observation.position === null ? [] : [observation.position]));
    const clicks = history.map(observation => observation.clicks);
    const hasPositions = positions.length > 0;

    return Result.ok<KeywordTrend>({
      keyword,
      firstTracked: history[0].date,
      lastTracked: history[history.length - 1].date,
      currentPosition: history[history.length - 1].position,
      bestPosition: hasPositions ? Math.min(...positions) : null,
      worstPosition: hasPositions ? Math.max(...positions) : null,
      averagePosition: hasPositions ? round(mean(positions)) : null,
      positionImprovement: positions.length > 1 ? round(positions[0] - positions[positions.length - 1], 1) : 0,
      totalClicks: sum(clicks),
      averageClicks: round(mean(clicks)),
      trend: trendDirection(positions),
      history,
    });
  }

  /**
   * Latest observation of each top keyword against the latest one at or
   * before the cutoff. Keywords with no observation before the cutoff are
   * compared against their earliest observation.
   */
  async compareKeywordPeriods(clientId: number, daysBack = 30): Promise<KeywordPeriodComparison> {
    const cutoff = subtractDays(this.today(), daysBack);
    const topKeywords = await this.repository.getTopKeywords(clientId, KEYWORD_COMPARISON_LIMIT);

    const comparisons: KeywordComparison[] = [];
    for (const keyword of distinct(topKeywords.map(observation => observation.keyword))) {
      const history = await this.repository.getKeywordHistory(clientId, keyword);
      if (history.length < 2) continue;

      const current = history[history.length - 1];
      const previous = history.slice(0, -1).reverse().find(observation => observation.date <= cutoff) ?? history[0];

      const positionChange = round((previous.position ?? 0) - (current.position ?? 0), 1);
      comparisons.push({
        keyword,
        currentPosition: current.position,
        previousPosition: previous.position,
        positionChange,
        currentClicks: current.clicks,
        previousClicks: previous.clicks,
        clicksChange: current.clicks - previous.clicks,
        status: positionChange > 0 ? 'improved' : positionChange < 0 ? 'declined' : 'stable',
      });
    }

    const impact = (comparison: KeywordComparison) => comparison.positionChange * 10 + comparison.clicksChange;
    comparisons.sort((a, b) => impact(b) - impact(a));

    const winners = comparisons.filter(comparison => comparison.status === 'improved');
    const losers = comparisons.filter(comparison => comparison.status === 'declined');

    return {
      periodDays: daysBack,
      totalKeywords: comparisons.length,
      improved: winners.length,
      declined: losers.length,
      stable: comparisons.length - winners.length - losers.length,
      topWinners: winners.slice(0, TOP_MOVERS),
      topLosers: losers.slice(0, TOP_MOVERS),
      allComparisons: comparisons,
    };
  }

  /** Health scores of the last `months` reports; unscored reports are skipped */
  async calculateHealthScoreTrend(clientId: number, months = 6): Promise<Result<HealthScoreTrend>> {
    const reports = await this.repository.getReports(clientId, months);
    const history: HealthScorePoint[] = reports.flatMap(report =>
      report.healthScore === null ? [] : [{ date: report.reportDate, score: report.healthScore }]
    );

    if (history.length === 0) {
      return Result.fail('INSUFFICIENT_DATA', 'No health score data available');
    }

    const scores = history.map(point => point.score);
    const newest = scores[0];
    const oldest = scores[scores.length - 1];

    return Result.ok<HealthScoreTrend>({
      currentScore: newest,
      averageScore: round(mean(scores)),
      bestScore: Math.max(...scores),
      worstScore: Math.min(...scores),
      improvement: scores.length > 1 ? round(newest - oldest) : 0,
      trend: trendDirection([...scores].reverse()),
      history,
    });
  }

  /** Metrics with the largest absolute month-over-month change */
  async identifyTopImprovements(clientId: number, limit = 10): Promise<MetricImprovement[]> {
    const names = metricNames(await this.repository.getMetrics(clientId));

    const improvements: MetricImprovement[] = [];
    for (const name of names) {
      const comparison = await this.compareMonthOverMonth(clientId, name);
      if (!comparison.success || comparison.data.changePercent === 0) continue;

      improvements.push({
        metric: name,
        changePercent: comparison.data.changePercent,
        changeValue: comparison.data.change,
        currentValue: comparison.data.currentValue,
      });
    }

    improvements.sort((a, b) => Math.abs(b.changePercent) - Math.abs(a.changePercent));
    return improvements.slice(0, limit);
  }

  /** Metrics trending down over the last three months, high volatility first */
  async identifyConcerningTrends(clientId: number): Promise<ConcerningTrend[]> {
    const names = metricNames(await this.repository.getMetrics(clientId));

    const concerns: ConcerningTrend[] = [];
    for (const name of names) {
      const summary = await this.getMetricSummary(clientId, name, CONCERN_WINDOW_MONTHS);
      if (!summary.success || summary.data.trendDirection !== 'down') continue;

      concerns.push({
        metric: name,
        trend: summary.data.trendDirection,
        volatility: summary.data.volatility,
        severity: summary.data.volatility === 'high' ? 'high' : 'medium',
        currentValue: summary.data.currentValue,
        average: summary.data.averageValue,
      });
    }

    return concerns.sort((a, b) => Number(b.severity === 'high') - Number(a.severity === 'high'));
  }

  async generateTrendReport(clientId: number): Promise<Result<TrendReport>> {
    const client = await this.repository.getClient(clientId);
    if (!client) {
      return Result.fail('INVALID_INPUT', `Client not found: ${clientId}`);
    }

    const healthTrend = await this.calculateHealthScoreTrend(clientId);
    const improvements = await this.identifyTopImprovements(clientId);
    const concerns = await this.identifyConcerningTrends(clientId);
    const keywords = await this.compareKeywordPeriods(clientId);

    logger.debug('Trend report assembled', {
      clientId,
      improvements: improvements.length,
      concerns: concerns.length,
      keywords: keywords.totalKeywords,
    });

    return Result.ok<TrendReport>({
      clientName: client.name,
      generatedAt: this.now().toISOString(),
      healthScoreTrend: healthTrend.success ? healthTrend.data : null,
      topImprovements: improvements,
      concerningTrends: concerns,
      keywordPerformance: {
        improved: keywords.improved,
        declined: keywords.declined,
        topWinners: keywords.topWinners,
        topLosers: keywords.topLosers,
      },
      summary: {
        totalMetricsTracked: improvements.length + concerns.length,
        positiveTrends: improvements.filter(improvement => improvement.changePercent > 0).length,
        negativeTrends: concerns.length,
        overallHealth: improvements.length > concerns.length ? 'improving' : 'declining',
      },
    });
  }

  private today(): string {
    return toIsoDate(this.now());
  }
}
