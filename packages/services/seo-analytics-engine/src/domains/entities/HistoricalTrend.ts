/**
 * Domain Entity: historical comparisons and trend reports
 */

import type { MetricSample, KeywordObservation } from '@seo-insights/shared-contracts';
import type { ChangeDirection, TrendDirection, Volatility } from './Trend';

export interface PeriodComparison {
  metric: string;
  currentValue: number;
  currentDate: string;
  previousValue: number;
  previousDate: string;
  change: number;
  changePercent: number;
  trend: ChangeDirection;
}

export interface YearOverYearComparison {
  metric: string;
  currentAverage: number;
  yearAgoAverage: number;
  change: number;
  changePercent: number;
  trend: ChangeDirection;
}

export interface MetricSummary {
  metric: string;
  periodMonths: number;
  currentValue: number;
  minValue: number;
  maxValue: number;
  averageValue: number;
  stdDeviation: number;
  trendDirection: TrendDirection;
  volatility: Volatility;
  dataPoints: number;
  timeline: MetricSample[];
}

export interface KeywordTrend {
  keyword: string;
  firstTracked: string;
  lastTracked: string;
  currentPosition: number | null;
  bestPosition: number | null;
  worstPosition: number | null;
  averagePosition: number | null;
  /** Positive means the keyword moved up the rankings */
  positionImprovement: number;
  totalClicks: number;
  averageClicks: number;
  trend: TrendDirection;
  history: KeywordObservation[];
}

export type KeywordStatus = 'improved' | 'declined' | 'stable';

export interface KeywordComparison {
  keyword: string;
  currentPosition: number | null;
  previousPosition: number | null;
  /** previous - current; positive means improved */
  positionChange: number;
  currentClicks: number;
  previousClicks: number;
  clicksChange: number;
  status: KeywordStatus;
}

export interface KeywordPeriodComparison {
  periodDays: number;
  totalKeywords: number;
  improved: number;
  declined: number;
  stable: number;
  topWinners: KeywordComparison[];
  topLosers: KeywordComparison[];
  allComparisons: KeywordComparison[];
}

export interface HealthScorePoint {
  date: string;
  score: number;
}

export interface HealthScoreTrend {
  currentScore: number;
  averageScore: number;
  bestScore: number;
  worstScore: number;
  improvement: number;
  trend: TrendDirection;
  /** Newest first */
  history: HealthScorePoint[];
}

export interface MetricImprovement {
  metric: string;
  changePercent: number;
  changeValue: number;
  currentValue: number;
}

export interface ConcerningTrend {
  metric: string;
  trend: TrendDirection;
  volatility: Volatility;
  severity: 'high' | 'medium';
  currentValue: number;
  average: number;
}

export interface TrendReport {
  clientName: string;
  generatedAt: string;
  /** null when the client has no scored reports */
  healthScoreTrend: HealthScoreTrend | null;
  topImprovements: MetricImprovement[];
  concerningTrends: ConcerningTrend[];
  keywordPerformance: {
    improved: number;
    declined: number;
    topWinners: KeywordComparison[];
    topLosers: KeywordComparison[];
  };
  summary: {
    totalMetricsTracked: number;
    positiveTrends: number;
    negativeTrends: number;
    overallHealth: 'improving' | 'declining';
  };
}
