/**
 * Domain Entity: Anomaly
 * Statistically unusual points and structural keyword issues.
 */

import type { Severity } from './Trend';

export type AnomalyType = 'spike' | 'drop';

/** Row written to the audit trail for every flagged point */
export interface AnomalyRecord {
  readonly clientId: number;
  readonly metricName: string;
  readonly date: string;
  readonly expectedValue: number;
  readonly actualValue: number;
  readonly severity: Severity;
}

export interface StoredAnomaly extends AnomalyRecord {
  readonly id: number;
  readonly deviationPercent: number;
  readonly detectedAt: string;
}

export interface MetricAnomaly {
  kind: 'metric_anomaly';
  date: string;
  metric: string;
  actualValue: number;
  expectedValue: number;
  deviationPercent: number;
  /** Present for z-score detections, absent for EMA drift detections */
  zScore?: number;
  type: AnomalyType;
  severity: Severity;
}

export interface RankingDrop {
  kind: 'ranking_drop';
  keyword: string;
  currentPosition: number | null;
  previousPosition: number | null;
  positionDrop: number;
  clicksLost: number;
  severity: 'critical' | 'high';
  detectedAt: string;
}

export interface CompetingUrl {
  url: string;
  position: number | null;
  clicks: number;
}

export interface CannibalizationIssue {
  keyword: string;
  competingUrls: number;
  bestPosition: number | null;
  worstPosition: number | null;
  urls: CompetingUrl[];
  severity: 'high' | 'medium';
}

export type ScanIssue = MetricAnomaly | RankingDrop;

export interface AnomalyScanSummary {
  totalAnomalies: number;
  rankingDrops: number;
  cannibalizationIssues: number;
  criticalCount: number;
  highCount: number;
  mediumCount: number;
}

export interface AnomalyScanResult {
  clientName: string;
  scanDate: string;
  summary: AnomalyScanSummary;
  criticalIssues: ScanIssue[];
  highPriority: ScanIssue[];
  mediumPriority: ScanIssue[];
  /** First 10 by drop magnitude */
  rankingDrops: RankingDrop[];
  /** First 5 issues */
  cannibalization: CannibalizationIssue[];
  recentAnomalies: StoredAnomaly[];
  recommendations: string[];
}

export type AlertType = 'critical_anomaly' | 'ranking_drop' | 'cannibalization';

export type AlertAction =
  | 'immediate_investigation_required'
  | 'review_page_and_competitors'
  | 'consolidate_or_differentiate_content';

export interface Alert {
  type: AlertType;
  title: string;
  message: string;
  action: AlertAction;
  priority: 1 | 2 | 3;
}
