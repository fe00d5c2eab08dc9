/**
 * Anomaly Detector
 * Z-score scan over metric histories, EMA drift scan over traffic, ranking
 * drops and keyword cannibalization, rolled up into a scan result and alerts.
 */

import { Result } from '@seo-insights/shared-contracts';
import type { IMetricRepository } from '../../domains/repositories/IMetricRepository';
import type {
  Alert,
  AnomalyRecord,
  AnomalyScanResult,
  CannibalizationIssue,
  CompetingUrl,
  MetricAnomaly,
  RankingDrop,
  ScanIssue,
  Severity,
} from '../../domains/entities';
import { getLogger } from '../../config/engine-config';
import {
  mean,
  metricNames,
  populationStdev,
  round,
  sortByDateAscending,
  subtractDays,
  systemClock,
  toIsoDate,
  type Clock,
} from '../shared';

const logger = getLogger('seo-analytics-engine-anomalydetector');

const MIN_SCAN_POINTS = 7;
const BASELINE_WINDOW = 7;
const EMA_ALPHA = 0.3;
const RANKING_SCAN_LIMIT = 100;
const CANNIBALIZATION_SCAN_LIMIT = 200;
const SCANNED_METRICS_LIMIT = 10;
const RECENT_ANOMALY_DAYS = 7;

export const TRAFFIC_SESSIONS_METRIC = 'traffic_sessions';

export const ANOMALY_RECOMMENDATIONS = {
  critical:
    'URGENT: Investigate critical anomalies immediately and check for technical issues or data collection problems',
  rankingDrops: 'Review pages with ranking drops for content quality and competitor changes',
  cannibalization: 'Address keyword cannibalization by consolidating similar pages or differentiating their focus',
  manyHigh: 'Multiple high-priority issues detected; prioritize investigation and allocate resources accordingly',
  allClear: 'No critical issues detected; continue monitoring trends',
} as const;

export interface AnomalyDetectorOptions {
  zScoreThreshold?: number;
  percentChangeThreshold?: number;
  positionThreshold?: number;
  now?: Clock;
}

export function severityForDeviation(deviationPercent: number): Severity {
  if (deviationPercent > 50) return 'critical';
  if (deviationPercent > 30) return 'high';
  if (deviationPercent > 15) return 'medium';
  return 'low';
}

function comparePositions(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

export class AnomalyDetector {
  private readonly zScoreThreshold: number;
  private readonly percentChangeThreshold: number;
  private readonly positionThreshold: number;
  private readonly now: Clock;

  constructor(
    private readonly repository: IMetricRepository,
    options: AnomalyDetectorOptions = {}
  ) {
    this.zScoreThreshold = options.zScoreThreshold ?? 2.5;
    this.percentChangeThreshold = options.percentChangeThreshold ?? 30;
    this.positionThreshold = options.positionThreshold ?? 5;
    this.now = options.now ?? systemClock;
  }

  /**
   * Flags points whose z-score against the whole window exceeds the threshold.
   * The expected value is the mean of the seven preceding points.
   */
  async detectMetricAnomalies(clientId: number, metricName: string, days = 90): Promise<MetricAnomaly[]> {
    const samples = sortByDateAscending(
      await this.repository.getMetrics(clientId, {
        metricName,
        startDate: subtractDays(this.today(), days),
      })
    );
    if (samples.length < MIN_SCAN_POINTS) return [];

    const values = samples.map(sample => sample.value);
    const avg = mean(values);
    const std = populationStdev(values);
    if (std === 0) return [];

    const anomalies: MetricAnomaly[] = [];
    const records: AnomalyRecord[] = [];
    for (const [index, sample] of samples.entries()) {
      const zScore = Math.abs((sample.value - avg) / std);
      if (zScore <= this.zScoreThreshold) continue;

      const expected = index >= BASELINE_WINDOW ? mean(values.slice(index - BASELINE_WINDOW, index)) : avg;
      const deviation = expected !== 0 ? ((sample.value - expected) / expected) * 100 : 0;
      const severity = severityForDeviation(Math.abs(deviation));

      anomalies.push({
        kind: 'metric_anomaly',
        date: sample.date,
        metric: metricName,
        actualValue: sample.value,
        expectedValue: round(expected),
        deviationPercent: round(deviation),
        zScore: round(zScore),
        type: sample.value > expected ? 'spike' : 'drop',
        severity,
      });
      records.push({
        clientId,
        metricName,
        date: sample.date,
        expectedValue: expected,
        actualValue: sample.value,
        severity,
      });
    }

    await this.persist(records);
    return anomalies;
  }

  /**
   * Compares each day's sessions with an exponential moving average of the
   * days before it.
   */
  async detectTrafficAnomalies(clientId: number, days = 30): Promise<MetricAnomaly[]> {
    const traffic = await this.repository.getTrafficTrend(clientId, days);
    if (traffic.length < MIN_SCAN_POINTS) return [];

    const anomalies: MetricAnomaly[] = [];
    const records: AnomalyRecord[] = [];
    let ema = traffic[0].sessions;

    for (let i = 1; i < traffic.length; i++) {
      ema = EMA_ALPHA * traffic[i - 1].sessions + (1 - EMA_ALPHA) * ema;
      const actual = traffic[i].sessions;
      const percentDiff = ema !== 0 ? ((actual - ema) / ema) * 100 : 0;

      if (Math.abs(percentDiff) > this.percentChangeThreshold) {
        const severity = severityForDeviation(Math.abs(percentDiff));
        anomalies.push({
          kind: 'metric_anomaly',
          date: traffic[i].date,
          metric: TRAFFIC_SESSIONS_METRIC,
          actualValue: actual,
          expectedValue: Math.round(ema),
          deviationPercent: round(percentDiff),
          type: percentDiff > 0 ? 'spike' : 'drop',
          severity,
        });
        // audit rows keep the unrounded baseline
        records.push({
          clientId,
          metricName: TRAFFIC_SESSIONS_METRIC,
          date: traffic[i].date,
          expectedValue: ema,
          actualValue: actual,
          severity,
        });
      }
    }

    await this.persist(records);
    return anomalies;
  }

  /**
   * Top keywords whose recorded position change is worse than the threshold,
   * largest drop first.
   */
  async detectRankingDrops(clientId: number, positionThreshold: number = this.positionThreshold): Promise<RankingDrop[]> {
    const keywords = await this.repository.getTopKeywords(clientId, RANKING_SCAN_LIMIT);
    const detectedAt = this.today();
    const drops: RankingDrop[] = [];

    for (const keyword of keywords) {
      const change = keyword.positionChange;
      if (change === null || change === undefined || change >= -positionThreshold) continue;

      const history = await this.repository.getKeywordHistory(clientId, keyword.keyword);
      if (history.length < 2) continue;

      const current = history[history.length - 1];
      const previous = history[history.length - 2];

      drops.push({
        kind: 'ranking_drop',
        keyword: keyword.keyword,
        currentPosition: current.position,
        previousPosition: previous.position,
        positionDrop: Math.abs(change),
        clicksLost: previous.clicks - current.clicks,
        severity: Math.abs(change) > 10 ? 'critical' : 'high',
        detectedAt,
      });
    }

    return drops.sort((a, b) => b.positionDrop - a.positionDrop);
  }

  /**
   * Keywords for which more than one distinct URL ranks on the latest date.
   */
  async detectKeywordCannibalization(clientId: number): Promise<CannibalizationIssue[]> {
    const keywords = await this.repository.getTopKeywords(clientId, CANNIBALIZATION_SCAN_LIMIT);

    const byKeyword = new Map<string, Map<string, CompetingUrl>>();
    for (const observation of keywords) {
      if (!observation.url) continue;
      const urls = byKeyword.get(observation.keyword) ?? new Map<string, CompetingUrl>();
      if (!urls.has(observation.url)) {
        urls.set(observation.url, { url: observation.url, position: observation.position, clicks: observation.clicks });
      }
      byKeyword.set(observation.keyword, urls);
    }

    const issues: CannibalizationIssue[] = [];
    for (const [keyword, urlMap] of byKeyword) {
      if (urlMap.size < 2) continue;

      const urls = [...urlMap.values()].sort((a, b) => comparePositions(a.position, b.position));
      issues.push({
        keyword,
        competingUrls: urls.length,
        bestPosition: urls[0].position,
        worstPosition: urls[urls.length - 1].position,
        urls,
        severity: urls.length > 2 ? 'high' : 'medium',
      });
    }

    return issues;
  }

  async scanAllAnomalies(clientId: number): Promise<Result<AnomalyScanResult>> {
    const client = await this.repository.getClient(clientId);
    if (!client) {
      return Result.fail('INVALID_INPUT', `Client not found: ${clientId}`);
    }

    const names = metricNames(await this.repository.getMetrics(clientId)).slice(0, SCANNED_METRICS_LIMIT);
    const metricAnomalies: MetricAnomaly[] = [];
    for (const name of names) {
      metricAnomalies.push(...(await this.detectMetricAnomalies(clientId, name)));
    }

    const trafficAnomalies = await this.detectTrafficAnomalies(clientId);
    const rankingDrops = await this.detectRankingDrops(clientId);
    const cannibalization = await this.detectKeywordCannibalization(clientId);
    const recentAnomalies = await this.repository.getRecentAnomalies(clientId, RECENT_ANOMALY_DAYS);

    const critical: ScanIssue[] = [];
    const high: ScanIssue[] = [];
    const medium: ScanIssue[] = [];

    for (const anomaly of [...metricAnomalies, ...trafficAnomalies]) {
      if (anomaly.severity === 'critical') critical.push(anomaly);
      else if (anomaly.severity === 'high') high.push(anomaly);
      else medium.push(anomaly);
    }
    for (const drop of rankingDrops) {
      (drop.severity === 'critical' ? critical : high).push(drop);
    }

    logger.debug('Anomaly scan complete', {
      clientId,
      metrics: names.length,
      critical: critical.length,
      high: high.length,
      medium: medium.length,
    });

    return Result.ok<AnomalyScanResult>({
      clientName: client.name,
      scanDate: this.today(),
      summary: {
        totalAnomalies: metricAnomalies.length + trafficAnomalies.length,
        rankingDrops: rankingDrops.length,
        cannibalizationIssues: cannibalization.length,
        criticalCount: critical.length,
        highCount: high.length,
        mediumCount: medium.length,
      },
      criticalIssues: critical,
      highPriority: high,
      mediumPriority: medium,
      rankingDrops: rankingDrops.slice(0, 10),
      cannibalization: cannibalization.slice(0, 5),
      recentAnomalies,
      recommendations: this.recommendations(critical, high, rankingDrops, cannibalization),
    });
  }

  async generateAlerts(clientId: number): Promise<Result<Alert[]>> {
    const scan = await this.scanAllAnomalies(clientId);
    if (!scan.success) return scan;

    const alerts: Alert[] = [];

    for (const issue of scan.data.criticalIssues) {
      if (issue.kind !== 'metric_anomaly') continue;
      alerts.push({
        type: 'critical_anomaly',
        title: `Critical ${issue.type} in ${issue.metric}`,
        message: `Detected ${issue.deviationPercent}% deviation on ${issue.date}`,
        action: 'immediate_investigation_required',
        priority: 1,
      });
    }

    for (const drop of scan.data.rankingDrops.slice(0, 5)) {
      alerts.push({
        type: 'ranking_drop',
        title: `Ranking drop for '${drop.keyword}'`,
        message: `Dropped ${drop.positionDrop} positions (now ${drop.currentPosition === null ? 'unranked' : `#${drop.currentPosition}`})`,
        action: 'review_page_and_competitors',
        priority: 2,
      });
    }

    for (const issue of scan.data.cannibalization.slice(0, 3)) {
      alerts.push({
        type: 'cannibalization',
        title: `Keyword cannibalization: '${issue.keyword}'`,
        message: `${issue.competingUrls} URLs competing for this keyword`,
        action: 'consolidate_or_differentiate_content',
        priority: 3,
      });
    }

    return Result.ok(alerts);
  }

  private recommendations(
    critical: readonly ScanIssue[],
    high: readonly ScanIssue[],
    rankingDrops: readonly RankingDrop[],
    cannibalization: readonly CannibalizationIssue[]
  ): string[] {
    const recommendations: string[] = [];
    if (critical.length > 0) recommendations.push(ANOMALY_RECOMMENDATIONS.critical);
    if (rankingDrops.length > 0) recommendations.push(ANOMALY_RECOMMENDATIONS.rankingDrops);
    if (cannibalization.length > 0) recommendations.push(ANOMALY_RECOMMENDATIONS.cannibalization);
    if (high.length > 5) recommendations.push(ANOMALY_RECOMMENDATIONS.manyHigh);
    if (critical.length === 0 && high.length === 0 && rankingDrops.length === 0) {
      recommendations.push(ANOMALY_RECOMMENDATIONS.allClear);
    }
    return recommendations;
  }

  private async persist(records: readonly AnomalyRecord[]): Promise<void> {
    for (const record of records) {
      await this.repository.saveAnomaly(record);
    }
    if (records.length > 0) {
      logger.info('Anomalies recorded', {
        clientId: records[0].clientId,
        metric: records[0].metricName,
        count: records.length,
      });
    }
  }

  private today(): string {
    return toIsoDate(this.now());
  }
}

