/**
 * In-memory Metric Repository
 * Serves the repository contract's orderings over records validated on insert.
 */

import type { z } from 'zod';
import {
  ClientRecordSchema,
  KeywordObservationSchema,
  MetricSampleSchema,
  ReportSnapshotSchema,
  TrafficSampleSchema,
  type ClientRecord,
  type KeywordObservation,
  type MetricSample,
  type ReportSnapshot,
  type TrafficSample,
} from '@seo-insights/shared-contracts';
import type { IMetricRepository, MetricQuery } from '../../domains/repositories/IMetricRepository';
import type { AnomalyRecord, ForecastPoint, StoredAnomaly } from '../../domains/entities';
import { AnalyticsError } from '../../application/errors';
import {
  percentChange,
  sortByDateAscending,
  subtractDays,
  subtractMonths,
  systemClock,
  toIsoDate,
  type Clock,
} from '../../application/shared';

export interface StoredForecast {
  clientId: number;
  metricName: string;
  point: ForecastPoint;
}

interface StoredReport extends ReportSnapshot {
  clientId: number;
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, label: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw AnalyticsError.invalidMetricData(`${label}: ${issues}`);
  }
  return parsed.data;
}

export class InMemoryMetricRepository implements IMetricRepository {
  private readonly clients = new Map<number, ClientRecord>();
  private readonly metrics: MetricSample[] = [];
  private readonly keywords: KeywordObservation[] = [];
  private readonly traffic: TrafficSample[] = [];
  private readonly reports: StoredReport[] = [];
  private readonly forecasts: StoredForecast[] = [];
  private readonly anomalies: StoredAnomaly[] = [];
  private nextAnomalyId = 1;
  private readonly now: Clock;

  constructor(options: { now?: Clock } = {}) {
    this.now = options.now ?? systemClock;
  }

  // ===== SEEDING =====

  addClient(client: ClientRecord): void {
    const record = validate(ClientRecordSchema, client, 'client');
    this.clients.set(record.id, record);
  }

  addMetrics(samples: readonly MetricSample[]): void {
    for (const sample of samples) this.metrics.push(validate(MetricSampleSchema, sample, 'metric sample'));
  }

  addKeywords(observations: readonly KeywordObservation[]): void {
    for (const observation of observations) {
      this.keywords.push(validate(KeywordObservationSchema, observation, 'keyword observation'));
    }
  }

  addTraffic(samples: readonly TrafficSample[]): void {
    for (const sample of samples) this.traffic.push(validate(TrafficSampleSchema, sample, 'traffic sample'));
  }

  addReport(clientId: number, report: ReportSnapshot): void {
    this.reports.push({ clientId, ...validate(ReportSnapshotSchema, report, 'report') });
  }

  /** Forecast points saved so far, in insertion order */
  getSavedForecasts(clientId: number, metricName?: string): StoredForecast[] {
    return this.forecasts.filter(
      entry => entry.clientId === clientId && (metricName === undefined || entry.metricName === metricName)
    );
  }

  // ===== QUERIES =====

  async getMetrics(clientId: number, query: MetricQuery = {}): Promise<MetricSample[]> {
    const { metricName, startDate, endDate } = query;
    const matching = this.metrics.filter(
      sample =>
        sample.clientId === clientId &&
        (metricName === undefined || sample.metricName === metricName) &&
        (startDate === undefined || sample.date >= startDate) &&
        (endDate === undefined || sample.date <= endDate)
    );
    return sortByDateAscending(matching).reverse();
  }

  async getMetricTrend(clientId: number, metricName: string, months: number): Promise<MetricSample[]> {
    const startDate = subtractMonths(this.today(), months);
    return sortByDateAscending(
      this.metrics.filter(
        sample => sample.clientId === clientId && sample.metricName === metricName && sample.date >= startDate
      )
    );
  }

  async getTrafficTrend(clientId: number, days: number): Promise<TrafficSample[]> {
    const startDate = subtractDays(this.today(), days);
    const byDate = new Map<string, TrafficSample>();

    for (const sample of this.traffic) {
      if (sample.clientId !== clientId || sample.date < startDate) continue;
      const total = byDate.get(sample.date);
      byDate.set(
        sample.date,
        total
          ? {
              ...total,
              sessions: total.sessions + sample.sessions,
              users: total.users + sample.users,
              pageviews: total.pageviews + sample.pageviews,
            }
          : { clientId, date: sample.date, sessions: sample.sessions, users: sample.users, pageviews: sample.pageviews }
      );
    }

    return sortByDateAscending([...byDate.values()]);
  }

  async getKeywordHistory(clientId: number, keyword: string): Promise<KeywordObservation[]> {
    return sortByDateAscending(
      this.keywords.filter(observation => observation.clientId === clientId && observation.keyword === keyword)
    );
  }

  async getTopKeywords(clientId: number, limit: number): Promise<KeywordObservation[]> {
    const own = this.keywords.filter(observation => observation.clientId === clientId);
    if (own.length === 0) return [];

    const latest = own.reduce((max, observation) => (observation.date > max ? observation.date : max), own[0].date);
    return own
      .filter(observation => observation.date === latest)
      .sort((a, b) => b.clicks - a.clicks)
      .slice(0, limit);
  }

  // ===== AUDIT TRAIL =====

  async saveForecast(clientId: number, metricName: string, points: readonly ForecastPoint[]): Promise<void> {
    for (const point of points) this.forecasts.push({ clientId, metricName, point });
  }

  async saveAnomaly(record: AnomalyRecord): Promise<void> {
    this.anomalies.push({
      ...record,
      id: this.nextAnomalyId++,
      deviationPercent: percentChange(record.actualValue, record.expectedValue),
      detectedAt: this.now().toISOString(),
    });
  }

  async getRecentAnomalies(clientId: number, days: number): Promise<StoredAnomaly[]> {
    const startDate = subtractDays(this.today(), days);
    return this.anomalies
      .filter(anomaly => anomaly.clientId === clientId && anomaly.date >= startDate)
      .sort((a, b) => {
        if (a.date !== b.date) return a.date < b.date ? 1 : -1;
        return Math.abs(b.deviationPercent) - Math.abs(a.deviationPercent);
      });
  }

  // ===== REPORTS & CLIENTS =====

  async getReports(clientId: number, limit: number): Promise<ReportSnapshot[]> {
    return this.reports
      .filter(report => report.clientId === clientId)
      .sort((a, b) => (a.reportDate < b.reportDate ? 1 : a.reportDate > b.reportDate ? -1 : 0))
      .slice(0, limit)
      .map(({ reportDate, healthScore }) => ({ reportDate, healthScore }));
  }

  async getClient(clientId: number): Promise<ClientRecord | null> {
    return this.clients.get(clientId) ?? null;
  }

  private today(): string {
    return toIsoDate(this.now());
  }
}
