/**
 * PostgreSQL Metric Repository
 * Parameterized SQL over the tables in sql/schema.sql. Rows are validated
 * with zod before they reach the engines.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';
import { z } from 'zod';
import { errorMessage } from '@seo-insights/platform-core';
import type {
  ClientRecord,
  KeywordObservation,
  MetricSample,
  ReportSnapshot,
  TrafficSample,
} from '@seo-insights/shared-contracts';
import type { IMetricRepository, MetricQuery } from '../../domains/repositories/IMetricRepository';
import type { AnomalyRecord, ForecastPoint, StoredAnomaly } from '../../domains/entities';
import { AnalyticsError } from '../../application/errors';
import { getLogger } from '../../config/engine-config';
import { percentChange, subtractDays, subtractMonths, systemClock, toIsoDate, type Clock } from '../../application/shared';

const logger = getLogger('seo-analytics-engine-postgres-repository');

const SCHEMA_PATH = fileURLToPath(new URL('../../../sql/schema.sql', import.meta.url));

type SqlValue = string | number | null;

const optionalText = z
  .string()
  .nullable()
  .transform(value => value ?? undefined);

const MetricRowSchema = z.object({
  client_id: z.coerce.number(),
  metric_name: z.string(),
  metric_value: z.coerce.number(),
  metric_unit: optionalText,
  module: optionalText,
  metric_date: z.string(),
});

const KeywordRowSchema = z.object({
  client_id: z.coerce.number(),
  keyword: z.string(),
  position: z.coerce.number().nullable(),
  previous_position: z.coerce.number().nullable(),
  position_change: z.coerce.number().nullable(),
  impressions: z.coerce.number(),
  clicks: z.coerce.number(),
  ctr: z.coerce.number(),
  date: z.string(),
  url: optionalText,
});

const TrafficRowSchema = z.object({
  date: z.string(),
  sessions: z.coerce.number(),
  users: z.coerce.number(),
  pageviews: z.coerce.number(),
});

const AnomalyRowSchema = z.object({
  id: z.coerce.number(),
  client_id: z.coerce.number(),
  metric_name: z.string(),
  date: z.string(),
  expected_value: z.coerce.number(),
  actual_value: z.coerce.number(),
  deviation_percent: z.coerce.number(),
  severity: z.enum(['critical', 'high', 'medium', 'low']),
  created_at: z.coerce.date(),
});

const ReportRowSchema = z.object({
  report_date: z.string(),
  health_score: z.coerce.number().nullable(),
});

const ClientRowSchema = z.object({
  id: z.coerce.number(),
  name: z.string(),
  domain: optionalText,
  industry: optionalText,
});

const KEYWORD_COLUMNS = `client_id, keyword, position, previous_position, position_change,
       impressions, clicks, ctr, to_char(date, 'YYYY-MM-DD') AS date, url`;

function toKeyword(row: z.infer<typeof KeywordRowSchema>): KeywordObservation {
  return {
    clientId: row.client_id,
    keyword: row.keyword,
    position: row.position,
    previousPosition: row.previous_position,
    positionChange: row.position_change,
    impressions: row.impressions,
    clicks: row.clicks,
    ctr: row.ctr,
    date: row.date,
    url: row.url,
  };
}

export interface PostgresMetricRepositoryOptions {
  now?: Clock;
}

export class PostgresMetricRepository implements IMetricRepository {
  private readonly now: Clock;

  constructor(
    private readonly pool: Pool,
    options: PostgresMetricRepositoryOptions = {}
  ) {
    this.now = options.now ?? systemClock;
  }

  /** Creates the tables and indexes when they do not exist yet */
  async initializeSchema(): Promise<void> {
    const ddl = await readFile(SCHEMA_PATH, 'utf8');
    await this.execute('initializeSchema', ddl, []);
    logger.info('Analytics schema ensured');
  }

  async getMetrics(clientId: number, query: MetricQuery = {}): Promise<MetricSample[]> {
    let sql = `
      SELECT client_id, metric_name, metric_value, metric_unit, module,
             to_char(metric_date, 'YYYY-MM-DD') AS metric_date
      FROM metrics
      WHERE client_id = $1
    `;
    const values: SqlValue[] = [clientId];
    let paramIndex = 2;

    if (query.metricName) {
      sql += ` AND metric_name = $${paramIndex++}`;
      values.push(query.metricName);
    }
    if (query.startDate) {
      sql += ` AND metric_date >= $${paramIndex++}`;
      values.push(query.startDate);
    }
    if (query.endDate) {
      sql += ` AND metric_date <= $${paramIndex++}`;
      values.push(query.endDate);
    }
    sql += ' ORDER BY metric_date DESC';

    const rows = await this.select('getMetrics', sql, values, MetricRowSchema);
    return rows.map(row => ({
      clientId: row.client_id,
      metricName: row.metric_name,
      value: row.metric_value,
      date: row.metric_date,
      unit: row.metric_unit,
      module: row.module,
    }));
  }

  async getMetricTrend(clientId: number, metricName: string, months: number): Promise<MetricSample[]> {
    const samples = await this.getMetrics(clientId, {
      metricName,
      startDate: subtractMonths(toIsoDate(this.now()), months),
    });
    return samples.reverse();
  }

  async getTrafficTrend(clientId: number, days: number): Promise<TrafficSample[]> {
    const sql = `
      SELECT to_char(date, 'YYYY-MM-DD') AS date,
             SUM(sessions) AS sessions, SUM(users) AS users, SUM(pageviews) AS pageviews
      FROM traffic
      WHERE client_id = $1 AND date >= $2
      GROUP BY date
      ORDER BY date ASC
    `;
    const rows = await this.select('getTrafficTrend', sql, [clientId, subtractDays(toIsoDate(this.now()), days)], TrafficRowSchema);
    return rows.map(row => ({ clientId, ...row }));
  }

  async getKeywordHistory(clientId: number, keyword: string): Promise<KeywordObservation[]> {
    const sql = `
      SELECT ${KEYWORD_COLUMNS}
      FROM keywords
      WHERE client_id = $1 AND keyword = $2
      ORDER BY date ASC
    `;
    const rows = await this.select('getKeywordHistory', sql, [clientId, keyword], KeywordRowSchema);
    return rows.map(toKeyword);
  }

  async getTopKeywords(clientId: number, limit: number): Promise<KeywordObservation[]> {
    const sql = `
      SELECT ${KEYWORD_COLUMNS}
      FROM keywords
      WHERE client_id = $1
        AND date = (SELECT MAX(date) FROM keywords WHERE client_id = $1)
      ORDER BY clicks DESC
      LIMIT $2
    `;
    const rows = await this.select('getTopKeywords', sql, [clientId, limit], KeywordRowSchema);
    return rows.map(toKeyword);
  }

  async saveForecast(clientId: number, metricName: string, points: readonly ForecastPoint[]): Promise<void> {
    if (points.length === 0) return;

    const sql = `
      INSERT INTO forecasts (
        client_id, metric_name, forecast_date, predicted_value,
        confidence_low, confidence_high, model_type
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
    `;

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const point of points) {
        await client.query(sql, [
          clientId,
          metricName,
          point.date,
          point.predictedValue,
          point.confidenceLow,
          point.confidenceHigh,
          point.modelType,
        ]);
      }
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw AnalyticsError.queryFailed('saveForecast', errorMessage(error), error instanceof Error ? error : undefined);
    } finally {
      client.release();
    }
  }

  async saveAnomaly(record: AnomalyRecord): Promise<void> {
    const sql = `
      INSERT INTO anomalies (
        client_id, metric_name, date, expected_value, actual_value,
        deviation_percent, severity
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)
    `;
    await this.execute('saveAnomaly', sql, [
      record.clientId,
      record.metricName,
      record.date,
      record.expectedValue,
      record.actualValue,
      percentChange(record.actualValue, record.expectedValue),
      record.severity,
    ]);
  }

  async getRecentAnomalies(clientId: number, days: number): Promise<StoredAnomaly[]> {
    const sql = `
      SELECT id, client_id, metric_name, to_char(date, 'YYYY-MM-DD') AS date,
             expected_value, actual_value, deviation_percent, severity, created_at
      FROM anomalies
      WHERE client_id = $1 AND date >= $2
      ORDER BY date DESC, ABS(deviation_percent) DESC
    `;
    const rows = await this.select(
      'getRecentAnomalies',
      sql,
      [clientId, subtractDays(toIsoDate(this.now()), days)],
      AnomalyRowSchema
    );
    return rows.map(row => ({
      id: row.id,
      clientId: row.client_id,
      metricName: row.metric_name,
      date: row.date,
      expectedValue: row.expected_value,
      actualValue: row.actual_value,
      deviationPercent: row.deviation_percent,
      severity: row.severity,
      detectedAt: row.created_at.toISOString(),
    }));
  }

  async getReports(clientId: number, limit: number): Promise<ReportSnapshot[]> {
    const sql = `
      SELECT to_char(report_date, 'YYYY-MM-DD') AS report_date, health_score
      FROM reports
      WHERE client_id = $1
      ORDER BY report_date DESC
      LIMIT $2
    `;
    const rows = await this.select('getReports', sql, [clientId, limit], ReportRowSchema);
    return rows.map(row => ({ reportDate: row.report_date, healthScore: row.health_score }));
  }

  async getClient(clientId: number): Promise<ClientRecord | null> {
    const sql = 'SELECT id, name, domain, industry FROM clients WHERE id = $1';
    const rows = await this.select('getClient', sql, [clientId], ClientRowSchema);
    return rows[0] ?? null;
  }

  private async execute(queryName: string, sql: string, values: SqlValue[]): Promise<unknown[]> {
    try {
      const result = await this.pool.query(sql, values);
      return result.rows;
    } catch (error) {
      logger.error('Analytics query failed', { query: queryName, error: errorMessage(error) });
      throw AnalyticsError.queryFailed(queryName, errorMessage(error), error instanceof Error ? error : undefined);
    }
  }

  private async select<T>(
    queryName: string,
    sql: string,
    values: SqlValue[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T[]> {
    const rows = await this.execute(queryName, sql, values);
    const parsed = z.array(schema).safeParse(rows);
    if (!parsed.success) {
      throw AnalyticsError.invalidMetricData(`${queryName} returned malformed rows: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
