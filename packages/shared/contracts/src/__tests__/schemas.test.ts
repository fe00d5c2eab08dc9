import { describe, it, expect } from 'vitest';
import { KeywordObservationSchema, MetricSampleSchema, RecommendationRecordSchema } from '../analytics/schemas';

describe('analytics schemas', () => {
  it('accepts a well-formed metric sample', () => {
    const parsed = MetricSampleSchema.parse({ clientId: 1, metricName: 'organic_clicks', value: 120, date: '2026-03-01' });
    expect(parsed.value).toBe(120);
  });

  it('rejects dates that are not calendar dates', () => {
    const parsed = MetricSampleSchema.safeParse({ clientId: 1, metricName: 'organic_clicks', value: 1, date: '03/01/2026' });
    expect(parsed.success).toBe(false);
  });

  it('allows a keyword observation without a ranking', () => {
    const parsed = KeywordObservationSchema.safeParse({
      clientId: 1,
      keyword: 'buy shoes',
      position: null,
      impressions: 10,
      clicks: 0,
      ctr: 0,
      date: '2026-03-01',
    });
    expect(parsed.success).toBe(true);
  });

  it('requires recommendation text but nothing else', () => {
    expect(RecommendationRecordSchema.safeParse({ recommendation: 'Fix titles' }).success).toBe(true);
    expect(RecommendationRecordSchema.safeParse({ effort: 'Low' }).success).toBe(false);
  });
});
