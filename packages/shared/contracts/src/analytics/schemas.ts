import { z } from 'zod';

/** Calendar date as stored by the repository: YYYY-MM-DD */
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const ClientIdSchema = z.number().int().positive();

export const MetricSampleSchema = z.object({
  clientId: ClientIdSchema,
  metricName: z.string().min(1),
  value: z.number().finite(),
  date: IsoDateSchema,
  unit: z.string().optional(),
  module: z.string().optional(),
});

export type MetricSample = z.infer<typeof MetricSampleSchema>;

export const KeywordObservationSchema = z.object({
  clientId: ClientIdSchema,
  keyword: z.string().min(1),
  position: z.number().positive().nullable(),
  previousPosition: z.number().positive().nullable().optional(),
  positionChange: z.number().nullable().optional(),
  impressions: z.number().int().nonnegative(),
  clicks: z.number().int().nonnegative(),
  ctr: z.number().nonnegative(),
  date: IsoDateSchema,
  url: z.string().optional(),
});

export type KeywordObservation = z.infer<typeof KeywordObservationSchema>;

export const TrafficSampleSchema = z.object({
  clientId: ClientIdSchema,
  date: IsoDateSchema,
  sessions: z.number().nonnegative(),
  users: z.number().nonnegative(),
  pageviews: z.number().nonnegative(),
  bounceRate: z.number().min(0).max(100).optional(),
  avgSessionDuration: z.number().nonnegative().optional(),
  source: z.string().optional(),
  device: z.string().optional(),
});

export type TrafficSample = z.infer<typeof TrafficSampleSchema>;

export const ReportSnapshotSchema = z.object({
  reportDate: IsoDateSchema,
  healthScore: z.number().nullable(),
});

export type ReportSnapshot = z.infer<typeof ReportSnapshotSchema>;

export const ClientRecordSchema = z.object({
  id: ClientIdSchema,
  name: z.string().min(1),
  domain: z.string().optional(),
  industry: z.string().optional(),
});

export type ClientRecord = z.infer<typeof ClientRecordSchema>;

/**
 * Recommendation as produced by the insight-generation step.
 * Categorical fields are free text such as "Low (5-10h)" or "High (85%)".
 */
export const RecommendationRecordSchema = z.object({
  recommendation: z.string().min(1),
  priority: z.string().optional(),
  timeline: z.string().optional(),
  effort: z.string().optional(),
  impactEstimate: z.string().optional(),
  confidence: z.string().optional(),
  reasoning: z.string().optional(),
  dataEvidence: z.array(z.string()).optional(),
  implementationSteps: z.array(z.string()).optional(),
  kpis: z.array(z.string()).optional(),
  dependencies: z.array(z.string()).optional(),
  risks: z.array(z.string()).optional(),
});

export type RecommendationRecord = z.infer<typeof RecommendationRecordSchema>;
