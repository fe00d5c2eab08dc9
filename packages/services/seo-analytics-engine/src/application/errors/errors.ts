import { DomainErrorCode, createDomainServiceError } from '@seo-insights/platform-core';

const AnalyticsDomainCodes = {
  INVALID_METRIC_DATA: 'INVALID_METRIC_DATA',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  QUERY_FAILED: 'QUERY_FAILED',
} as const;

export const AnalyticsErrorCode = { ...DomainErrorCode, ...AnalyticsDomainCodes } as const;
export type AnalyticsErrorCodeType = (typeof AnalyticsErrorCode)[keyof typeof AnalyticsErrorCode];

const AnalyticsErrorBase = createDomainServiceError<AnalyticsErrorCodeType>('Analytics', AnalyticsErrorCode);

export class AnalyticsError extends AnalyticsErrorBase {
  static invalidMetricData(reason: string) {
    return new AnalyticsError(`Invalid metric data: ${reason}`, 400, AnalyticsErrorCode.INVALID_METRIC_DATA);
  }

  static invalidConfiguration(reason: string) {
    return new AnalyticsError(`Invalid engine configuration: ${reason}`, 400, AnalyticsErrorCode.INVALID_CONFIGURATION);
  }

  static queryFailed(query: string, reason: string, cause?: Error) {
    return new AnalyticsError(`Query failed for ${query}: ${reason}`, 500, AnalyticsErrorCode.QUERY_FAILED, cause);
  }
}
