import type { MetricSample } from '@seo-insights/shared-contracts';

/** Oldest first; stable for equal dates */
export function sortByDateAscending<T extends { date: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Distinct values in order of first appearance */
export function distinct<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}

/** Metric names in the order samples list them (newest first for repository output) */
export function metricNames(samples: readonly MetricSample[]): string[] {
  return distinct(samples.map(sample => sample.metricName));
}
