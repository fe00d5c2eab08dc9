/**
 * Shared contracts for seo-insights packages
 */

export * from './common/result.js';
export * from './analytics/index.js';
