/**
 * Platform Core - Shared Utilities for seo-insights packages
 *
 * - Structured logging with correlation tracking
 * - Error handling patterns
 * - Configuration management utilities
 */

export * from './config/index.js';
export * from './error-handling/index.js';
export * from './logging/index.js';
