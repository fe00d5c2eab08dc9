/**
 * Logging Module - Index
 *
 * Exports all logging functionality for platform-core
 */

export * from './types.js';
export * from './logger.js';
export * from './formatting.js';
export * from './correlation.js';
export * from './error-serializer.js';

import * as winston from 'winston';
export { winston };
