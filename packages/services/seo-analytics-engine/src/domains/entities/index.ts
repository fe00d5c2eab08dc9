export * from './Trend';
export * from './Forecast';
export * from './Anomaly';
export * from './HistoricalTrend';
export * from './Recommendation';
