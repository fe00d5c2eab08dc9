export * from './Forecaster';
export * from './AnomalyDetector';
export * from './HistoricalAnalyzer';
export * from './ImpactEstimateParser';
export * from './PrioritizationEngine';
