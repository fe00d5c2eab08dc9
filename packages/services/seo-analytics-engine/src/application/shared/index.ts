export * from './statistics';
export * from './dates';
export * from './series';
