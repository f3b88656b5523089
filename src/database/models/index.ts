export * from './Transaction';
export * from './Delegator';
export * from './ValidatorMetrics';
export * from './ValidatorPerformance';
export * from './EpochSync';
export * from './EpochData';
