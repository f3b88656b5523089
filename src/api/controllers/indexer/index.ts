export * from './sync.controller';
export * from './delegator.controller';
export * from './validator.controller';
export * from './epoch.controller';
