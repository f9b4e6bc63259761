export * from './ErrorHandler';
export * from './CircuitBreaker';
export * from './RecentKeySet';
export * from './decimals';
export * from './logger';
export * from './schemas';
