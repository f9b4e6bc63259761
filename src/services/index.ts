export * from './AuditService';
export * from './EventNormalizer';
export * from './OrderTracker';
export * from './PositionTracker';
export * from './PositionSizer';
export * from './RiskValidator';
export * from './RetryCoordinator';
export * from './MirrorEngine';
