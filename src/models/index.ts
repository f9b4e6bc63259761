export * from './Order';
export * from './Position';
export * from './DomainEvent';
export * from './MirrorAction';
export * from './AuditEvent';
