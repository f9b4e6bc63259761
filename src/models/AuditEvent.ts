/**
 * Audit journal models
 */

export type AuditEventType =
  | 'RISK_REJECTION'
  | 'ORDER_SUBMITTED'
  | 'SUBMISSION_REJECTED'
  | 'DEAD_LETTER'
  | 'LATE_FILL_DISCARDED'
  | 'SIZE_OVERRUN'
  | 'CANCEL_REQUESTED'
  | 'CANCEL_REQUEST_FAILED'
  | 'CIRCUIT_STATE_CHANGED'
  | 'ENGINE_SHUTDOWN';

export type AuditDetailValue = string | number | boolean | null | undefined | string[];

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: AuditEventType;
  market?: string;
  details: Record<string, AuditDetailValue>;
  signature: string;
}
