import { createHmac, randomBytes } from 'crypto';
import type { AuditDetailValue, AuditEvent, AuditEventType } from '../models/AuditEvent';
import type { DeadLetterRecord } from '../models/MirrorAction';

export type AuditDetails = Record<string, AuditDetailValue>;

export interface AuditExportFilter {
  startDate?: Date;
  endDate?: Date;
  eventType?: AuditEventType;
  market?: string;
}

const SENSITIVE_KEYS = ['apikey', 'secret', 'password', 'privatekey', 'credential', 'token'];

/**
 * Audit Service keeps the engine's tamper-evident journal: risk rejections,
 * dead letters, discarded late fills and venue cancel requests. Entries are
 * append-only and HMAC-signed. Only the newest maxEntries are retained; older
 * ones are dropped oldest first.
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;

  constructor(
    signingKey?: Buffer,
    private clock: () => number = Date.now,
    private readonly maxEntries: number = 100_000
  ) {
    // Use provided key or generate a new one for this session
    this.signingKey = signingKey || randomBytes(32);
  }

  /**
   * Appends a signed event to the journal
   */
  record(eventType: AuditEventType, details: AuditDetails, market?: string): AuditEvent {
    const unsigned = {
      eventId: this.generateEventId(),
      timestamp: new Date(this.clock()),
      eventType,
      market,
      details: this.redactSensitiveData(details)
    };

    const auditEvent: AuditEvent = {
      ...unsigned,
      signature: this.generateSignature(unsigned)
    };

    this.auditLog.push(auditEvent);
    if (this.auditLog.length > this.maxEntries) {
      this.auditLog.splice(0, this.auditLog.length - this.maxEntries);
    }
    return auditEvent;
  }

  /**
   * Journals a dead-lettered submission with everything needed to replay it by hand
   */
  recordDeadLetter(record: DeadLetterRecord): AuditEvent {
    const { action } = record;
    return this.record(
      'DEAD_LETTER',
      {
        clientOrderId: action.clientOrderId,
        sourceOrderId: action.sourceOrderId,
        side: action.side,
        price: action.price.toString(),
        size: action.size.toString(),
        attempts: record.attempts,
        lastError: record.lastError,
        lastErrorKind: record.lastErrorKind,
        reason: record.reason
      },
      action.market
    );
  }

  /**
   * Exports the journal, optionally filtered
   */
  exportAuditLog(filter: AuditExportFilter = {}): AuditEvent[] {
    const { startDate, endDate, eventType, market } = filter;

    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        if (eventType && event.eventType !== eventType) return false;
        if (market && event.market !== market) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  /**
   * Verifies the integrity of audit log entries
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  countByType(eventType: AuditEventType): number {
    return this.auditLog.filter(event => event.eventType === eventType).length;
  }

  /**
   * Gets all audit events (for testing purposes)
   */
  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  /**
   * Clears audit log (for testing purposes only)
   */
  clearLog(): void {
    this.auditLog = [];
  }

  private generateEventId(): string {
    return randomBytes(16).toString('hex');
  }

  private generateSignature(eventData: Omit<AuditEvent, 'signature'>): string {
    // Deterministic representation: sorted keys at both levels
    const signingData = {
      eventId: eventData.eventId,
      timestamp: eventData.timestamp.toISOString(),
      eventType: eventData.eventType,
      market: eventData.market ?? null,
      details: JSON.stringify(eventData.details, Object.keys(eventData.details).sort())
    };

    const dataString = JSON.stringify(signingData, Object.keys(signingData).sort());
    return createHmac('sha256', this.signingKey)
      .update(dataString)
      .digest('hex');
  }

  private redactSensitiveData(details: AuditDetails): AuditDetails {
    const redacted: AuditDetails = {};

    for (const [key, value] of Object.entries(details)) {
      const lowerKey = key.toLowerCase();
      redacted[key] = SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))
        ? '[REDACTED]'
        : value;
    }

    return redacted;
  }
}
