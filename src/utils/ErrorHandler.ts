/**
 * Error taxonomy and handling for the mirror engine
 * Every handled error is logged with its context and counted; none is ignored
 */

import type { Logger } from 'winston';
import type { ZodIssue } from 'zod';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NORMALIZATION = 'normalization',
  VALIDATION = 'validation',
  SUBMISSION = 'submission',
  RECONCILIATION = 'reconciliation',
  CONFIGURATION = 'configuration',
  SYSTEM = 'system'
}

export interface ErrorContext {
  operation: string;
  component: string;
  market?: string;
  orderId?: string;
  clientOrderId?: string;
  kind?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Base application error carrying classification and context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable
    };
  }
}

/**
 * Malformed feed payload. Carries the raw payload so it can be logged verbatim.
 */
export class NormalizationError extends ApplicationError {
  public readonly raw: unknown;
  public readonly issues: ZodIssue[];

  constructor(message: string, raw: unknown, issues: ZodIssue[] = [], kind?: string) {
    super(message, 'MALFORMED_PAYLOAD', ErrorCategory.NORMALIZATION, ErrorSeverity.LOW, {
      operation: 'normalize',
      component: 'EventNormalizer',
      kind,
      timestamp: new Date()
    });
    this.name = 'NormalizationError';
    this.raw = raw;
    this.issues = issues;
  }
}

/**
 * A risk rule refused a mirrored action. Reported, never retried.
 */
export class ValidationRejection extends ApplicationError {
  public readonly rule: string;

  constructor(rule: string, reason: string, context: ErrorContext) {
    super(reason, 'RISK_REJECTED', ErrorCategory.VALIDATION, ErrorSeverity.LOW, context);
    this.name = 'ValidationRejection';
    this.rule = rule;
  }
}

export class RetriableSubmissionError extends ApplicationError {
  public readonly errorKind: string;

  constructor(message: string, errorKind: string, context: ErrorContext, originalError?: Error) {
    super(message, 'SUBMISSION_RETRIABLE', ErrorCategory.SUBMISSION, ErrorSeverity.MEDIUM, context, {
      originalError,
      isRetryable: true
    });
    this.name = 'RetriableSubmissionError';
    this.errorKind = errorKind;
  }
}

export class PermanentSubmissionError extends ApplicationError {
  public readonly errorKind: string;

  constructor(message: string, errorKind: string, context: ErrorContext, originalError?: Error) {
    super(message, 'SUBMISSION_PERMANENT', ErrorCategory.SUBMISSION, ErrorSeverity.HIGH, context, {
      originalError,
      isRetryable: false
    });
    this.name = 'PermanentSubmissionError';
    this.errorKind = errorKind;
  }
}

/**
 * Fill or cancel for an order this engine does not track. Expected for the
 * source's own orders; logged, not raised.
 */
export class UnknownOrderWarning extends ApplicationError {
  constructor(orderId: string, context: ErrorContext) {
    super(`order ${orderId} is not tracked`, 'UNKNOWN_ORDER', ErrorCategory.RECONCILIATION, ErrorSeverity.LOW, {
      ...context,
      orderId
    });
    this.name = 'UnknownOrderWarning';
  }
}

export class DuplicateOrderError extends ApplicationError {
  constructor(message: string, context: ErrorContext) {
    super(message, 'DUPLICATE_ORDER', ErrorCategory.RECONCILIATION, ErrorSeverity.MEDIUM, context);
    this.name = 'DuplicateOrderError';
  }
}

export interface ErrorMetric {
  count: number;
  lastOccurrence: Date;
  lastMessage: string;
}

/**
 * Records handled errors: one structured log line and one metric increment each
 */
export class ErrorHandler {
  private errorMetrics: Map<string, ErrorMetric> = new Map();

  constructor(private logger: Logger) {}

  /**
   * Logs and counts an error that was handled locally
   */
  record(error: unknown, context: ErrorContext): ApplicationError {
    const appError = this.wrapError(error, context);
    const key = `${appError.category}:${appError.code}`;
    const existing = this.errorMetrics.get(key);

    this.errorMetrics.set(key, {
      count: (existing?.count ?? 0) + 1,
      lastOccurrence: new Date(),
      lastMessage: appError.message
    });

    const meta = {
      code: appError.code,
      category: appError.category,
      operation: appError.context.operation,
      component: appError.context.component,
      market: context.market ?? appError.context.market,
      orderId: context.orderId ?? appError.context.orderId,
      clientOrderId: context.clientOrderId ?? appError.context.clientOrderId,
      kind: context.kind ?? appError.context.kind,
      ...context.metadata
    };

    switch (appError.severity) {
      case ErrorSeverity.LOW:
      case ErrorSeverity.MEDIUM:
        this.logger.warn(appError.message, meta);
        break;
      default:
        this.logger.error(appError.message, { ...meta, stack: appError.stack });
    }

    return appError;
  }

  /**
   * Wraps raw errors into ApplicationError with context
   */
  wrapError(error: unknown, context: ErrorContext): ApplicationError {
    if (error instanceof ApplicationError) {
      return error;
    }

    return new ApplicationError(
      error instanceof Error ? error.message : String(error),
      'UNEXPECTED_ERROR',
      ErrorCategory.SYSTEM,
      ErrorSeverity.HIGH,
      context,
      { originalError: error instanceof Error ? error : undefined }
    );
  }

  getErrorMetrics(): Map<string, ErrorMetric> {
    return new Map(this.errorMetrics);
  }

  getErrorCount(category: ErrorCategory, code: string): number {
    return this.errorMetrics.get(`${category}:${code}`)?.count ?? 0;
  }

  totalErrors(): number {
    let total = 0;
    for (const metric of this.errorMetrics.values()) {
      total += metric.count;
    }
    return total;
  }
}
