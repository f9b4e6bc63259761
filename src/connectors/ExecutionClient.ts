/**
 * Collaborator contracts for order execution and collateral balances
 */

import type { Decimal } from '../utils/decimals';
import type { OrderSide } from '../models/Order';

export interface SubmitOrderParams {
  market: string;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  clientOrderId: string;
}

export type ExecutionErrorKind = 'network' | 'timeout' | 'rejected';

/**
 * The only error shape an execution client reports. Rejections carry the
 * venue's reason code.
 */
export class ExecutionError extends Error {
  public readonly kind: ExecutionErrorKind;
  public readonly reasonCode?: string;

  constructor(kind: ExecutionErrorKind, message: string, reasonCode?: string) {
    super(message);
    this.name = 'ExecutionError';
    this.kind = kind;
    this.reasonCode = reasonCode;
  }

  static network(message: string): ExecutionError {
    return new ExecutionError('network', message);
  }

  static timeout(message: string): ExecutionError {
    return new ExecutionError('timeout', message);
  }

  static rejected(reasonCode: string, message: string): ExecutionError {
    return new ExecutionError('rejected', message, reasonCode);
  }

  /** Short label used in retry records and logs, e.g. "rejected:VENUE_BUSY". */
  get label(): string {
    return this.reasonCode ? `${this.kind}:${this.reasonCode}` : this.kind;
  }
}

/**
 * Venue order entry
 */
export interface IExecutionClient {
  /**
   * Submits a limit order and resolves with the venue-assigned order id
   */
  submitOrder(params: SubmitOrderParams): Promise<string>;

  /**
   * Requests cancellation of orders on one market
   */
  cancelOrders(market: string, orderIds: string[]): Promise<void>;
}

/**
 * Available collateral per asset
 */
export interface IBalanceSource {
  currentBalance(asset: string): Promise<Decimal>;
}
