/**
 * Limit-Order Mirror - Main Entry Point
 * Mirrors source wallets' limit orders on an order-book venue and reconciles
 * the mirror's order and position state
 */

export * from './models';
export * from './services';
export * from './connectors';
export * from './config';
export * from './utils';
