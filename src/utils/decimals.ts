/**
 * Decimal helpers for prices, sizes and notionals
 */

import { Decimal as BaseDecimal } from 'decimal.js';

/**
 * Significant digits kept by every arithmetic result. Token amounts carry up
 * to 18 fractional digits on top of large integer parts, which overflows the
 * library default of 20.
 */
export const DECIMAL_PRECISION = 100;

export const Decimal = BaseDecimal.clone({ precision: DECIMAL_PRECISION });
export type Decimal = BaseDecimal;

export const ZERO = new Decimal(0);

export type TickRounding = 'round_up' | 'round_down';

export type DecimalInput = Decimal | string | number;

/**
 * Parses a decimal from a string, finite number or Decimal, throwing on
 * anything else. Decimals built elsewhere are rebound to DECIMAL_PRECISION.
 */
export function toDecimal(value: DecimalInput): Decimal {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new Error(`Invalid decimal value: ${value}`);
  }
  const parsed = new Decimal(value);
  if (!parsed.isFinite()) {
    throw new Error(`Invalid decimal value: ${String(value)}`);
  }
  return parsed;
}

/**
 * Aligns a price or size to a tick. Zero stays zero.
 */
export function roundToTick(value: Decimal, tick: Decimal, mode: TickRounding): Decimal {
  if (value.isNegative()) {
    throw new Error('value must be non-negative');
  }
  if (tick.lte(0)) {
    throw new Error('tick must be positive');
  }
  if (value.isZero()) {
    return ZERO;
  }

  const ticks = value.div(tick);
  const rounded = mode === 'round_down'
    ? ticks.toDecimalPlaces(0, Decimal.ROUND_DOWN)
    : ticks.toDecimalPlaces(0, Decimal.ROUND_UP);

  return rounded.mul(tick);
}

export function notional(size: Decimal, price: Decimal): Decimal {
  return size.abs().mul(price);
}

export function minDecimal(a: Decimal, b: Decimal): Decimal {
  return a.lte(b) ? a : b;
}
