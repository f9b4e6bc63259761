/**
 * Shared zod building blocks for decimal, id and address fields
 */

import { z } from 'zod';
import { Decimal, toDecimal } from './decimals';

export interface DecimalCheck {
  test: (value: Decimal) => boolean;
  message: string;
}

/**
 * Accepts a Decimal, a numeric string or a finite number and yields a Decimal
 */
export function decimalField(check?: DecimalCheck) {
  return z.union([z.instanceof(Decimal), z.string(), z.number()]).transform((value, ctx) => {
    let parsed: Decimal;
    try {
      parsed = toDecimal(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal value: ${String(value)}` });
      return z.NEVER;
    }
    if (check && !check.test(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: check.message });
      return z.NEVER;
    }
    return parsed;
  });
}

export const positiveDecimal = () => decimalField({ test: value => value.gt(0), message: 'Must be greater than 0' });
export const nonNegativeDecimal = () => decimalField({ test: value => value.gte(0), message: 'Must not be negative' });
export const fractionDecimal = () => decimalField({ test: value => value.gt(0) && value.lte(1), message: 'Must be in (0, 1]' });

/** Lower-cased, trimmed, non-empty. Addresses and markets compare case-insensitively. */
export const addressField = () => z.string().trim().min(1).transform(value => value.toLowerCase());

/** Non-negative integer, as a number or a digit string; always yields the string form. */
export const integerIdField = () =>
  z.union([
    z.number().int().nonnegative().transform(value => value.toString()),
    z.string().trim().regex(/^\d+$/, 'Must be a non-negative integer').transform(value => BigInt(value).toString())
  ]);
