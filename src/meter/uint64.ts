/**
 * kvgas — Unsigned 64-bit gas arithmetic
 */

import type { Gas } from '../types.js';

/** Largest representable gas amount, 2^64 - 1. */
export const MAX_GAS: Gas = 0xffff_ffff_ffff_ffffn;

/** Whether the value is a bigint inside the unsigned 64-bit range. */
export function isGas(value: unknown): value is Gas {
  return typeof value === 'bigint' && value >= 0n && value <= MAX_GAS;
}

/**
 * Reject anything that is not a valid gas amount.
 *
 * @param value - Value to check.
 * @param label - Name used in the error message.
 * @throws RangeError if the value is not a bigint in `[0, MAX_GAS]`.
 */
export function assertGas(value: unknown, label: string): asserts value is Gas {
  if (!isGas(value)) {
    throw new RangeError(`${label} must be a gas amount in [0, ${String(MAX_GAS)}], got ${String(value)}`);
  }
}

/** Result of an overflow-checked addition. */
export interface GasSum {
  readonly sum: Gas;
  readonly overflow: boolean;
}

/**
 * Add two gas amounts, reporting whether the result would leave the 64-bit range.
 * On overflow `sum` is 0.
 */
export function addGas(a: Gas, b: Gas): GasSum {
  if (MAX_GAS - a < b) {
    return { sum: 0n, overflow: true };
  }
  return { sum: a + b, overflow: false };
}
