/**
 * kvgas — Error types
 *
 * Discriminated union of the outcomes that abort a unit of work,
 * plus factory functions for constructing each variant.
 */

import type { Gas } from './types.js';

// ---------------------------------------------------------------------------
// Error Codes
// ---------------------------------------------------------------------------

/** All possible error codes produced at the unit-of-work boundary. */
export type GasErrorCode =
  | 'OUT_OF_GAS'
  | 'GAS_OVERFLOW'
  | 'NEGATIVE_GAS_CONSUMED'
  | 'WORK_FAILED';

// ---------------------------------------------------------------------------
// Error Union
// ---------------------------------------------------------------------------

/** Discriminated union of all unit-of-work errors. */
export type GasError =
  | {
      readonly code: 'OUT_OF_GAS';
      readonly descriptor: string;
      readonly gasConsumed: Gas;
      readonly gasLimit: Gas;
    }
  | {
      readonly code: 'GAS_OVERFLOW';
      readonly descriptor: string;
      readonly gasConsumed: Gas;
      readonly gasLimit: Gas;
    }
  | {
      readonly code: 'NEGATIVE_GAS_CONSUMED';
      readonly descriptor: string;
      readonly gasConsumed: Gas;
      readonly gasLimit: Gas;
    }
  | {
      readonly code: 'WORK_FAILED';
      readonly message: string;
    };

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create an OUT_OF_GAS error. */
export function outOfGas(descriptor: string, gasConsumed: Gas, gasLimit: Gas): GasError {
  return { code: 'OUT_OF_GAS', descriptor, gasConsumed, gasLimit } as const;
}

/** Create a GAS_OVERFLOW error. */
export function gasOverflow(descriptor: string, gasConsumed: Gas, gasLimit: Gas): GasError {
  return { code: 'GAS_OVERFLOW', descriptor, gasConsumed, gasLimit } as const;
}

/** Create a NEGATIVE_GAS_CONSUMED error. */
export function negativeGasConsumed(descriptor: string, gasConsumed: Gas, gasLimit: Gas): GasError {
  return { code: 'NEGATIVE_GAS_CONSUMED', descriptor, gasConsumed, gasLimit } as const;
}

/** Create a WORK_FAILED error. */
export function workFailed(message: string): GasError {
  return { code: 'WORK_FAILED', message } as const;
}
