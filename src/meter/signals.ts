/**
 * kvgas — Gas signals
 *
 * Thrown by a meter when a unit of work must stop. Each carries the
 * descriptor of the charge or refund that raised it. The unit-of-work
 * boundary catches them and converts them to GasError values.
 */

// ---------------------------------------------------------------------------
// Signal Kinds
// ---------------------------------------------------------------------------

export type GasSignalKind = 'out_of_gas' | 'gas_overflow' | 'negative_gas_consumed';

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

/** Thrown when consumption exceeds the meter's limit. */
export class OutOfGasSignal extends Error {
  readonly kind = 'out_of_gas' as const;
  readonly descriptor: string;

  constructor(descriptor: string) {
    super(`out of gas in location: ${descriptor}`);
    this.name = 'OutOfGasSignal';
    this.descriptor = descriptor;
  }
}

/** Thrown when the consumed counter would wrap past 2^64 - 1. */
export class GasOverflowSignal extends Error {
  readonly kind = 'gas_overflow' as const;
  readonly descriptor: string;

  constructor(descriptor: string) {
    super(`gas overflow in location: ${descriptor}`);
    this.name = 'GasOverflowSignal';
    this.descriptor = descriptor;
  }
}

/** Thrown when a refund is larger than the gas consumed so far. */
export class NegativeGasConsumedSignal extends Error {
  readonly kind = 'negative_gas_consumed' as const;
  readonly descriptor: string;

  constructor(descriptor: string) {
    super(`negative gas consumed in location: ${descriptor}`);
    this.name = 'NegativeGasConsumedSignal';
    this.descriptor = descriptor;
  }
}

export type GasSignal = OutOfGasSignal | GasOverflowSignal | NegativeGasConsumedSignal;

/** Narrow an unknown thrown value to one of the gas signals. */
export function isGasSignal(err: unknown): err is GasSignal {
  return (
    err instanceof OutOfGasSignal ||
    err instanceof GasOverflowSignal ||
    err instanceof NegativeGasConsumedSignal
  );
}
