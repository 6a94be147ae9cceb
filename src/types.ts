/**
 * kvgas — Core type definitions
 *
 * Public types for deterministic gas accounting over key-value store access.
 */

// ---------------------------------------------------------------------------
// Gas
// ---------------------------------------------------------------------------

/** Unsigned 64-bit gas quantity. Always within `[0n, MAX_GAS]`. */
export type Gas = bigint;

/** Cumulative gas charged per descriptor. */
export type GasReport = ReadonlyMap<string, Gas>;

/** Which meter implementation backs a GasMeter. */
export type GasMeterKind = 'basic' | 'infinite';

// ---------------------------------------------------------------------------
// Gas Meter
// ---------------------------------------------------------------------------

/**
 * Gas accounting for one unit of work.
 *
 * `consumeGas` and `refundGas` throw one of the gas signals on a fatal
 * condition. A caller that sees a signal must abandon the unit of work.
 */
export interface GasMeter {
  readonly kind: GasMeterKind;
  /** Cumulative gas consumed, including a charge that crossed the limit. */
  readonly gasConsumed: Gas;
  /** `gasConsumed`, clamped to `limit` once the limit has been exceeded. */
  readonly gasConsumedToLimit: Gas;
  /** Configured limit. Always 0 for an infinite meter. */
  readonly limit: Gas;
  /** True once consumed is strictly above the limit. */
  readonly isPastLimit: boolean;
  /** True once consumed has reached the limit. */
  readonly isOutOfGas: boolean;
  /**
   * Charge gas against the meter.
   * @throws GasOverflowSignal when the 64-bit counter would wrap.
   * @throws OutOfGasSignal when the new total exceeds the limit.
   */
  consumeGas(amount: Gas, descriptor: string): void;
  /**
   * Return previously charged gas.
   * @throws NegativeGasConsumedSignal when `amount` exceeds the consumed total.
   */
  refundGas(amount: Gas, descriptor: string): void;
  /** Per-descriptor breakdown, or undefined when tracking is disabled. */
  report(): GasReport | undefined;
  toString(): string;
}

// ---------------------------------------------------------------------------
// Store Pricing
// ---------------------------------------------------------------------------

/** Gas prices for each key-value store operation. */
export interface GasConfig {
  readonly hasCost: Gas;
  readonly deleteCost: Gas;
  readonly readCostFlat: Gas;
  readonly readCostPerByte: Gas;
  readonly writeCostFlat: Gas;
  readonly writeCostPerByte: Gas;
  readonly iterNextCostFlat: Gas;
}

// ---------------------------------------------------------------------------
// Unit of Work
// ---------------------------------------------------------------------------

/** Default values for UnitOfWorkConfig. */
export const DEFAULT_GAS_LIMIT: Gas = 10_000_000n;
export const DEFAULT_UNIT_LABEL = 'unit';

/** Configuration for one metered unit of work (e.g. a transaction). */
export interface UnitOfWorkConfig {
  /** Limit for the bounded meter. Ignored when `simulate` is set. Default: 10,000,000. */
  readonly gasLimit: Gas;
  /** Track a per-descriptor breakdown. Default: false. */
  readonly costBreakdown: boolean;
  /** Run against an infinite meter, as gas estimation does. Default: false. */
  readonly simulate: boolean;
  /** Name used in log lines. Default: 'unit'. */
  readonly label: string;
}

/** Successful unit of work. */
export interface UnitOfWorkSuccess<T> {
  readonly ok: true;
  readonly value: T;
  readonly gasConsumed: Gas;
  readonly gasLimit: Gas;
  readonly report: GasReport | undefined;
}

/** Aborted unit of work. */
export interface UnitOfWorkFailure {
  readonly ok: false;
  readonly error: import('./errors.js').GasError;
  readonly gasConsumed: Gas;
  readonly gasConsumedToLimit: Gas;
  readonly report: GasReport | undefined;
}

/** Outcome of running a unit of work against a fresh meter. */
export type UnitOfWorkResult<T> = UnitOfWorkSuccess<T> | UnitOfWorkFailure;

// ---------------------------------------------------------------------------
// Re-export GasError from errors module (type-only)
// ---------------------------------------------------------------------------

export type { GasError, GasErrorCode } from './errors.js';
