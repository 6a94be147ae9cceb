/**
 * kvgas — Deterministic gas metering and pricing for key-value store access.
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  Gas,
  GasReport,
  GasMeterKind,
  GasMeter,
  GasConfig,
  UnitOfWorkConfig,
  UnitOfWorkSuccess,
  UnitOfWorkFailure,
  UnitOfWorkResult,
  GasError,
  GasErrorCode,
} from './types.js';

export { DEFAULT_GAS_LIMIT, DEFAULT_UNIT_LABEL } from './types.js';

// ---------------------------------------------------------------------------
// Meters
// ---------------------------------------------------------------------------

export { createGasMeter } from './meter/gas-meter.js';
export { createInfiniteGasMeter } from './meter/infinite-gas-meter.js';
export { MAX_GAS, isGas, assertGas, addGas } from './meter/uint64.js';
export type { GasSum } from './meter/uint64.js';
export {
  OutOfGasSignal,
  GasOverflowSignal,
  NegativeGasConsumedSignal,
  isGasSignal,
} from './meter/signals.js';
export type { GasSignal, GasSignalKind } from './meter/signals.js';

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

export {
  GasDescriptor,
  kvGasConfig,
  transientGasConfig,
  createGasConfig,
} from './config/gas-config.js';
export {
  consumeReadGas,
  consumeWriteGas,
  consumeHasGas,
  consumeDeleteGas,
  consumeIterNextGas,
} from './pricing/store-gas.js';

// ---------------------------------------------------------------------------
// Unit of Work
// ---------------------------------------------------------------------------

export {
  runUnitOfWork,
  estimateGas,
  resolveUnitOfWorkConfig,
  createUnitMeter,
  toGasError,
} from './execution/unit-of-work.js';

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

export { outOfGas, gasOverflow, negativeGasConsumed, workFailed } from './errors.js';

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
