/**
 * kvgas — Unit of work
 *
 * Runs caller code against a fresh gas meter and turns the meter's
 * signals into a typed result. The work is abandoned at the first signal
 * and never resumed or retried; a signal the work catches itself still
 * aborts the unit.
 */

import type {
  GasMeter,
  UnitOfWorkConfig,
  UnitOfWorkFailure,
  UnitOfWorkResult,
} from '../types.js';
import { DEFAULT_GAS_LIMIT, DEFAULT_UNIT_LABEL } from '../types.js';
import type { GasError } from '../errors.js';
import { gasOverflow, negativeGasConsumed, outOfGas, workFailed } from '../errors.js';
import { createGasMeter } from '../meter/gas-meter.js';
import { createInfiniteGasMeter } from '../meter/infinite-gas-meter.js';
import { isGasSignal, type GasSignal } from '../meter/signals.js';
import { assertGas } from '../meter/uint64.js';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Fill in defaults and validate a unit-of-work configuration.
 *
 * @throws RangeError if `gasLimit` is not a valid gas amount.
 */
export function resolveUnitOfWorkConfig(overrides: Partial<UnitOfWorkConfig> = {}): UnitOfWorkConfig {
  const config: UnitOfWorkConfig = {
    gasLimit: DEFAULT_GAS_LIMIT,
    costBreakdown: false,
    simulate: false,
    label: DEFAULT_UNIT_LABEL,
    ...overrides,
  };
  assertGas(config.gasLimit, 'gasLimit');
  return Object.freeze(config);
}

/** Create the meter a unit of work runs against. */
export function createUnitMeter(config: UnitOfWorkConfig): GasMeter {
  if (config.simulate) {
    return createInfiniteGasMeter();
  }
  return createGasMeter(config.gasLimit, config.costBreakdown);
}

// ---------------------------------------------------------------------------
// Signal Translation
// ---------------------------------------------------------------------------

/** Convert a caught gas signal into a GasError with the meter's final state. */
export function toGasError(signal: GasSignal, meter: GasMeter): GasError {
  switch (signal.kind) {
    case 'out_of_gas':
      return outOfGas(signal.descriptor, meter.gasConsumed, meter.limit);
    case 'gas_overflow':
      return gasOverflow(signal.descriptor, meter.gasConsumed, meter.limit);
    case 'negative_gas_consumed':
      return negativeGasConsumed(signal.descriptor, meter.gasConsumed, meter.limit);
  }
}

function gasFields(meter: GasMeter): Record<string, string> {
  return {
    gasConsumed: String(meter.gasConsumed),
    gasLimit: String(meter.limit),
  };
}

// ---------------------------------------------------------------------------
// Signal Recording
// ---------------------------------------------------------------------------

/** A meter handed to caller code, remembering the last signal it raised. */
interface RecordingMeter {
  readonly meter: GasMeter;
  readonly lastSignal: GasSignal | null;
}

/**
 * Wrap a meter so a signal stays on record even if the caller catches it.
 * A unit of work whose meter raised any signal is aborted regardless of
 * what the work does afterwards.
 */
function recordSignals(inner: GasMeter): RecordingMeter {
  let lastSignal: GasSignal | null = null;

  function recorded(fn: () => void): void {
    try {
      fn();
    } catch (err: unknown) {
      if (isGasSignal(err)) {
        lastSignal = err;
      }
      throw err;
    }
  }

  const meter: GasMeter = {
    get kind() {
      return inner.kind;
    },
    get gasConsumed() {
      return inner.gasConsumed;
    },
    get gasConsumedToLimit() {
      return inner.gasConsumedToLimit;
    },
    get limit() {
      return inner.limit;
    },
    get isPastLimit() {
      return inner.isPastLimit;
    },
    get isOutOfGas() {
      return inner.isOutOfGas;
    },
    consumeGas(amount, descriptor): void {
      recorded(() => {
        inner.consumeGas(amount, descriptor);
      });
    },
    refundGas(amount, descriptor): void {
      recorded(() => {
        inner.refundGas(amount, descriptor);
      });
    },
    report() {
      return inner.report();
    },
    toString() {
      return inner.toString();
    },
  };

  return {
    meter,
    get lastSignal() {
      return lastSignal;
    },
  };
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

let defaultLogger: Logger | null = null;

function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}

function failure(error: GasError, meter: GasMeter): UnitOfWorkFailure {
  return {
    ok: false,
    error,
    gasConsumed: meter.gasConsumed,
    gasConsumedToLimit: meter.gasConsumedToLimit,
    report: meter.report(),
  };
}

/**
 * Run `work` synchronously against a new meter built from `config`.
 *
 * The unit fails if any gas signal was raised, even one the work caught
 * itself, and if the work returns a promise.
 *
 * @param config - Unit-of-work configuration (see resolveUnitOfWorkConfig).
 * @param work - Caller code. Receives the meter and charges it as it goes.
 * @param logger - Logger for completion and abort lines. Default: createLogger().
 * @returns The work's value with gas figures, or the error that aborted it.
 */
export function runUnitOfWork<T>(
  config: UnitOfWorkConfig,
  work: (meter: GasMeter) => T,
  logger: Logger = getDefaultLogger(),
): UnitOfWorkResult<T> {
  const recorder = recordSignals(createUnitMeter(config));
  const meter = recorder.meter;

  let value: T;
  try {
    value = work(meter);
  } catch (err: unknown) {
    if (isGasSignal(err)) {
      const error = toGasError(err, meter);
      logger.warn(
        { unit: config.label, code: error.code, descriptor: err.descriptor, ...gasFields(meter) },
        'unit of work aborted',
      );
      return failure(error, meter);
    }

    const message = err instanceof Error ? err.message : String(err);
    const error = workFailed(message);
    logger.warn({ unit: config.label, code: error.code, err, ...gasFields(meter) }, 'unit of work failed');
    return failure(error, meter);
  }

  const swallowed = recorder.lastSignal;
  if (swallowed !== null) {
    const error = toGasError(swallowed, meter);
    logger.warn(
      { unit: config.label, code: error.code, descriptor: swallowed.descriptor, ...gasFields(meter) },
      'unit of work continued after a gas signal',
    );
    return failure(error, meter);
  }

  if (isThenable(value)) {
    const error = workFailed('unit of work returned a promise; work must be synchronous');
    logger.warn({ unit: config.label, code: error.code, ...gasFields(meter) }, 'unit of work failed');
    // The promise keeps running detached from the unit; its rejection is only logged.
    Promise.resolve(value).catch((err: unknown) => {
      logger.warn({ unit: config.label, err }, 'detached work rejected');
    });
    return failure(error, meter);
  }

  logger.debug({ unit: config.label, ...gasFields(meter) }, 'unit of work completed');

  return {
    ok: true,
    value,
    gasConsumed: meter.gasConsumed,
    gasLimit: meter.limit,
    report: meter.report(),
  };
}

/** Estimate the gas `work` needs by running it against an infinite meter. */
export function estimateGas<T>(
  work: (meter: GasMeter) => T,
  logger?: Logger,
): UnitOfWorkResult<T> {
  const config = resolveUnitOfWorkConfig({ simulate: true, label: 'estimate' });
  return runUnitOfWork(config, work, logger);
}
