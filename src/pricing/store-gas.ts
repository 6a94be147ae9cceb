/**
 * kvgas — Store operation charges
 *
 * Turns a store operation and the sizes of its key and value into meter
 * charges under the canonical descriptors. Signals thrown by the meter
 * propagate unchanged to the caller.
 */

import type { Gas, GasConfig, GasMeter } from '../types.js';
import { GasDescriptor } from '../config/gas-config.js';
import { GasOverflowSignal } from '../meter/signals.js';
import { MAX_GAS } from '../meter/uint64.js';

/**
 * Convert a byte length to gas units.
 * @throws RangeError if the length is not a non-negative safe integer.
 */
function byteLength(length: number, label: string): Gas {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${String(length)}`);
  }
  return BigInt(length);
}

/**
 * Charge `price * bytes` under `descriptor`.
 * A product that does not fit in 64 bits overflows whatever the meter holds,
 * so it raises GasOverflowSignal without reaching the meter.
 */
function consumePerByteGas(meter: GasMeter, price: Gas, bytes: Gas, descriptor: string): void {
  const amount = price * bytes;
  if (amount > MAX_GAS) {
    throw new GasOverflowSignal(descriptor);
  }
  meter.consumeGas(amount, descriptor);
}

/** Charge a point read: flat cost, then per byte of key and of value. */
export function consumeReadGas(
  meter: GasMeter,
  config: GasConfig,
  keyLength: number,
  valueLength: number,
): void {
  const keyBytes = byteLength(keyLength, 'keyLength');
  const valueBytes = byteLength(valueLength, 'valueLength');

  meter.consumeGas(config.readCostFlat, GasDescriptor.ReadFlat);
  consumePerByteGas(meter, config.readCostPerByte, keyBytes, GasDescriptor.ReadPerByte);
  consumePerByteGas(meter, config.readCostPerByte, valueBytes, GasDescriptor.ReadPerByte);
}

/** Charge a write: flat cost, then per byte of key and of value. */
export function consumeWriteGas(
  meter: GasMeter,
  config: GasConfig,
  keyLength: number,
  valueLength: number,
): void {
  const keyBytes = byteLength(keyLength, 'keyLength');
  const valueBytes = byteLength(valueLength, 'valueLength');

  meter.consumeGas(config.writeCostFlat, GasDescriptor.WriteFlat);
  consumePerByteGas(meter, config.writeCostPerByte, keyBytes, GasDescriptor.WritePerByte);
  consumePerByteGas(meter, config.writeCostPerByte, valueBytes, GasDescriptor.WritePerByte);
}

/** Charge an existence check. */
export function consumeHasGas(meter: GasMeter, config: GasConfig): void {
  meter.consumeGas(config.hasCost, GasDescriptor.Has);
}

/** Charge a delete. */
export function consumeDeleteGas(meter: GasMeter, config: GasConfig): void {
  meter.consumeGas(config.deleteCost, GasDescriptor.Delete);
}

/**
 * Charge one iterator step: flat cost, then the read price per byte of the
 * entry the iterator lands on.
 */
export function consumeIterNextGas(
  meter: GasMeter,
  config: GasConfig,
  keyLength: number,
  valueLength: number,
): void {
  const keyBytes = byteLength(keyLength, 'keyLength');
  const valueBytes = byteLength(valueLength, 'valueLength');

  meter.consumeGas(config.iterNextCostFlat, GasDescriptor.IterNextFlat);
  consumePerByteGas(meter, config.readCostPerByte, keyBytes + valueBytes, GasDescriptor.ValuePerByte);
}
