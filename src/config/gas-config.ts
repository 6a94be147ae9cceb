/**
 * kvgas — Store gas pricing tables
 *
 * Flat and per-byte prices a key-value store charges for each operation.
 * Every call returns a freshly built, frozen table.
 */

import type { GasConfig } from '../types.js';
import { assertGas } from '../meter/uint64.js';

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

/** Descriptors the store layer passes to `consumeGas`. */
export const GasDescriptor = {
  IterNextFlat: 'IterNextFlat',
  ValuePerByte: 'ValuePerByte',
  WritePerByte: 'WritePerByte',
  ReadPerByte: 'ReadPerByte',
  WriteFlat: 'WriteFlat',
  ReadFlat: 'ReadFlat',
  Has: 'Has',
  Delete: 'Delete',
} as const;

export type GasDescriptor = (typeof GasDescriptor)[keyof typeof GasDescriptor];

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

/** Default pricing for persistent stores. */
export function kvGasConfig(): GasConfig {
  return Object.freeze({
    hasCost: 1000n,
    deleteCost: 1000n,
    readCostFlat: 1000n,
    readCostPerByte: 3n,
    writeCostFlat: 2000n,
    writeCostPerByte: 30n,
    iterNextCostFlat: 30n,
  });
}

/** Default pricing for transient stores, which are discarded after each block. */
export function transientGasConfig(): GasConfig {
  return Object.freeze({
    hasCost: 100n,
    deleteCost: 100n,
    readCostFlat: 100n,
    readCostPerByte: 0n,
    writeCostFlat: 200n,
    writeCostPerByte: 3n,
    iterNextCostFlat: 3n,
  });
}

// ---------------------------------------------------------------------------
// Custom Tables
// ---------------------------------------------------------------------------

const GAS_CONFIG_FIELDS = [
  'hasCost',
  'deleteCost',
  'readCostFlat',
  'readCostPerByte',
  'writeCostFlat',
  'writeCostPerByte',
  'iterNextCostFlat',
] as const satisfies readonly (keyof GasConfig)[];

/**
 * Build a pricing table from a base preset and per-field overrides.
 *
 * @param overrides - Fields to replace.
 * @param base - Table to start from. Default: `kvGasConfig()`.
 * @returns A frozen GasConfig.
 * @throws RangeError if any resulting price is not a valid gas amount.
 */
export function createGasConfig(
  overrides: Partial<GasConfig>,
  base: GasConfig = kvGasConfig(),
): GasConfig {
  const config: GasConfig = { ...base, ...overrides };
  for (const field of GAS_CONFIG_FIELDS) {
    assertGas(config[field], field);
  }
  return Object.freeze(config);
}
