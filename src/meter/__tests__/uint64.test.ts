/**
 * kvgas — Gas arithmetic unit tests
 */

import { describe, it, expect } from 'vitest';
import { MAX_GAS, addGas, assertGas, isGas } from '../uint64.js';

describe('MAX_GAS', () => {
  it('is 2^64 - 1', () => {
    expect(MAX_GAS).toBe(18_446_744_073_709_551_615n);
    expect(MAX_GAS).toBe(2n ** 64n - 1n);
  });
});

describe('isGas', () => {
  it('accepts bigints in range', () => {
    expect(isGas(0n)).toBe(true);
    expect(isGas(MAX_GAS)).toBe(true);
  });

  it('rejects values outside the range or of the wrong type', () => {
    expect(isGas(-1n)).toBe(false);
    expect(isGas(MAX_GAS + 1n)).toBe(false);
    expect(isGas(10)).toBe(false);
    expect(isGas('10')).toBe(false);
  });
});

describe('assertGas', () => {
  it('names the label in the error', () => {
    expect(() => {
      assertGas(-5n, 'amount');
    }).toThrow('amount must be a gas amount in [0, 18446744073709551615], got -5');
  });

  it('passes valid amounts', () => {
    expect(() => {
      assertGas(5n, 'amount');
    }).not.toThrow();
  });
});

describe('addGas', () => {
  it('adds without overflow', () => {
    expect(addGas(2n, 3n)).toEqual({ sum: 5n, overflow: false });
  });

  it('reaches MAX_GAS exactly', () => {
    expect(addGas(MAX_GAS - 1n, 1n)).toEqual({ sum: MAX_GAS, overflow: false });
  });

  it('reports overflow past MAX_GAS', () => {
    expect(addGas(MAX_GAS, 1n)).toEqual({ sum: 0n, overflow: true });
    expect(addGas(MAX_GAS - 1n, 5n)).toEqual({ sum: 0n, overflow: true });
  });
});
