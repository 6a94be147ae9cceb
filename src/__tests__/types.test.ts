import { describe, it, expect } from 'vitest';
import type {
  GasReport,
  GasMeter,
  GasConfig,
  UnitOfWorkConfig,
  UnitOfWorkResult,
  GasError,
  GasErrorCode,
} from '../types.js';
import { DEFAULT_GAS_LIMIT, DEFAULT_UNIT_LABEL } from '../types.js';
import { outOfGas, gasOverflow, negativeGasConsumed, workFailed } from '../errors.js';
import { createGasMeter } from '../meter/gas-meter.js';
import { kvGasConfig } from '../config/gas-config.js';

// ---------------------------------------------------------------------------
// Helpers — compile-time type assertions
// ---------------------------------------------------------------------------

function assertType<T>(_value: T): void {
  // compile-time only
}

// ---------------------------------------------------------------------------
// Default Constants
// ---------------------------------------------------------------------------

describe('default constants', () => {
  it('has correct default values', () => {
    expect(DEFAULT_GAS_LIMIT).toBe(10_000_000n);
    expect(DEFAULT_UNIT_LABEL).toBe('unit');
  });
});

// ---------------------------------------------------------------------------
// Type shapes
// ---------------------------------------------------------------------------

describe('type shapes', () => {
  it('GasMeter, GasConfig and GasReport are produced by the factories', () => {
    const meter = createGasMeter(1n, true);
    assertType<GasMeter>(meter);
    assertType<GasConfig>(kvGasConfig());
    assertType<GasReport | undefined>(meter.report());
    expect(meter.report()).toBeInstanceOf(Map);
  });

  it('UnitOfWorkConfig and UnitOfWorkResult accept their documented shapes', () => {
    const config: UnitOfWorkConfig = {
      gasLimit: 1n,
      costBreakdown: false,
      simulate: false,
      label: 'x',
    };
    const failure: UnitOfWorkResult<number> = {
      ok: false,
      error: workFailed('boom'),
      gasConsumed: 0n,
      gasConsumedToLimit: 0n,
      report: undefined,
    };
    assertType<UnitOfWorkConfig>(config);
    expect(failure.ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

describe('error constructors', () => {
  it('outOfGas', () => {
    expect(outOfGas('WriteFlat', 11n, 10n)).toEqual({
      code: 'OUT_OF_GAS',
      descriptor: 'WriteFlat',
      gasConsumed: 11n,
      gasLimit: 10n,
    });
  });

  it('gasOverflow', () => {
    const err = gasOverflow('ReadPerByte', 5n, 0n);
    expect(err.code).toBe('GAS_OVERFLOW');
  });

  it('negativeGasConsumed', () => {
    const err = negativeGasConsumed('Refund', 1n, 2n);
    expect(err).toEqual({ code: 'NEGATIVE_GAS_CONSUMED', descriptor: 'Refund', gasConsumed: 1n, gasLimit: 2n });
  });

  it('workFailed', () => {
    expect(workFailed('boom')).toEqual({ code: 'WORK_FAILED', message: 'boom' });
  });

  it('covers every error code', () => {
    const errors: GasError[] = [
      outOfGas('a', 0n, 0n),
      gasOverflow('a', 0n, 0n),
      negativeGasConsumed('a', 0n, 0n),
      workFailed('a'),
    ];
    const codes: GasErrorCode[] = errors.map((e) => e.code);
    expect(codes).toEqual(['OUT_OF_GAS', 'GAS_OVERFLOW', 'NEGATIVE_GAS_CONSUMED', 'WORK_FAILED']);
  });
});
