/**
 * kvgas — Bounded gas meter
 *
 * Tracks gas consumed by one unit of work against a hard limit.
 * Crossing the limit throws an OutOfGasSignal after the charge has been
 * recorded, so `gasConsumed` reflects the attempted total. Wrapping the
 * 64-bit counter clamps it to MAX_GAS and throws a GasOverflowSignal.
 *
 * The optional breakdown only records charges that completed without a
 * signal. The charge that crosses the limit is in `gasConsumed` but not in
 * the report.
 */

import type { Gas, GasMeter, GasReport } from '../types.js';
import { GasOverflowSignal, NegativeGasConsumedSignal, OutOfGasSignal } from './signals.js';
import { MAX_GAS, addGas, assertGas } from './uint64.js';

/**
 * Create a gas meter with the given limit.
 *
 * @param limit - Maximum gas the unit of work may consume. 0 permits no charge.
 * @param costBreakdownEnabled - Keep a per-descriptor report.
 * @returns A mutable GasMeter.
 */
export function createGasMeter(limit: Gas, costBreakdownEnabled = false): GasMeter {
  assertGas(limit, 'limit');

  let consumed: Gas = 0n;
  const breakdown: Map<string, Gas> | null = costBreakdownEnabled ? new Map<string, Gas>() : null;

  return {
    get kind(): 'basic' {
      return 'basic';
    },

    get gasConsumed(): Gas {
      return consumed;
    },

    get gasConsumedToLimit(): Gas {
      return consumed > limit ? limit : consumed;
    },

    get limit(): Gas {
      return limit;
    },

    get isPastLimit(): boolean {
      return consumed > limit;
    },

    get isOutOfGas(): boolean {
      return consumed >= limit;
    },

    consumeGas(amount: Gas, descriptor: string): void {
      assertGas(amount, 'amount');

      const { sum, overflow } = addGas(consumed, amount);
      if (overflow) {
        consumed = MAX_GAS;
        throw new GasOverflowSignal(descriptor);
      }

      consumed = sum;
      if (consumed > limit) {
        throw new OutOfGasSignal(descriptor);
      }

      if (breakdown !== null) {
        breakdown.set(descriptor, (breakdown.get(descriptor) ?? 0n) + amount);
      }
    },

    refundGas(amount: Gas, descriptor: string): void {
      assertGas(amount, 'amount');

      if (consumed < amount) {
        throw new NegativeGasConsumedSignal(descriptor);
      }

      consumed -= amount;

      if (breakdown !== null) {
        // Saturates: a descriptor refunded beyond its own charges stays at 0.
        const charged = breakdown.get(descriptor) ?? 0n;
        breakdown.set(descriptor, charged > amount ? charged - amount : 0n);
      }
    },

    report(): GasReport | undefined {
      return breakdown === null ? undefined : new Map(breakdown);
    },

    toString(): string {
      return `BasicGasMeter:\n  limit: ${String(limit)}\n  consumed: ${String(consumed)}`;
    },
  };
}
