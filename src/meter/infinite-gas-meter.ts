/**
 * kvgas — Infinite gas meter
 *
 * Counts gas without a limit, for simulation and gas estimation.
 * Never runs out of gas; only a wrap of the 64-bit counter is fatal.
 */

import type { Gas, GasMeter, GasReport } from '../types.js';
import { GasOverflowSignal, NegativeGasConsumedSignal } from './signals.js';
import { MAX_GAS, addGas, assertGas } from './uint64.js';

/** Create a meter with no limit and no breakdown. */
export function createInfiniteGasMeter(): GasMeter {
  let consumed: Gas = 0n;

  return {
    get kind(): 'infinite' {
      return 'infinite';
    },

    get gasConsumed(): Gas {
      return consumed;
    },

    get gasConsumedToLimit(): Gas {
      return consumed;
    },

    get limit(): Gas {
      return 0n;
    },

    get isPastLimit(): boolean {
      return false;
    },

    get isOutOfGas(): boolean {
      return false;
    },

    consumeGas(amount: Gas, descriptor: string): void {
      assertGas(amount, 'amount');

      const { sum, overflow } = addGas(consumed, amount);
      if (overflow) {
        consumed = MAX_GAS;
        throw new GasOverflowSignal(descriptor);
      }
      consumed = sum;
    },

    refundGas(amount: Gas, descriptor: string): void {
      assertGas(amount, 'amount');

      if (consumed < amount) {
        throw new NegativeGasConsumedSignal(descriptor);
      }
      consumed -= amount;
    },

    report(): GasReport | undefined {
      return undefined;
    },

    toString(): string {
      return `InfiniteGasMeter:\n  consumed: ${String(consumed)}`;
    },
  };
}
