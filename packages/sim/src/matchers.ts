/**
 * vitest custom matchers for one-hot signals.
 *
 * Usage:
 *   import { setupMatchers } from "@busarb/sim/matchers";
 *   setupMatchers();
 *
 *   expect(sim.dut.o_gnt).toBeOneHot();
 *   expect(sim.dut.o_gnt).toHaveOnlyBit(2);
 */

import { expect } from "vitest";

// ---------------------------------------------------------------------------
// Matcher declarations (augment vitest's Assertion interface)
// ---------------------------------------------------------------------------

interface OneHotMatchers<R = unknown> {
  /** Assert exactly one bit is set; `{ allowZero: true }` also accepts 0. */
  toBeOneHot(opts?: { allowZero?: boolean }): R;
  /** Assert the value is exactly `1 << index`. */
  toHaveOnlyBit(index: number): R;
}

declare module "vitest" {
  // Type parameter must match vitest's own declaration to merge.
  // eslint-disable-next-line @typescript-eslint/no-explicit-any, @typescript-eslint/no-empty-object-type
  interface Assertion<T = any> extends OneHotMatchers<T> {}
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface AsymmetricMatchersContaining extends OneHotMatchers {}
}

// ---------------------------------------------------------------------------
// Matcher implementations
// ---------------------------------------------------------------------------

function toBits(received: unknown): bigint {
  if (typeof received === "bigint") return received;
  if (typeof received === "number" && Number.isInteger(received)) {
    return BigInt(received);
  }
  throw new TypeError(
    `one-hot matchers require a bigint or integer signal value, got ${typeof received}`,
  );
}

function setBits(value: bigint): number[] {
  const bits: number[] = [];
  let rest = value;
  let index = 0;
  while (rest > 0n) {
    if (rest & 1n) bits.push(index);
    rest >>= 1n;
    index++;
  }
  return bits;
}

const customMatchers = {
  toBeOneHot(received: unknown, opts?: { allowZero?: boolean }) {
    const value = toBits(received);
    const bits = setBits(value);
    const pass = bits.length === 1 || (bits.length === 0 && opts?.allowZero === true);
    return {
      pass,
      message: () =>
        pass
          ? `expected 0b${value.toString(2)} NOT to be one-hot`
          : `expected 0b${value.toString(2)} to be one-hot, but bits [${bits.join(", ")}] are set`,
    };
  },

  toHaveOnlyBit(received: unknown, index: number) {
    const value = toBits(received);
    const pass = value === 1n << BigInt(index);
    return {
      pass,
      message: () =>
        pass
          ? `expected 0b${value.toString(2)} NOT to have only bit ${index} set`
          : `expected only bit ${index} set, but bits [${setBits(value).join(", ")}] are set`,
    };
  },
};

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Register custom matchers with vitest.
 * Call once in a setup file or at the top of your test.
 */
export function setupMatchers(): void {
  expect.extend(customMatchers);
}
