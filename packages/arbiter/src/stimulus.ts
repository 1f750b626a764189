/**
 * Randomized stimulus for stress runs.
 *
 * Request and lock bits are drawn independently per client and cycle
 * (request likely, lock rare); the weight table is redrawn every
 * `weightPeriod` cycles. Sequences are reproducible from `seed`.
 */

import fc, { type Arbitrary } from "fast-check";
import type { ArbiterParams, StressConfig } from "./config.js";
import type { CycleStimulus } from "./driver.js";

/** Probability resolution of a single random bit. */
const RESOLUTION = 1 << 16;

function biasedBit(probability: number): Arbitrary<boolean> {
  const threshold = Math.round(probability * RESOLUTION);
  return fc.integer({ min: 0, max: RESOLUTION - 1 }).map((draw) => draw < threshold);
}

export function bitVectorArbitrary(clients: number, probability: number): Arbitrary<bigint> {
  return fc
    .array(biasedBit(probability), { minLength: clients, maxLength: clients })
    .map((bits) => bits.reduce((vector, bit, i) => (bit ? vector | (1n << BigInt(i)) : vector), 0n));
}

export function weightTableArbitrary(params: ArbiterParams): Arbitrary<number[]> {
  return fc.array(fc.integer({ min: 0, max: (1 << params.weightWidth) - 1 }), {
    minLength: params.clients,
    maxLength: params.clients,
  });
}

/**
 * Arbitrary producing whole stimulus sequences of `cycles` cycles.
 * Also used directly by property tests.
 */
export function stimulusArbitrary(
  params: ArbiterParams,
  stress: Omit<StressConfig, "seed">,
): Arbitrary<CycleStimulus[]> {
  const tables = Math.ceil(stress.cycles / stress.weightPeriod);
  const cycle = fc.record({
    request: bitVectorArbitrary(params.clients, stress.requestProbability),
    lock: bitVectorArbitrary(params.clients, stress.lockProbability),
  });
  return fc
    .record({
      cycles: fc.array(cycle, { minLength: stress.cycles, maxLength: stress.cycles }),
      weights: fc.array(weightTableArbitrary(params), { minLength: tables, maxLength: tables }),
    })
    .map(({ cycles, weights }) =>
      cycles.map((stimulus, i) => {
        const table = i % stress.weightPeriod === 0 ? weights[i / stress.weightPeriod] : undefined;
        return table ? { ...stimulus, weights: table } : stimulus;
      }),
    );
}

/**
 * One reproducible stimulus sequence for the given seed.
 *
 * Drawn without fast-check's bias so the realized request and lock rates
 * and the weight spread follow the configured distribution.
 */
export function randomStimulus(params: ArbiterParams, stress: StressConfig): CycleStimulus[] {
  const [sequence] = fc.sample(fc.noBias(stimulusArbitrary(params, stress)), {
    seed: stress.seed,
    numRuns: 1,
  });
  return sequence ?? [];
}
