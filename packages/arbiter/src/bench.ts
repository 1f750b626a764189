/**
 * Clocking adapters that give the driver one uniform "advance a cycle"
 * operation over either simulation front end.
 *
 * Both honour the same ordering: inputs written before `cycle()` are
 * stable at the rising edge, and outputs read after `cycle()` have
 * settled past that edge.
 */

import { Simulation, Simulator, type ModuleDefinition } from "@busarb/sim";
import { DEFAULT_CLOCK_CONFIG, type ClockConfig } from "./config.js";
import type { ArbiterPorts } from "./rtl.js";

export interface ArbiterBench {
  readonly kind: "tick" | "clocked";
  readonly dut: ArbiterPorts;
  /** Drive reset with all request/lock/weight inputs low, then release. */
  reset(): void;
  /** Advance exactly one rising clock edge and let outputs settle. */
  cycle(): void;
  /** Backend time (simulation time units, or edges for the tick bench). */
  time(): number;
  dispose(): void;
}

function zeroInputs(dut: ArbiterPorts): void {
  dut.i_req = 0n;
  dut.i_lock = 0n;
  dut.i_weight = 0n;
}

/** Event-based bench: one `tick()` per cycle, outputs settle lazily on read. */
export function createTickBench(module: ModuleDefinition<ArbiterPorts>): ArbiterBench {
  const sim = Simulator.create(module);
  let edges = 0;
  return {
    kind: "tick",
    dut: sim.dut,
    reset() {
      zeroInputs(sim.dut);
      sim.dut.rst_n = 0n;
      sim.tick();
      edges++;
      sim.dut.rst_n = 1n;
    },
    cycle() {
      sim.tick();
      edges++;
    },
    time: () => edges,
    dispose: () => sim.dispose(),
  };
}

/**
 * Time-based bench: a free-running clock; each cycle waits for the next
 * rising edge, then runs `settle` time units before the driver samples
 * outputs and applies the following inputs.
 */
export function createClockedBench(
  module: ModuleDefinition<ArbiterPorts>,
  clock: Partial<ClockConfig> = {},
): ArbiterBench {
  const { period, settle, resetDuration } = { ...DEFAULT_CLOCK_CONFIG, ...clock };
  if (settle >= period / 2) {
    throw new RangeError(
      `settle delay ${settle} must be shorter than half the clock period ${period}`,
    );
  }
  const sim = Simulation.create(module);
  sim.addClock("clk", { period });
  return {
    kind: "clocked",
    dut: sim.dut,
    reset() {
      zeroInputs(sim.dut);
      sim.reset("rst_n", { duration: resetDuration });
    },
    cycle() {
      const edge = sim.waitForCycles("clk", 1);
      sim.runUntil(edge + settle);
    },
    time: () => sim.time(),
    dispose: () => sim.dispose(),
  };
}

export type BenchKind = ArbiterBench["kind"];

export function createBench(
  kind: BenchKind,
  module: ModuleDefinition<ArbiterPorts>,
  clock?: Partial<ClockConfig>,
): ArbiterBench {
  return kind === "tick" ? createTickBench(module) : createClockedBench(module, clock);
}
