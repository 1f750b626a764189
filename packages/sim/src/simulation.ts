/**
 * Time-based Simulation: clocks are registered once and run freely;
 * the testbench advances time and waits for edges.
 *
 * ```ts
 * const sim = Simulation.create(arbiterModule({ clients: 4, weightWidth: 4 }));
 * sim.addClock("clk", { period: 10 });
 * sim.reset("rst_n");
 * const edge = sim.waitForCycles("clk", 1);
 * ```
 */

import type { ModuleDefinition, TimedBackend } from "./types.js";
import { SimulationTimeoutError } from "./types.js";
import { createTimedBackend } from "./behavioral.js";
import { FrontEnd } from "./frontend.js";
import { readSignal } from "./signal.js";

const DEFAULT_MAX_STEPS = 100_000;

export interface ResetOptions {
  /** Hold the reset for this many time units. */
  readonly duration?: number;
  /** Otherwise hold it for this many rising edges of its clock. Default 2. */
  readonly activeCycles?: number;
}

export class Simulation<P = Record<string, unknown>> extends FrontEnd<P, TimedBackend> {
  static create<P>(module: ModuleDefinition<P>): Simulation<P> {
    return new Simulation<P>(module);
  }

  private readonly clocks = new Set<string>();

  private constructor(module: ModuleDefinition<P>) {
    super("Simulation", module, createTimedBackend(module));
  }

  /** Start a free-running clock; its first rising edge is at `initialDelay + period / 2`. */
  addClock(name: string, opts: { period: number; initialDelay?: number }): void {
    this.live().addClock(this.eventId(name), opts.period, opts.initialDelay ?? 0);
    this.clocks.add(name);
  }

  /** Process every clock toggle up to and including `endTime`. */
  runUntil(endTime: number): void {
    this.live().runUntil(endTime);
    this.settled();
  }

  time(): number {
    return this.live().time();
  }

  /**
   * Step until `count` rising edges of `clock` have happened.
   *
   * @returns the time of the last of those edges
   * @throws SimulationTimeoutError after `maxSteps` steps (default 100000)
   */
  waitForCycles(clock: string, count: number, opts?: { maxSteps?: number }): number {
    const backend = this.live();
    if (!this.clocks.has(clock)) {
      throw new Error(`No clock registered for '${clock}'. Call addClock() first.`);
    }
    const sig = this.port(clock);
    const maxSteps = opts?.maxSteps ?? DEFAULT_MAX_STEPS;

    let edges = 0;
    let steps = 0;
    let level = readSignal(this.view, sig);
    while (edges < count) {
      if (steps >= maxSteps) {
        this.settled();
        throw new SimulationTimeoutError(
          `waitForCycles: exceeded ${maxSteps} steps at time ${backend.time()}`,
          backend.time(),
          steps,
        );
      }
      if (backend.step() === null) break;
      steps++;
      const next = readSignal(this.view, sig);
      if (level === 0n && next === 1n) edges++;
      level = next;
    }
    this.settled();
    return backend.time();
  }

  /**
   * Assert a reset port at its active level (from the port kind), hold it,
   * then release it.
   */
  reset(signal: string, opts?: ResetOptions): void {
    this.live();
    const sig = this.port(signal);
    const kind = sig.typeKind ?? "";
    if (kind !== "reset_async_high" && kind !== "reset_async_low") {
      throw new Error(`Port '${signal}' is not a reset signal (type_kind: '${kind}').`);
    }
    const active = kind === "reset_async_high" ? 1n : 0n;

    if (opts?.duration !== undefined) {
      this.drive(signal, active);
      this.runUntil(this.time() + opts.duration);
    } else {
      const clock = sig.associatedClock;
      if (clock === undefined) {
        throw new Error(`Port '${signal}' has no associated clock; pass { duration } instead.`);
      }
      if (!this.clocks.has(clock)) {
        throw new Error(`No clock registered for '${clock}'. Call addClock() first.`);
      }
      this.drive(signal, active);
      this.waitForCycles(clock, opts?.activeCycles ?? 2);
    }
    this.drive(signal, active ^ 1n);
  }
}
