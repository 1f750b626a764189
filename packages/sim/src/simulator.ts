/**
 * Event-based Simulator: the testbench decides when each clock edge
 * happens by calling `tick()`.
 *
 * ```ts
 * const sim = Simulator.create(arbiterModule({ clients: 4, weightWidth: 4 }));
 * sim.dut.i_req = 0b0011n;
 * sim.tick();
 * ```
 */

import type { ModuleDefinition, TickBackend } from "./types.js";
import { createTickBackend } from "./behavioral.js";
import { FrontEnd } from "./frontend.js";

export class Simulator<P = Record<string, unknown>> extends FrontEnd<P, TickBackend> {
  static create<P>(module: ModuleDefinition<P>): Simulator<P> {
    return new Simulator<P>(module);
  }

  private readonly moduleName: string;

  private constructor(module: ModuleDefinition<P>) {
    super("Simulator", module, createTickBackend(module));
    this.moduleName = module.name;
  }

  /** Run `count` full cycles of the module's first clock. */
  tick(count = 1): void {
    const backend = this.live();
    const clock = Object.values(this.events)[0];
    if (clock === undefined) {
      throw new Error(`Module '${this.moduleName}' has no clock to tick`);
    }
    for (let i = 0; i < count; i++) backend.tick(clock);
    this.settled();
  }
}
