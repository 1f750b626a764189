/**
 * State shared by the Simulator and Simulation front ends: the backend
 * instance, the typed DUT accessor bound to its buffer, and disposal.
 */

import type { BackendInstance, ModuleDefinition, SignalLayout } from "./types.js";
import { bindDut, type CombState } from "./dut.js";
import { writeSignal } from "./signal.js";

interface BackendControls {
  evalComb(): void;
  dispose(): void;
}

export abstract class FrontEnd<P, B extends BackendControls> {
  /** Read and write ports as plain properties. */
  readonly dut: P;
  protected readonly view: DataView;
  protected readonly layout: Readonly<Record<string, SignalLayout>>;
  protected readonly events: Readonly<Record<string, number>>;
  private readonly backend: B;
  private readonly comb: CombState = { stale: false };
  private readonly kind: string;
  private disposed = false;

  protected constructor(kind: string, module: ModuleDefinition<P>, instance: BackendInstance<B>) {
    this.kind = kind;
    this.backend = instance.backend;
    this.layout = instance.layout;
    this.events = instance.events;
    this.view = new DataView(instance.buffer);
    this.dut = bindDut<P>(
      this.view,
      instance.layout,
      module.ports,
      () => this.backend.evalComb(),
      this.comb,
    );
  }

  /** Release the backend. Further calls other than `dispose` throw. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.backend.dispose();
  }

  /** The backend, after checking this front end is still usable. */
  protected live(): B {
    if (this.disposed) {
      throw new Error(`${this.kind} has been disposed`);
    }
    return this.backend;
  }

  /** Outputs now reflect the inputs; the next read needs no evaluation. */
  protected settled(): void {
    this.comb.stale = false;
  }

  /** Write a port without going through the accessor (clock or reset). */
  protected drive(name: string, value: bigint): void {
    writeSignal(this.view, this.port(name), value);
    this.comb.stale = true;
  }

  protected port(name: string): SignalLayout {
    const sig = this.layout[name];
    if (!sig) {
      throw new Error(`Unknown port '${name}'. Available: ${Object.keys(this.layout).join(", ")}`);
    }
    return sig;
  }

  protected eventId(name: string): number {
    const id = this.events[name];
    if (id === undefined) {
      throw new Error(`Unknown event '${name}'. Available: ${Object.keys(this.events).join(", ")}`);
    }
    return id;
  }
}
