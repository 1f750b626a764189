/**
 * @busarb/sim
 *
 * Cycle-based simulation runtime for behavioral hardware models.
 * Ports are read and written through a typed accessor over the module's
 * signal buffer; the backend is only called to advance clocks.
 */

export type {
  ModuleDefinition,
  PortDirection,
  PortKind,
  PortInfo,
  SignalLayout,
  SignalIo,
  BehavioralCore,
} from "./types.js";
export { SimulationTimeoutError } from "./types.js";

// Event-based
export { Simulator } from "./simulator.js";

// Time-based
export { Simulation } from "./simulation.js";
export type { ResetOptions } from "./simulation.js";
