/**
 * @busarb/sim: Core type definitions
 *
 * A module author supplies a ModuleDefinition with a behavioral core;
 * behavioral.ts instantiates it as a BackendInstance, which the
 * Simulator and Simulation front ends drive.
 */

// ---------------------------------------------------------------------------
// Module definition
// ---------------------------------------------------------------------------

/**
 * A simulatable module descriptor.
 * The type parameter `Ports` carries the port interface
 * (e.g. `ArbiterPorts`) so that `Simulator.create(module)` returns
 * a correctly-typed DUT accessor.
 */
export interface ModuleDefinition<Ports = Record<string, unknown>> {
  readonly __busarb_module: true;
  readonly name: string;
  /** Instantiation parameters, readable by testbenches. */
  readonly params: Readonly<Record<string, number>>;
  readonly ports: Record<string, PortInfo>;
  /** Clock event names, in declaration order. */
  readonly events: readonly string[];
  /** Builds a fresh core with its own registers. */
  instantiate(): BehavioralCore;
  /** Phantom field: never set at runtime. Carries the `Ports` type. */
  readonly __ports?: Ports;
}

export type PortDirection = "input" | "output";

/**
 * Kind of a port. Reset kinds carry their polarity so that
 * `Simulation.reset()` can pick the active level.
 */
export type PortKind =
  | "clock"
  | "reset_async_high"
  | "reset_async_low"
  | "logic";

/** Metadata for a single port. */
export interface PortInfo {
  readonly direction: PortDirection;
  readonly type: PortKind;
  readonly width: number;
  /** Clock that paces this reset when asserted by cycle count. */
  readonly associatedClock?: string;
}

// ---------------------------------------------------------------------------
// Signal layout
// ---------------------------------------------------------------------------

/**
 * Byte-level location of a signal inside the signal buffer.
 * @internal
 */
export interface SignalLayout {
  /** Byte offset within the buffer. */
  readonly offset: number;
  /** Bit width of the signal. */
  readonly width: number;
  /** Number of bytes occupied. */
  readonly byteSize: number;
  readonly direction: PortDirection;
  readonly typeKind?: PortKind;
  readonly associatedClock?: string;
}

// ---------------------------------------------------------------------------
// Behavioral core (implemented by module authors)
// ---------------------------------------------------------------------------

/** Name-addressed view of the signal buffer handed to a core. */
export interface SignalIo {
  read(name: string): bigint;
  write(name: string, value: bigint): void;
}

/**
 * Register-transfer description of a module.
 *
 * `evalComb` must be idempotent: it is called whenever inputs may have
 * changed and must only drive outputs from registers and inputs.
 * `clockEdge` updates registers on a rising edge of the named clock.
 */
export interface BehavioralCore {
  evalComb(io: SignalIo): void;
  clockEdge(clock: string, io: SignalIo): void;
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

/** Backend whose clocks advance only on explicit `tick()` calls. */
export interface TickBackend {
  /** One full cycle (low, then high) of the clock with this event id. */
  tick(eventId: number): void;
  evalComb(): void;
  dispose(): void;
}

/** Backend that owns a time-ordered queue of clock toggles. */
export interface TimedBackend {
  addClock(eventId: number, period: number, initialDelay: number): void;
  /** Process every queued toggle at or before `endTime`, then move time there. */
  runUntil(endTime: number): void;
  /** Process the toggles at the head time; `null` when nothing is queued. */
  step(): number | null;
  time(): number;
  evalComb(): void;
  dispose(): void;
}

/** A module instantiated on a backend: its signal memory and controls. */
export interface BackendInstance<B> {
  readonly buffer: ArrayBuffer;
  readonly layout: Readonly<Record<string, SignalLayout>>;
  /** Clock event name → event id. */
  readonly events: Readonly<Record<string, number>>;
  readonly backend: B;
}

// ---------------------------------------------------------------------------
// Simulation timeout error
// ---------------------------------------------------------------------------

/**
 * Thrown when a simulation helper exceeds its step budget.
 */
export class SimulationTimeoutError extends Error {
  readonly time: number;
  readonly steps: number;

  constructor(message: string, time: number, steps: number) {
    super(message);
    this.name = "SimulationTimeoutError";
    this.time = time;
    this.steps = steps;
  }
}
