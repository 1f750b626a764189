/**
 * In-process backend for behavioral modules.
 *
 * A module's `BehavioralCore` runs against an `ArrayBuffer` of signals.
 * `createTickBackend` advances clocks one cycle per call;
 * `createTimedBackend` keeps a queue of clock toggles ordered by time and
 * insertion.
 */

import type {
  BackendInstance,
  BehavioralCore,
  ModuleDefinition,
  SignalIo,
  SignalLayout,
  TickBackend,
  TimedBackend,
} from "./types.js";
import { buildEvents, buildLayout } from "./layout.js";
import { readSignal, writeSignal } from "./signal.js";

class CoreRunner {
  readonly buffer: ArrayBuffer;
  readonly layout: Record<string, SignalLayout>;
  readonly events: Record<string, number>;
  private readonly clocks: readonly string[];
  private readonly core: BehavioralCore;
  private readonly io: SignalIo;
  private disposed = false;

  constructor(module: ModuleDefinition<unknown>) {
    const { signals, size } = buildLayout(module.ports);
    for (const name of module.events) {
      if (signals[name]?.typeKind !== "clock") {
        throw new Error(`Event '${name}' of module '${module.name}' is not a clock port`);
      }
    }
    this.buffer = new ArrayBuffer(size);
    this.layout = signals;
    this.events = buildEvents(module.events);
    this.clocks = module.events;

    const view = new DataView(this.buffer);
    const lookup = (name: string): SignalLayout => {
      const sig = signals[name];
      if (!sig) {
        throw new Error(`Unknown signal '${name}'. Available: ${Object.keys(signals).join(", ")}`);
      }
      return sig;
    };
    this.io = {
      read: (name) => readSignal(view, lookup(name)),
      write: (name, value) => writeSignal(view, lookup(name), value),
    };
    this.core = module.instantiate();
    this.core.evalComb(this.io);
  }

  clockName(eventId: number): string {
    this.ensureAlive();
    const name = this.clocks[eventId];
    if (name === undefined) {
      throw new Error(`Unknown event id ${eventId}`);
    }
    return name;
  }

  level(clock: string): bigint {
    return this.io.read(clock);
  }

  /** Drive a clock to `level`; a 0 → 1 change fires the core's registers. */
  drive(clock: string, level: bigint): void {
    const rising = this.io.read(clock) === 0n && level === 1n;
    this.io.write(clock, level);
    this.core.evalComb(this.io);
    if (rising) {
      this.core.clockEdge(clock, this.io);
      this.core.evalComb(this.io);
    }
  }

  evalComb(): void {
    this.ensureAlive();
    this.core.evalComb(this.io);
  }

  dispose(): void {
    this.disposed = true;
  }

  ensureAlive(): void {
    if (this.disposed) throw new Error("Behavioral instance has been disposed");
  }

  instance<B>(backend: B): BackendInstance<B> {
    return { buffer: this.buffer, layout: this.layout, events: this.events, backend };
  }
}

export function createTickBackend<P>(module: ModuleDefinition<P>): BackendInstance<TickBackend> {
  const runner = new CoreRunner(module);
  return runner.instance<TickBackend>({
    tick(eventId) {
      const clock = runner.clockName(eventId);
      runner.drive(clock, 0n);
      runner.drive(clock, 1n);
    },
    evalComb: () => runner.evalComb(),
    dispose: () => runner.dispose(),
  });
}

interface Toggle {
  readonly time: number;
  readonly eventId: number;
  readonly halfPeriod: number;
}

export function createTimedBackend<P>(module: ModuleDefinition<P>): BackendInstance<TimedBackend> {
  const runner = new CoreRunner(module);
  const queue: Toggle[] = [];
  let now = 0;

  // Equal times keep insertion order.
  const enqueue = (time: number, eventId: number, halfPeriod: number): void => {
    let at = queue.length;
    while (at > 0 && (queue[at - 1]?.time ?? -Infinity) > time) at--;
    queue.splice(at, 0, { time, eventId, halfPeriod });
  };

  const step = (): number | null => {
    runner.ensureAlive();
    const head = queue[0];
    if (head === undefined) return null;
    now = head.time;
    while (queue[0]?.time === now) {
      const toggle = queue.shift();
      if (toggle === undefined) break;
      const clock = runner.clockName(toggle.eventId);
      runner.drive(clock, runner.level(clock) === 0n ? 1n : 0n);
      enqueue(now + toggle.halfPeriod, toggle.eventId, toggle.halfPeriod);
    }
    return now;
  };

  return runner.instance<TimedBackend>({
    addClock(eventId, period, initialDelay) {
      runner.clockName(eventId);
      if (!(period > 0)) {
        throw new Error(`Clock period must be positive, got ${period}`);
      }
      enqueue(now + initialDelay + period / 2, eventId, period / 2);
    },
    runUntil(endTime) {
      runner.ensureAlive();
      while ((queue[0]?.time ?? Infinity) <= endTime) step();
      now = Math.max(now, endTime);
      runner.evalComb();
    },
    step,
    time: () => now,
    evalComb: () => runner.evalComb(),
    dispose: () => runner.dispose(),
  });
}
