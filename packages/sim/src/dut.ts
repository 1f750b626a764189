/**
 * Typed port accessor over a module's signal buffer.
 *
 * Each non-clock port becomes a concrete property. Input writes go
 * straight to the buffer and mark combinational outputs stale; the next
 * output read re-evaluates once before returning.
 */

import type { PortInfo, SignalLayout } from "./types.js";
import { readSignal, writeSignal } from "./signal.js";

/**
 * Staleness flag shared by an accessor and the front end that owns it.
 * Front ends clear it after any backend call that leaves outputs settled.
 */
export interface CombState {
  stale: boolean;
}

export function bindDut<P>(
  view: DataView,
  layout: Readonly<Record<string, SignalLayout>>,
  ports: Readonly<Record<string, PortInfo>>,
  evalComb: () => void,
  state: CombState,
): P {
  const descriptors: PropertyDescriptorMap = {};

  for (const [name, port] of Object.entries(ports)) {
    const sig = layout[name];
    if (port.type === "clock" || sig === undefined) continue;

    descriptors[name] =
      port.direction === "output"
        ? {
            enumerable: true,
            get: (): bigint => {
              if (state.stale) {
                evalComb();
                state.stale = false;
              }
              return readSignal(view, sig);
            },
            set: () => {
              throw new Error(`Cannot write to output port '${name}'`);
            },
          }
        : {
            enumerable: true,
            get: (): bigint => readSignal(view, sig),
            set: (value: bigint | number) => {
              writeSignal(view, sig, value);
              state.stale = true;
            },
          };
  }

  const dut: Record<string, unknown> = Object.create(null);
  Object.defineProperties(dut, descriptors);
  return dut as P;
}
