/**
 * Buffer layout assignment.
 *
 * Signals are packed in declaration order; each one starts on a byte
 * boundary and occupies `byteSizeFor(width)` bytes.
 */

import type { PortInfo, SignalLayout } from "./types.js";
import { byteSizeFor } from "./signal.js";

export interface BufferLayout {
  readonly signals: Record<string, SignalLayout>;
  readonly size: number;
}

export function buildLayout(ports: Record<string, PortInfo>): BufferLayout {
  const signals: Record<string, SignalLayout> = {};
  let offset = 0;

  for (const [name, port] of Object.entries(ports)) {
    if (!Number.isInteger(port.width) || port.width < 1) {
      throw new Error(`Port '${name}' has invalid width ${port.width}`);
    }
    const byteSize = byteSizeFor(port.width);
    signals[name] = {
      offset,
      width: port.width,
      byteSize,
      direction: port.direction,
      typeKind: port.type,
      ...(port.associatedClock ? { associatedClock: port.associatedClock } : {}),
    };
    offset += byteSize;
  }

  return { signals, size: Math.max(offset, 1) };
}

/** Event table: one event per clock port, numbered in declaration order. */
export function buildEvents(events: readonly string[]): Record<string, number> {
  const table: Record<string, number> = {};
  events.forEach((name, id) => {
    table[name] = id;
  });
  return table;
}
