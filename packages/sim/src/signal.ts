/**
 * Little-endian signal codec over a DataView.
 *
 * Signals up to 32 bits use the native 8/16/32-bit accessors; wider
 * signals are read and written byte by byte as BigInt. Every value is
 * masked to the signal width on write.
 */

import type { SignalLayout } from "./types.js";

/** Bytes reserved for a signal of the given bit width. */
export function byteSizeFor(width: number): number {
  if (width <= 8) return 1;
  if (width <= 16) return 2;
  if (width <= 32) return 4;
  return Math.ceil(width / 8);
}

function widthMask(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

function readNarrow(view: DataView, sig: SignalLayout): number {
  let raw: number;
  switch (sig.byteSize) {
    case 1:
      raw = view.getUint8(sig.offset);
      break;
    case 2:
      raw = view.getUint16(sig.offset, true);
      break;
    default:
      raw = view.getUint32(sig.offset, true);
      break;
  }
  return sig.width >= 32 ? raw : raw & ((1 << sig.width) - 1);
}

function writeNarrow(view: DataView, sig: SignalLayout, value: number): void {
  const masked = sig.width >= 32 ? value >>> 0 : (value & ((1 << sig.width) - 1)) >>> 0;
  switch (sig.byteSize) {
    case 1:
      view.setUint8(sig.offset, masked);
      break;
    case 2:
      view.setUint16(sig.offset, masked, true);
      break;
    default:
      view.setUint32(sig.offset, masked, true);
      break;
  }
}

/** Read a signal. Always returns bigint. */
export function readSignal(view: DataView, sig: SignalLayout): bigint {
  if (sig.width <= 32) {
    return BigInt(readNarrow(view, sig));
  }
  let result = 0n;
  for (let i = sig.byteSize - 1; i >= 0; i--) {
    result = (result << 8n) | BigInt(view.getUint8(sig.offset + i));
  }
  return result & widthMask(sig.width);
}

/** Write a signal, truncating to its width. */
export function writeSignal(
  view: DataView,
  sig: SignalLayout,
  value: bigint | number,
): void {
  const big = (typeof value === "bigint" ? value : BigInt(value)) & widthMask(sig.width);
  if (sig.width <= 32) {
    writeNarrow(view, sig, Number(big));
    return;
  }
  let rest = big;
  for (let i = 0; i < sig.byteSize; i++) {
    view.setUint8(sig.offset + i, Number(rest & 0xffn));
    rest >>= 8n;
  }
}
