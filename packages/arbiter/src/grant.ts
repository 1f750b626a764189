/**
 * Grant-vector decoding and per-client bit vector helpers.
 */

export type GrantDecode =
  | { readonly kind: "idle" }
  | { readonly kind: "granted"; readonly client: number }
  | {
      readonly kind: "illegal";
      readonly reason: "multiple" | "out-of-range";
      readonly clients: readonly number[];
    };

/** Indices of the set bits, lowest first. */
export function setBits(value: bigint): number[] {
  const bits: number[] = [];
  let rest = value;
  for (let index = 0; rest > 0n; index++) {
    if (rest & 1n) bits.push(index);
    rest >>= 1n;
  }
  return bits;
}

/**
 * Decode a one-hot grant vector.
 *
 * Zero decodes to idle, a single bit below `clients` to that index;
 * anything else is illegal and must fail the run on its own.
 */
export function decodeGrant(value: bigint, clients: number): GrantDecode {
  if (value === 0n) return { kind: "idle" };
  const bits = setBits(value);
  if (bits.length > 1) {
    return { kind: "illegal", reason: "multiple", clients: bits };
  }
  const client = bits[0] ?? -1;
  if (client < 0 || client >= clients) {
    return { kind: "illegal", reason: "out-of-range", clients: bits };
  }
  return { kind: "granted", client };
}

export function isBitSet(vector: bigint, index: number): boolean {
  return ((vector >> BigInt(index)) & 1n) === 1n;
}

/**
 * Pack per-client weights, client-major little-endian: client i occupies
 * bits [i*width, i*width + width). Each weight is truncated to `width`.
 */
export function packWeights(weights: readonly number[], width: number): bigint {
  const mask = (1n << BigInt(width)) - 1n;
  let packed = 0n;
  weights.forEach((weight, i) => {
    packed |= (BigInt(weight) & mask) << BigInt(i * width);
  });
  return packed;
}
